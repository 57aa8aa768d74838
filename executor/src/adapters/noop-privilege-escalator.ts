import type {
  PrivilegeEscalator,
  PrivilegeGrant,
} from "../ports/privilege-escalator.js";

export class NoopPrivilegeEscalator implements PrivilegeEscalator {
  constructor(private readonly grant: PrivilegeGrant = { granted: true }) {}

  async requestElevatedPrivileges(): Promise<PrivilegeGrant> {
    return this.grant;
  }
}
