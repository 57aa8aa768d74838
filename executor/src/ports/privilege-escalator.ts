export interface PrivilegeGrant {
  readonly granted: boolean;
  readonly error?: string;
}

export interface PrivilegeEscalator {
  requestElevatedPrivileges(): Promise<PrivilegeGrant>;
}
