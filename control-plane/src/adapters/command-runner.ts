import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Runs a read-only host command and resolves with its stdout. */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: { readonly timeoutMs: number },
) => Promise<string>;

export const execFileRunner: CommandRunner = async (file, args, options) => {
  const { stdout } = await execFileAsync(file, [...args], {
    encoding: "utf8",
    timeout: options.timeoutMs,
    maxBuffer: 8 * 1024 * 1024,
  });
  return stdout;
};
