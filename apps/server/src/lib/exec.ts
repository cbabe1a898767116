import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs an external binary. Injected so tests never spawn real processes. */
export type CommandRunner = (
  file: string,
  args: ReadonlyArray<string>,
  options: { signal: AbortSignal },
) => Promise<CommandResult>;

/** Output beyond this is an error rather than silently truncated. */
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export const runCommand: CommandRunner = async (file, args, { signal }) => {
  try {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
      signal,
      maxBuffer: MAX_OUTPUT_BYTES,
      encoding: "utf8",
    });
    return { stdout, stderr };
  } catch (cause) {
    throw new Error(`${file} failed: ${String(cause)}`, { cause });
  }
};
