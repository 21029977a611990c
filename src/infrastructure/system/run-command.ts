import { spawn } from "node:child_process";

export interface CommandOutput {
  code: number | null;
  stdout: Buffer;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: { env?: NodeJS.ProcessEnv; timeoutMs?: number },
) => Promise<CommandOutput>;

const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * Spawns a system tool and collects its output. Rejects only when the binary
 * cannot be started; a non-zero exit is reported through `code`.
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandOutput>((resolve, reject) => {
    const child = spawn(command, args, {
      env: options.env ?? process.env,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });
    child.stdin.end();
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.once("error", reject);
    child.once("close", (code) => {
      resolve({
        code,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr).toString("utf8").trim(),
      });
    });
  });

export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly code: number | null,
    readonly stderr: string,
  ) {
    super(
      `${command} exited with code ${String(code)}${stderr ? `: ${stderr}` : ""}`,
    );
    this.name = "CommandFailedError";
  }
}

/** Like `runCommand`, but a non-zero exit rejects with `CommandFailedError`. */
export const runChecked = async (
  run: CommandRunner,
  command: string,
  args: readonly string[],
  options?: { env?: NodeJS.ProcessEnv; timeoutMs?: number },
): Promise<CommandOutput> => {
  const output = await run(command, args, options);
  if (output.code !== 0) {
    throw new CommandFailedError(command, output.code, output.stderr);
  }
  return output;
};

/** Runs each attempt in order until one succeeds; rethrows the last failure. */
export const firstSuccessful = async <T>(
  attempts: readonly (() => Promise<T>)[],
): Promise<T> => {
  let lastError: unknown = new Error("No attempts given");
  for (const attempt of attempts) {
    try {
      return await attempt();
    } catch (error) {
      lastError = error;
    }
  }
  throw lastError;
};
