/**
 * Process Executor
 *
 * Runs an external command with a fixed I/O contract: stdout and stderr are
 * merged into one text buffer in arrival order, and any non-zero exit
 * rejects with CommandFailedError carrying that buffer.
 */

import { spawn } from "node:child_process";
import { CommandFailedError } from "./errors.js";

export interface RunOptions {
  cwd: string;
  /**
   * Variables layered over process.env for this child only.
   * process.env itself is never modified.
   */
  env?: Record<string, string>;
}

export interface CommandResult {
  argv: readonly string[];
  exitCode: 0;
  output: string;
}

export type CommandExecutor = (argv: readonly string[], options: RunOptions) => Promise<CommandResult>;

/**
 * Build the environment for one child invocation.
 */
export function buildChildEnv(overlay: Record<string, string> = {}): NodeJS.ProcessEnv {
  return { ...process.env, ...overlay };
}

export const runCommand: CommandExecutor = (argv, options) => {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new CommandFailedError(argv, null, "Empty command"));
  }

  return new Promise<CommandResult>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let settled = false;

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: buildChildEnv(options.env),
      stdio: ["ignore", "pipe", "pipe"],
    });

    const collect = (chunk: Buffer): void => {
      chunks.push(chunk);
    };
    child.stdout?.on("data", collect);
    child.stderr?.on("data", collect);

    child.once("error", (error) => {
      if (settled) {
        return;
      }
      settled = true;
      const output = Buffer.concat(chunks).toString("utf8");
      reject(new CommandFailedError(argv, null, output ? `${output}\n${error.message}` : error.message));
    });

    child.once("close", (code, signal) => {
      if (settled) {
        return;
      }
      settled = true;
      const output = Buffer.concat(chunks).toString("utf8");
      if (code === 0) {
        resolve({ argv, exitCode: 0, output });
        return;
      }
      reject(new CommandFailedError(argv, code, output, signal));
    });
  });
};
