/**
 * Repository Synchronizer
 *
 * Keeps the local clones in `reposRoot` in step with their remotes.
 * Synchronization is destructive: local changes and diverged commits in a
 * clone are discarded so every flow starts from the remote branch tip.
 */

import { access } from "node:fs/promises";
import * as path from "node:path";
import { InvalidBranchNameError } from "./errors.js";
import { runCommand, type CommandExecutor } from "./process-executor.js";

export interface GitCommandOptions {
  exec?: CommandExecutor;
  /** Extra variables for the git child processes. */
  env?: Record<string, string>;
}

export type CloneStatus = "existing" | "cloned";

/**
 * Reject names git would read as an option, or that cannot name a branch.
 */
export function assertValidBranchName(branchName: string): void {
  if (!branchName.trim() || branchName.startsWith("-") || /\s/.test(branchName)) {
    throw new InvalidBranchNameError(branchName);
  }
}

/**
 * Bring the working tree to exactly the remote tip of `branchName`.
 *
 * 1. `git fetch -p` — fetch all remote refs, pruning deleted ones
 * 2. `git checkout -B <branch> origin/<branch> -f` — reset the local branch onto the remote one
 *
 * The first failing step aborts with CommandFailedError.
 */
export async function synchronizeBranch(
  projectRoot: string,
  branchName: string,
  options: GitCommandOptions = {},
): Promise<void> {
  assertValidBranchName(branchName);
  const exec = options.exec ?? runCommand;

  const steps: string[][] = [
    ["fetch", "-p"],
    ["checkout", "-B", branchName, `origin/${branchName}`, "-f"],
  ];

  for (const args of steps) {
    await exec(["git", ...args], { cwd: projectRoot, env: options.env });
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Clone `url` into `<reposRoot>/<projectName>` unless that directory exists.
 * An existing directory is reused as-is and never re-cloned.
 */
export async function ensureClone(
  reposRoot: string,
  projectName: string,
  url: string,
  options: GitCommandOptions = {},
): Promise<CloneStatus> {
  if (await exists(path.join(reposRoot, projectName))) {
    return "existing";
  }

  const exec = options.exec ?? runCommand;
  await exec(["git", "clone", url, projectName], { cwd: reposRoot, env: options.env });
  return "cloned";
}
