/**
 * Activation
 *
 * Prepares the host before commands are accepted: creates the repository
 * root and clones every configured project that has no clone yet. Existing
 * clones are reused untouched.
 */

import { mkdir } from "node:fs/promises";
import { MESSAGES } from "../config.js";
import { CommandFailedError } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import type { CommandExecutor } from "./process-executor.js";
import { storageEnvironment, type ReleaseConfig } from "./release-config.js";
import { ensureClone, type CloneStatus } from "./repository-sync.js";

export interface ProjectActivation {
  project: string;
  status: CloneStatus | "failed";
  /** Clone output or error text for failed projects. */
  detail?: string;
}

export type ActivationResult =
  | { status: "unconfigured" }
  | { status: "activated"; projects: ProjectActivation[] };

export interface ActivationOptions {
  exec?: CommandExecutor;
  logger?: Logger;
}

/**
 * Activate the bot for the given configuration.
 *
 * A null configuration leaves the bot unconfigured: a warning is logged and
 * nothing touches the disk. Clone failures are reported per project and do
 * not stop the remaining projects.
 */
export async function activate(
  config: ReleaseConfig | null,
  options: ActivationOptions = {},
): Promise<ActivationResult> {
  const log = options.logger ?? defaultLogger;

  if (!config) {
    log.warn(MESSAGES.NOT_CONFIGURED);
    return { status: "unconfigured" };
  }

  await mkdir(config.reposRoot, { recursive: true });
  const env = storageEnvironment(config);
  const projects: ProjectActivation[] = [];

  log.group(`Preparing ${config.projects.size} project clone(s) in ${config.reposRoot}`);
  try {
    for (const project of config.projects.values()) {
      try {
        const status = await ensureClone(config.reposRoot, project.name, project.url, { exec: options.exec, env });
        log.info(status === "cloned" ? `Cloned ${project.name}` : `Reusing existing clone of ${project.name}`);
        projects.push({ project: project.name, status });
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        const detail = cause instanceof CommandFailedError ? cause.output : cause.message;
        log.error(`Failed to clone ${project.name}`, cause);
        projects.push({ project: project.name, status: "failed", detail });
      }
    }
  } finally {
    log.groupEnd();
  }

  return { status: "activated", projects };
}
