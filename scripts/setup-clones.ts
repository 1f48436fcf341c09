/**
 * Clone Setup
 *
 * Prepares a release host: creates the repository root and clones every
 * configured project that has no clone yet. Run once when provisioning a
 * host, or from CI before the server starts.
 *
 *   npm run setup-clones -- --config /etc/release-bot.yml
 */

import { Command } from "commander";
import { activate, loadReleaseConfig, logger, resolveConfigPath } from "../api/lib/index.js";
import type { ActivationResult, CommandExecutor } from "../api/lib/index.js";
import { failAndExit, runIfMain } from "./shared/run-main.js";

export interface SetupClonesOptions {
  /** Defaults to RELEASE_BOT_CONFIG, then release-bot.yml */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  exec?: CommandExecutor;
}

export async function setupClones(options: SetupClonesOptions = {}): Promise<ActivationResult> {
  const configPath = options.configPath ?? resolveConfigPath(options.env);
  logger.info(`Loading release configuration from ${configPath}`);
  const config = await loadReleaseConfig(configPath, options.env);
  return activate(config, { exec: options.exec });
}

export function failedProjects(result: ActivationResult): string[] {
  if (result.status === "unconfigured") {
    return [];
  }
  return result.projects.filter((p) => p.status === "failed").map((p) => p.project);
}

async function main(): Promise<void> {
  const program = new Command("setup-clones")
    .description("Clone every configured project into the repository root")
    .option("-c, --config <path>", "release configuration file")
    .parse(process.argv);
  const { config } = program.opts<{ config?: string }>();

  const result = await setupClones({ configPath: config });
  const failed = failedProjects(result);
  if (failed.length > 0) {
    failAndExit(`Failed to clone: ${failed.join(", ")}`);
  }

  logger.info("Done - setup-clones completed successfully");
}

runIfMain(import.meta.url, main);
