/**
 * Webhook Server
 *
 * Long-running host for the bot: validates the GitHub App environment,
 * prepares the clones, then serves the webhook handler. Release flows run
 * for minutes, so the bot runs on a host of its own rather than as a
 * serverless function.
 *
 *   npm start -- --config /etc/release-bot.yml --port 8080
 */

import { createServer, type Server } from "node:http";
import { Command } from "commander";
import handler, { useReleaseConfig } from "../api/github/webhooks/index.js";
import {
  activate,
  getAppConfig,
  getServerPort,
  loadReleaseConfig,
  logger,
  resolveConfigPath,
} from "../api/lib/index.js";
import type { CommandExecutor } from "../api/lib/index.js";
import { failedProjects } from "./setup-clones.js";
import { runIfMain } from "./shared/run-main.js";

export interface ServeOptions {
  configPath?: string;
  port?: number;
  env?: NodeJS.ProcessEnv;
  exec?: CommandExecutor;
}

export async function startServer(options: ServeOptions = {}): Promise<Server> {
  const env = options.env ?? process.env;
  getAppConfig(true, env);
  const port = options.port ?? getServerPort(env);

  const configPath = options.configPath ?? resolveConfigPath(env);
  const config = await loadReleaseConfig(configPath, env);
  const activation = await activate(config, { exec: options.exec });
  for (const project of failedProjects(activation)) {
    logger.warn(`Serving without a clone of ${project}; its flows fail until the clone exists`);
  }
  useReleaseConfig(config);

  const server = createServer(handler);
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

  logger.info(`Listening on port ${port} (webhooks at /api/github/webhooks)`);
  return server;
}

async function main(): Promise<void> {
  const program = new Command("serve")
    .description("Serve the release bot webhook handler")
    .option("-c, --config <path>", "release configuration file")
    .option("-p, --port <port>", "port to listen on (default: PORT or 3000)")
    .parse(process.argv);
  const options = program.opts<{ config?: string; port?: string }>();

  await startServer({
    configPath: options.config,
    port: options.port === undefined ? undefined : getServerPort({ PORT: options.port }),
  });
}

runIfMain(import.meta.url, main);
