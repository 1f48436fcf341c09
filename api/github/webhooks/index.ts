import { createNodeMiddleware, createProbot, Probot } from "probot";
import type { IncomingMessage, ServerResponse } from "http";
import { BOT_NAME, DEFAULT_MENTION } from "../../config.js";
import { executeCommand, parseCommand } from "../../lib/commands/index.js";
import { validateEnv, getAppId } from "../../lib/env-validation.js";
import { logger } from "../../lib/logger.js";
import { loadReleaseConfig, resolveConfigPath, type ReleaseConfig } from "../../lib/release-config.js";
import { ReleaseRunner } from "../../lib/release-runner.js";

/**
 * Release Relay Bot
 *
 * Handles GitHub webhooks for comment-driven releases:
 * - Comment mentioning the bot: run the env/deploy/help command it holds
 */

// ─────────────────────────────────────────────────────────────────────────────
// Release State
// ─────────────────────────────────────────────────────────────────────────────

interface ReleaseState {
  mention: string;
  /** null while the bot has no release configuration */
  runner: ReleaseRunner | null;
}

let releaseState: Promise<ReleaseState> | undefined;

function buildReleaseState(config: ReleaseConfig | null): ReleaseState {
  return config
    ? { mention: config.mention, runner: new ReleaseRunner({ config }) }
    : { mention: DEFAULT_MENTION, runner: null };
}

/**
 * Install an already-loaded configuration (the server loads it once at
 * startup). Passing undefined drops it so the next command reloads from disk.
 */
export function useReleaseConfig(config: ReleaseConfig | null | undefined): void {
  releaseState = config === undefined ? undefined : Promise.resolve(buildReleaseState(config));
}

/**
 * Release configuration shared by every command, loaded on first use. A load
 * failure is not cached so a fixed file is picked up by the next command.
 */
function getReleaseState(): Promise<ReleaseState> {
  releaseState ??= loadReleaseConfig(resolveConfigPath()).then(buildReleaseState, (error: unknown) => {
    releaseState = undefined;
    throw error;
  });
  return releaseState;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main App
// ─────────────────────────────────────────────────────────────────────────────

export function app(probotApp: Probot): void {
  probotApp.log.info("Release relay bot loaded successfully");

  /**
   * Handle new comments - run release commands addressed to the bot.
   * Comments authored by this app or by other bots are never commands.
   */
  probotApp.on("issue_comment.created", async (context) => {
    const { issue, comment, repository } = context.payload;
    const owner = repository.owner.login;
    const repo = repository.name;

    try {
      const appId = getAppId();
      if (comment.performed_via_github_app?.id === appId || !comment.user || comment.user.type === "Bot") {
        return;
      }

      const { mention, runner } = await getReleaseState();
      const command = parseCommand(comment.body, mention);
      if (!command) {
        return;
      }

      const result = await executeCommand({
        octokit: context.octokit,
        owner,
        repo,
        issueNumber: issue.number,
        commentId: comment.id,
        senderLogin: comment.user.login,
        command,
        mention,
        runner,
        appId,
        log: context.log,
      });
      context.log.info({ result, issue: issue.number, repo: repository.full_name }, `Command ${command.verb}: ${result.status}`);
    } catch (error) {
      context.log.error({ err: error, issue: issue.number, repo: repository.full_name }, "Failed to process comment");
      throw error;
    }
  });
}

const probot = createProbot();
const middleware = createNodeMiddleware(app, {
  probot,
  webhooksPath: "/api/github/webhooks",
});

/**
 * HTTP handler.
 *
 * GET requests return health status with configuration validation.
 * Other requests are forwarded to Probot middleware for webhook processing.
 *
 * Security: both paths validate WEBHOOK_SECRET is configured.
 * Probot then verifies webhook signatures - unsigned payloads are rejected.
 */
export default function handler(req: IncomingMessage, res: ServerResponse): void {
  // Fail closed when the app is misconfigured
  const validation = validateEnv(true);

  if (req.method === "GET") {
    res.statusCode = validation.valid ? 200 : 503;
    res.setHeader("Content-Type", "application/json");
    res.end(
      JSON.stringify({
        status: validation.valid ? "ok" : "misconfigured",
        bot: BOT_NAME,
      })
    );
    return;
  }

  if (!validation.valid) {
    res.statusCode = 503;
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify({ error: "Webhook processing unavailable" }));
    return;
  }

  middleware(req, res).catch((error: unknown) => {
    logger.error("Webhook middleware failed", error instanceof Error ? error : new Error(String(error)));
    if (!res.headersSent) {
      res.statusCode = 500;
      res.end();
    }
  });
}
