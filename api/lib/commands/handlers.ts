/**
 * Command Handlers
 *
 * Executes parsed release commands. Each command is authorized against the
 * sender's repository permission, guarded against webhook redeliveries and
 * then handed to the ReleaseRunner, which reports back through the comment
 * that issued it.
 */

import { MESSAGES, REACTIONS } from "../../config.js";
import { GitHubCommentChannel, type ChannelLog, type ChannelOctokit } from "../github-channel.js";
import type { FlowOutcome, ReleaseRunner } from "../release-runner.js";
import { RELEASE_VERBS, parseReleaseCommand, type ParsedCommand } from "./parser.js";

/**
 * Minimal interface for the octokit client needed by command handlers.
 * Uses the Probot context's octokit which has full REST API access.
 */
export interface CommandOctokit extends ChannelOctokit {
  rest: ChannelOctokit["rest"] & {
    repos: {
      getCollaboratorPermissionLevel: (params: {
        owner: string;
        repo: string;
        username: string;
      }) => Promise<{ data: { permission: string } }>;
    };
    reactions: ChannelOctokit["rest"]["reactions"] & {
      listForIssueComment: (params: {
        owner: string;
        repo: string;
        comment_id: number;
        per_page?: number;
        page?: number;
      }) => Promise<{ data: Array<{ user: { login: string } | null; content: string }> }>;
    };
    issues: ChannelOctokit["rest"]["issues"] & {
      listComments: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        per_page?: number;
        page?: number;
      }) => Promise<{
        data: Array<{
          user: { login: string } | null;
          performed_via_github_app?: { id: number } | null;
        }>;
      }>;
    };
  };
}

/**
 * Context passed to command execution.
 */
export interface CommandContext {
  octokit: CommandOctokit;
  owner: string;
  repo: string;
  issueNumber: number;
  commentId: number;
  senderLogin: string;
  command: ParsedCommand;
  /** Mention shown in usage replies */
  mention: string;
  /** null while the bot has no release configuration */
  runner: ReleaseRunner | null;
  /** App ID for recognizing this app's own comments */
  appId: number;
  log: ChannelLog;
}

/**
 * Result of a command execution attempt.
 */
export type CommandResult =
  | { status: "executed"; message: string }
  | { status: "ignored" }      // unauthorized, unrecognized or already processed
  | { status: "rejected"; reason: string };  // valid command that could not run

/**
 * Permission levels that are allowed to run releases.
 */
const AUTHORIZED_PERMISSIONS = new Set(["admin", "maintain", "write"]);

/** Reactions this app leaves on a command it has picked up. */
const STATUS_REACTIONS = new Set<string>(Object.values(REACTIONS));

type CommandFailureClassification = "permission" | "validation" | "transient" | "unexpected";

interface AuthorizationResult {
  authorized: boolean;
  permission: string | null;
  /** Set when the auth check itself failed due to a transient error. */
  transientError?: unknown;
}

/** Network-level error codes that indicate a transient failure. */
const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

function getErrorCode(error: unknown): string | null {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return null;
  }
  return typeof error.code === "string" ? error.code : null;
}

function getErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return null;
  }
  return typeof error.status === "number" ? error.status : null;
}

/**
 * Network-level failures, rate limits and server errors are worth
 * surfacing rather than treating as an auth denial.
 */
export function isTransientError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code !== null && TRANSIENT_NETWORK_CODES.has(code)) {
    return true;
  }
  const status = getErrorStatus(error);
  return status === 429 || (status !== null && status >= 500);
}

export function classifyCommandFailure(error: unknown): CommandFailureClassification {
  if (isTransientError(error)) {
    return "transient";
  }
  const status = getErrorStatus(error);
  if (status === 401 || status === 403) {
    return "permission";
  }
  if (status === 400 || status === 404 || status === 409 || status === 422) {
    return "validation";
  }
  return "unexpected";
}

function buildFailureCode(verb: string, classification: CommandFailureClassification): string {
  return `CMD_${verb.toUpperCase()}_${classification.toUpperCase()}`;
}

function buildCorrelationId(ctx: CommandContext): string {
  return `cmd-${ctx.commentId.toString(36)}`;
}

function buildCommandFailureReply(
  ctx: CommandContext,
  failureCode: string,
  classification: CommandFailureClassification,
): string {
  let guidance = "Retry the command once. If it fails again, ask a maintainer to inspect the bot logs.";
  if (classification === "permission") {
    guidance = "Check the app's repository permissions, then retry.";
  } else if (classification === "transient") {
    guidance = "This looks transient (GitHub/API). Retry the command shortly.";
  }

  return [
    "## 💥 Command failed",
    "",
    `I couldn't complete \`${ctx.command.verb}\` due to an internal error.`,
    "",
    `- Failure code: \`${failureCode}\``,
    `- Correlation id: \`${buildCorrelationId(ctx)}\``,
    "",
    guidance,
  ].join("\n");
}

/**
 * Check if the sender has sufficient repo permissions to run releases.
 */
async function isAuthorized(ctx: CommandContext): Promise<AuthorizationResult> {
  try {
    const { data } = await ctx.octokit.rest.repos.getCollaboratorPermissionLevel({
      owner: ctx.owner,
      repo: ctx.repo,
      username: ctx.senderLogin,
    });
    return {
      authorized: AUTHORIZED_PERMISSIONS.has(data.permission),
      permission: data.permission,
    };
  } catch (error) {
    if (isTransientError(error)) {
      ctx.log.error(
        { err: error, user: ctx.senderLogin, issue: ctx.issueNumber },
        `Permission check hit transient error for ${ctx.senderLogin}, surfacing to user`,
      );
      return { authorized: false, permission: null, transientError: error };
    }

    // 404 means the sender is not a collaborator
    ctx.log.error(
      { err: error, user: ctx.senderLogin, issue: ctx.issueNumber },
      `Permission check failed for ${ctx.senderLogin}, denying command`,
    );
    return { authorized: false, permission: null };
  }
}

/**
 * Resolve this GitHub App's bot login by finding a comment authored via this app.
 * Returns the bot username (e.g. "release-relay[bot]") or undefined if not found.
 */
async function resolveAppBotLogin(ctx: CommandContext): Promise<string | undefined> {
  try {
    const perPage = 100;
    let page = 1;

    while (true) {
      const { data: comments } = await ctx.octokit.rest.issues.listComments({
        owner: ctx.owner,
        repo: ctx.repo,
        issue_number: ctx.issueNumber,
        per_page: perPage,
        page,
      });

      for (const comment of comments) {
        if (comment.performed_via_github_app?.id === ctx.appId && comment.user) {
          return comment.user.login;
        }
      }

      if (comments.length < perPage) {
        return undefined;
      }
      page += 1;
    }
  } catch (error) {
    ctx.log.error(
      { err: error, issue: ctx.issueNumber },
      "Failed to resolve app bot login for idempotency check",
    );
    return undefined;
  }
}

/**
 * Idempotency guard against webhook redeliveries: a command this app already
 * picked up carries one of its status reactions.
 *
 * Only reactions from THIS app's bot identity count, so other bots cannot
 * suppress a release.
 */
async function alreadyProcessed(ctx: CommandContext): Promise<boolean> {
  try {
    const botLogin = await resolveAppBotLogin(ctx);
    if (!botLogin) {
      ctx.log.info("Could not resolve app bot login for idempotency check, proceeding");
      return false;
    }

    const perPage = 100;
    let page = 1;

    while (true) {
      const { data: reactions } = await ctx.octokit.rest.reactions.listForIssueComment({
        owner: ctx.owner,
        repo: ctx.repo,
        comment_id: ctx.commentId,
        per_page: perPage,
        page,
      });

      const ours = reactions.find((r) => r.user?.login === botLogin && STATUS_REACTIONS.has(r.content));
      if (ours) {
        ctx.log.info({ botLogin, content: ours.content, page }, "Found our own status reaction, already processed");
        return true;
      }

      if (reactions.length < perPage) {
        return false;
      }
      page += 1;
    }
  } catch (error) {
    // Dropping a release silently is worse than a rare duplicate
    ctx.log.error(
      { err: error, commentId: ctx.commentId },
      "Idempotency check failed, proceeding",
    );
    return false;
  }
}

function summarizeOutcome(outcome: FlowOutcome): CommandResult {
  const { request } = outcome;
  const subject = request.kind === "env"
    ? `environment check of ${request.projectName}@${request.branchName}`
    : `deploy of ${request.projectName}@${request.branchName} to ${request.environment}`;

  if (outcome.status === "succeeded") {
    return { status: "executed", message: `Completed ${subject}` };
  }
  return { status: "rejected", reason: `Failed ${subject} while ${outcome.failedStep}: ${outcome.error.message}` };
}

/**
 * Execute a parsed command.
 *
 * Authorization flow:
 * 1. Check if the verb is recognized → ignore if not
 * 2. Check sender permissions → silent ignore if not authorized
 * 3. Skip webhook redeliveries
 * 4. Answer help and usage errors, or refuse while unconfigured
 * 5. Run the flow; the channel reports progress, outcome and output
 */
export async function executeCommand(ctx: CommandContext): Promise<CommandResult> {
  const { verb } = ctx.command;
  if (!RELEASE_VERBS.has(verb)) {
    return { status: "ignored" };
  }

  const channel = new GitHubCommentChannel({
    octokit: ctx.octokit,
    owner: ctx.owner,
    repo: ctx.repo,
    issueNumber: ctx.issueNumber,
    commentId: ctx.commentId,
    log: ctx.log,
  });

  const authorization = await isAuthorized(ctx);
  if (!authorization.authorized) {
    if (authorization.transientError) {
      const classification = classifyCommandFailure(authorization.transientError);
      const failureCode = buildFailureCode(verb, classification);
      await channel.react(REACTIONS.FAILURE);
      await channel.comment(buildCommandFailureReply(ctx, failureCode, classification));
      return { status: "rejected", reason: `Auth check failed: ${failureCode}` };
    }

    ctx.log.info(`Command ${verb} from unauthorized user ${ctx.senderLogin} on #${ctx.issueNumber}, ignoring`);
    return { status: "ignored" };
  }

  if (await alreadyProcessed(ctx)) {
    ctx.log.info(`Command ${verb} on comment ${ctx.commentId} already processed, skipping retry`);
    return { status: "ignored" };
  }

  const reject = async (reason: string, reply: string): Promise<CommandResult> => {
    await channel.react(REACTIONS.FAILURE);
    await channel.comment(reply);
    return { status: "rejected", reason };
  };

  const command = parseReleaseCommand(ctx.command);
  if (command.kind === "help") {
    await channel.comment(MESSAGES.usage(ctx.mention));
    return { status: "executed", message: "Posted usage" };
  }
  if (command.kind === "invalid") {
    return reject(command.reason, MESSAGES.usageError(ctx.mention, command.verb, command.reason));
  }
  if (!ctx.runner) {
    return reject(MESSAGES.NOT_CONFIGURED, MESSAGES.NOT_CONFIGURED);
  }

  ctx.log.info(
    { command: verb, owner: ctx.owner, repo: ctx.repo, issueNumber: ctx.issueNumber, senderPermission: authorization.permission },
    `Executing ${verb} from ${ctx.senderLogin} on #${ctx.issueNumber}`,
  );

  try {
    const outcome = command.kind === "env"
      ? await ctx.runner.inspectEnvironment(command, channel)
      : await ctx.runner.deploy(command, channel);
    return summarizeOutcome(outcome);
  } catch (error) {
    const classification = classifyCommandFailure(error);
    const failureCode = buildFailureCode(verb, classification);
    await channel.react(REACTIONS.FAILURE);
    await channel.comment(buildCommandFailureReply(ctx, failureCode, classification));
    ctx.log.error(
      { err: error, command: verb, issueNumber: ctx.issueNumber, failureCode, classification },
      `Command ${verb} failed [${failureCode}]`,
    );
    throw error;
  }
}
