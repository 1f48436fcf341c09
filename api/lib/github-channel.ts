/**
 * GitHub Comment Channel
 *
 * ReleaseChannel backed by the comment that issued the command:
 * - in progress: 👀 reaction
 * - success: 👀 removed, 🚀 added
 * - failure: 👀 removed, 😕 added
 * - attachment: reply comment holding the output as a collapsible text file
 *
 * Delivery failures are logged and swallowed: the release itself has
 * already happened, so losing a reaction must not turn into a failed flow.
 */

import { MAX_ATTACHMENT_CHARS, REACTIONS, SIGNATURE, type ReactionContent } from "../config.js";
import type { FlowOutcome, FlowStep, ReleaseChannel } from "./release-runner.js";

/**
 * Minimal octokit surface used by the channel.
 * Probot's Context.octokit satisfies it.
 */
export interface ChannelOctokit {
  rest: {
    reactions: {
      createForIssueComment: (params: {
        owner: string;
        repo: string;
        comment_id: number;
        content: ReactionContent;
      }) => Promise<{ data: { id: number } }>;
      deleteForIssueComment: (params: {
        owner: string;
        repo: string;
        comment_id: number;
        reaction_id: number;
      }) => Promise<unknown>;
    };
    issues: {
      createComment: (params: {
        owner: string;
        repo: string;
        issue_number: number;
        body: string;
      }) => Promise<unknown>;
    };
  };
}

export interface ChannelLog {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface CommentTarget {
  octokit: ChannelOctokit;
  owner: string;
  repo: string;
  issueNumber: number;
  commentId: number;
  log: ChannelLog;
}

// ───────────────────────────────────────────────────────────────────────────────
// Attachment Formatting
// ───────────────────────────────────────────────────────────────────────────────

const STEP_LABELS: Record<FlowStep, string> = {
  resolving: "resolving the project",
  synchronizing: "synchronizing the branch",
  locating: "locating the release tooling",
  installing: "installing dependencies",
  executing: "running the release tool",
};

function buildHeading(outcome: FlowOutcome): string {
  const { request } = outcome;
  const subject = `\`${request.projectName}\` @ \`${request.branchName}\``;

  if (outcome.status === "succeeded") {
    return request.kind === "env"
      ? `## 🚀 Environment report for ${subject}`
      : `## 🚀 Deployed ${subject} to \`${request.environment}\``;
  }

  const step = STEP_LABELS[outcome.failedStep];
  return request.kind === "env"
    ? `## 💥 Environment check failed for ${subject} while ${step}`
    : `## 💥 Deploy of ${subject} to \`${request.environment}\` failed while ${step}`;
}

/**
 * Fence long enough that no backtick run inside the content can close it.
 */
export function codeFence(content: string): string {
  const longestRun = Math.max(0, ...(content.match(/`+/g) ?? []).map((run) => run.length));
  return "`".repeat(Math.max(3, longestRun + 1));
}

/**
 * Keep the tail of oversized output: failures print their cause last.
 */
export function truncateForComment(content: string, maxChars: number = MAX_ATTACHMENT_CHARS): string {
  if (content.length <= maxChars) {
    return content;
  }
  const omitted = content.length - maxChars;
  return `[… ${omitted} earlier characters omitted …]\n${content.slice(omitted)}`;
}

export function formatAttachmentComment(outcome: FlowOutcome, maxChars: number = MAX_ATTACHMENT_CHARS): string {
  const content = truncateForComment(outcome.attachment.content, maxChars) || "(no output)";
  const fence = codeFence(content);
  const body = content.endsWith("\n") ? content : `${content}\n`;

  return [
    buildHeading(outcome),
    "",
    "<details>",
    `<summary>${outcome.attachment.name}</summary>`,
    "",
    `${fence}text`,
    `${body}${fence}`,
    "",
    "</details>",
  ].join("\n");
}

// ───────────────────────────────────────────────────────────────────────────────
// Channel
// ───────────────────────────────────────────────────────────────────────────────

export class GitHubCommentChannel implements ReleaseChannel {
  private progressReactionId: number | null = null;

  constructor(private readonly target: CommentTarget) {}

  async markInProgress(): Promise<void> {
    this.progressReactionId = await this.react(REACTIONS.IN_PROGRESS);
  }

  async markSucceeded(): Promise<void> {
    await this.clearProgress();
    await this.react(REACTIONS.SUCCESS);
  }

  async markFailed(): Promise<void> {
    await this.clearProgress();
    await this.react(REACTIONS.FAILURE);
  }

  async sendAttachment(outcome: FlowOutcome): Promise<void> {
    await this.comment(formatAttachmentComment(outcome));
  }

  /**
   * Post a reply on the command's issue or pull request. SIGNATURE is
   * appended here; callers should not include it.
   */
  async comment(body: string): Promise<void> {
    const { octokit, owner, repo, issueNumber, log } = this.target;
    try {
      await octokit.rest.issues.createComment({
        owner,
        repo,
        issue_number: issueNumber,
        body: `${body}${SIGNATURE}`,
      });
    } catch (error) {
      log.error({ err: error, issue: issueNumber }, `Failed to post reply comment on #${issueNumber} — continuing`);
    }
  }

  async react(content: ReactionContent): Promise<number | null> {
    const { octokit, owner, repo, commentId, log } = this.target;
    try {
      const { data } = await octokit.rest.reactions.createForIssueComment({
        owner,
        repo,
        comment_id: commentId,
        content,
      });
      return data.id;
    } catch (error) {
      log.error({ err: error, commentId, content }, `Failed to add ${content} reaction — continuing`);
      return null;
    }
  }

  private async clearProgress(): Promise<void> {
    if (this.progressReactionId === null) {
      return;
    }
    const { octokit, owner, repo, commentId, log } = this.target;
    const reactionId = this.progressReactionId;
    this.progressReactionId = null;
    try {
      await octokit.rest.reactions.deleteForIssueComment({
        owner,
        repo,
        comment_id: commentId,
        reaction_id: reactionId,
      });
    } catch (error) {
      log.warn({ err: error, commentId, reactionId }, "Failed to remove in-progress reaction — continuing");
    }
  }
}
