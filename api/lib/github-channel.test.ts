import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  GitHubCommentChannel,
  codeFence,
  formatAttachmentComment,
  truncateForComment,
  type CommentTarget,
} from "./github-channel.js";
import { SIGNATURE } from "../config.js";
import type { FlowOutcome } from "./release-runner.js";

function createMockOctokit() {
  let nextReactionId = 500;
  return {
    rest: {
      reactions: {
        createForIssueComment: vi.fn(async () => ({ data: { id: nextReactionId++ } })),
        deleteForIssueComment: vi.fn().mockResolvedValue({}),
      },
      issues: {
        createComment: vi.fn().mockResolvedValue({}),
      },
    },
  };
}

function createTarget(octokit = createMockOctokit()) {
  const target: CommentTarget = {
    octokit,
    owner: "test-org",
    repo: "mobile",
    issueNumber: 42,
    commentId: 100,
    log: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
  return { target, octokit };
}

const envSuccess: FlowOutcome = {
  status: "succeeded",
  request: { kind: "env", projectName: "myapp", branchName: "develop" },
  attachment: { name: "response-env.txt", content: "fastlane 2.220.0\n" },
};

const deployFailure: FlowOutcome = {
  status: "failed",
  request: { kind: "deploy", projectName: "myapp", branchName: "main", environment: "beta" },
  failedStep: "installing",
  error: new Error("Command `bundle install` exited with status 5"),
  attachment: { name: "error-beta.txt", content: "Could not find gem 'fastlane'" },
};

describe("formatAttachmentComment", () => {
  it("wraps successful output in a collapsible text file", () => {
    expect(formatAttachmentComment(envSuccess)).toBe(
      [
        "## 🚀 Environment report for `myapp` @ `develop`",
        "",
        "<details>",
        "<summary>response-env.txt</summary>",
        "",
        "```text",
        "fastlane 2.220.0",
        "```",
        "",
        "</details>",
      ].join("\n"),
    );
  });

  it("names the environment and the failing step for deploy failures", () => {
    expect(formatAttachmentComment(deployFailure)).toBe(
      [
        "## 💥 Deploy of `myapp` @ `main` to `beta` failed while installing dependencies",
        "",
        "<details>",
        "<summary>error-beta.txt</summary>",
        "",
        "```text",
        "Could not find gem 'fastlane'",
        "```",
        "",
        "</details>",
      ].join("\n"),
    );
  });

  it("headlines successful deploys and failed inspections", () => {
    const deployed: FlowOutcome = {
      status: "succeeded",
      request: deployFailure.request,
      attachment: { name: "response-beta.txt", content: "ok" },
    };
    const inspectFailed: FlowOutcome = {
      status: "failed",
      request: envSuccess.request,
      failedStep: "synchronizing",
      error: new Error("fetch failed"),
      attachment: { name: "error-env.txt", content: "fatal" },
    };

    expect(formatAttachmentComment(deployed).split("\n")[0]).toBe("## 🚀 Deployed `myapp` @ `main` to `beta`");
    expect(formatAttachmentComment(inspectFailed).split("\n")[0]).toBe(
      "## 💥 Environment check failed for `myapp` @ `develop` while synchronizing the branch",
    );
  });

  it("marks empty output", () => {
    const empty: FlowOutcome = { ...envSuccess, attachment: { name: "response-env.txt", content: "" } };
    expect(formatAttachmentComment(empty)).toContain("```text\n(no output)\n```");
  });

  it("keeps only the tail of oversized output", () => {
    const big: FlowOutcome = { ...envSuccess, attachment: { name: "response-env.txt", content: "abcdefghij" } };
    expect(formatAttachmentComment(big, 4)).toContain("```text\n[… 6 earlier characters omitted …]\nghij\n```");
  });
});

describe("codeFence", () => {
  it("uses three backticks for plain output", () => {
    expect(codeFence("no ticks here")).toBe("```");
  });

  it("outgrows the longest backtick run in the content", () => {
    expect(codeFence("run `a` then ```` done")).toBe("`````");
  });
});

describe("truncateForComment", () => {
  it("leaves short content untouched", () => {
    expect(truncateForComment("short", 10)).toBe("short");
  });

  it("drops the head of long content", () => {
    expect(truncateForComment("0123456789", 3)).toBe("[… 7 earlier characters omitted …]\n789");
  });
});

describe("GitHubCommentChannel", () => {
  let channel: GitHubCommentChannel;
  let target: CommentTarget;
  let octokit: ReturnType<typeof createMockOctokit>;

  beforeEach(() => {
    ({ target, octokit } = createTarget());
    channel = new GitHubCommentChannel(target);
  });

  it("reacts with eyes while a flow runs", async () => {
    await channel.markInProgress();

    expect(octokit.rest.reactions.createForIssueComment).toHaveBeenCalledWith({
      owner: "test-org",
      repo: "mobile",
      comment_id: 100,
      content: "eyes",
    });
  });

  it("replaces the eyes reaction with a rocket on success", async () => {
    await channel.markInProgress();
    await channel.markSucceeded();

    expect(octokit.rest.reactions.deleteForIssueComment).toHaveBeenCalledWith({
      owner: "test-org",
      repo: "mobile",
      comment_id: 100,
      reaction_id: 500,
    });
    expect(octokit.rest.reactions.createForIssueComment).toHaveBeenLastCalledWith(
      expect.objectContaining({ content: "rocket" }),
    );
  });

  it("replaces the eyes reaction with confused on failure", async () => {
    await channel.markInProgress();
    await channel.markFailed();

    expect(octokit.rest.reactions.deleteForIssueComment).toHaveBeenCalledTimes(1);
    expect(octokit.rest.reactions.createForIssueComment).toHaveBeenLastCalledWith(
      expect.objectContaining({ content: "confused" }),
    );
  });

  it("skips the removal when the eyes reaction was never created", async () => {
    octokit.rest.reactions.createForIssueComment.mockRejectedValueOnce(new Error("rate limited"));

    await channel.markInProgress();
    await channel.markFailed();

    expect(octokit.rest.reactions.deleteForIssueComment).not.toHaveBeenCalled();
    expect(target.log.error).toHaveBeenCalledWith(
      expect.objectContaining({ commentId: 100, content: "eyes" }),
      "Failed to add eyes reaction — continuing",
    );
  });

  it("keeps going when the eyes reaction cannot be removed", async () => {
    octokit.rest.reactions.deleteForIssueComment.mockRejectedValueOnce(new Error("not found"));

    await channel.markInProgress();
    await expect(channel.markSucceeded()).resolves.toBeUndefined();

    expect(target.log.warn).toHaveBeenCalledTimes(1);
    expect(octokit.rest.reactions.createForIssueComment).toHaveBeenLastCalledWith(
      expect.objectContaining({ content: "rocket" }),
    );
  });

  it("posts the attachment as a signed reply", async () => {
    await channel.sendAttachment(envSuccess);

    expect(octokit.rest.issues.createComment).toHaveBeenCalledWith({
      owner: "test-org",
      repo: "mobile",
      issue_number: 42,
      body: `${formatAttachmentComment(envSuccess)}${SIGNATURE}`,
    });
  });

  it("logs instead of throwing when the reply fails", async () => {
    octokit.rest.issues.createComment.mockRejectedValueOnce(new Error("boom"));

    await expect(channel.sendAttachment(envSuccess)).resolves.toBeUndefined();
    expect(target.log.error).toHaveBeenCalledWith(
      expect.objectContaining({ issue: 42 }),
      "Failed to post reply comment on #42 — continuing",
    );
  });
});
