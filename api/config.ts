/**
 * Release Relay Bot Configuration
 *
 * Shared constants for the webhook handler, the release runner and the
 * setup scripts. Per-deployment settings (projects, credentials, repository
 * root) live in the YAML file loaded by lib/release-config.ts.
 */

// ───────────────────────────────────────────────────────────────────────────────
// Identity
// ───────────────────────────────────────────────────────────────────────────────

export const BOT_NAME = "release-relay";

/** Mention the command parser answers to when the config file sets none. */
export const DEFAULT_MENTION = "release-bot";

/** Appended to every reply comment so bot output is recognizable. */
export const SIGNATURE = "\n\n---\n<sub>🚀 release-relay</sub>";

// ───────────────────────────────────────────────────────────────────────────────
// Release Tool Defaults
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Commands run inside the tooling directory. Each entry is an argument
 * vector; the first element is resolved from PATH.
 */
export const DEFAULT_TOOL = {
  name: "fastlane",
  install: ["bundle", "install"],
  inspect: ["fastlane", "env"],
  deploy: ["fastlane", "deploy"],
} as const;

/** Variable the release tool reads to pick the deployment target. */
export const DEFAULT_DEPLOY_ENV_VAR = "ENV";

/** Directory levels below the project root searched for the tool directory. */
export const TOOLING_SEARCH_DEPTH = 2;

/** Variables carrying the object-storage credentials to child processes. */
export const STORAGE_ENV_VARS = {
  key: "S3_KEY",
  secret: "S3_SECRET",
  bucket: "S3_BUCKET",
  region: "S3_REGION",
} as const;

export const DEFAULT_CONFIG_PATH = "release-bot.yml";

// ───────────────────────────────────────────────────────────────────────────────
// Chat Signals
// ───────────────────────────────────────────────────────────────────────────────

export type ReactionContent =
  | "+1"
  | "-1"
  | "laugh"
  | "confused"
  | "heart"
  | "hooray"
  | "rocket"
  | "eyes";

export const REACTIONS = {
  IN_PROGRESS: "eyes",
  SUCCESS: "rocket",
  FAILURE: "confused",
} as const satisfies Record<string, ReactionContent>;

/**
 * GitHub rejects comment bodies above 65536 characters. The budget leaves
 * room for the heading, the details wrapper and the signature.
 */
export const MAX_ATTACHMENT_CHARS = 60_000;

// ───────────────────────────────────────────────────────────────────────────────
// Artifact Names
// ───────────────────────────────────────────────────────────────────────────────

export type FlowKind = "env" | "deploy";

/**
 * Name of the text file relayed back to the requester.
 * The inspect flow always uses "env"; the deploy flow uses the target.
 */
export function artifactName(outcome: "response" | "error", label: string): string {
  return `${outcome}-${label}.txt`;
}

// ───────────────────────────────────────────────────────────────────────────────
// Messages
// ───────────────────────────────────────────────────────────────────────────────

function usageText(mention: string): string {
  return [
    "## 🚀 Release commands",
    "",
    "```",
    `@${mention} env --project-name <name> --branch-name <branch>`,
    `@${mention} deploy --project-name <name> --branch-name <branch> --environment <env>`,
    `@${mention} help`,
    "```",
  ].join("\n");
}

export const MESSAGES = {
  NOT_CONFIGURED: "Release bot is not configured, please do so.",

  usage: usageText,

  usageError: (mention: string, verb: string, detail: string) => [
    `## 🚀 Could not read \`${verb}\``,
    "",
    detail,
    "",
    usageText(mention),
  ].join("\n"),
} as const;
