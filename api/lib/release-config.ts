/**
 * Release Configuration Loader
 *
 * Loads the bot's deployment settings from a YAML file (release-bot.yml by
 * default, or the path in RELEASE_BOT_CONFIG).
 *
 * Config hierarchy (lowest to highest priority):
 * 1. Built-in defaults (DEFAULT_TOOL, DEFAULT_DEPLOY_ENV_VAR, DEFAULT_MENTION)
 * 2. The YAML file
 * 3. Environment overrides (RELEASE_BOT_REPOS_ROOT, S3_KEY, S3_SECRET, S3_BUCKET, S3_REGION)
 *
 * The loaded object is passed explicitly to the release runner; nothing
 * reads it from module state.
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_DEPLOY_ENV_VAR,
  DEFAULT_MENTION,
  DEFAULT_TOOL,
  STORAGE_ENV_VARS,
} from "../config.js";

// ───────────────────────────────────────────────────────────────────────────────
// Types
// ───────────────────────────────────────────────────────────────────────────────

export interface ProjectEntry {
  /** Lower-cased registry key; also the clone's directory name. */
  name: string;
  url: string;
  /** Tooling directory relative to the project root, when auto-detection is ambiguous. */
  toolingDirectory?: string;
}

export interface StorageCredentials {
  key: string;
  secret: string;
  bucket: string;
  region: string;
}

export interface ToolCommands {
  /** Directory name searched for inside each clone. */
  name: string;
  install: readonly string[];
  inspect: readonly string[];
  deploy: readonly string[];
}

export interface ReleaseConfig {
  /** Absolute directory holding one clone per project. */
  reposRoot: string;
  storage: StorageCredentials;
  projects: ReadonlyMap<string, ProjectEntry>;
  tool: ToolCommands;
  deployEnvironmentVariable: string;
  mention: string;
}

export class ReleaseConfigError extends Error {
  readonly name = "ReleaseConfigError";

  constructor(
    readonly source: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid release configuration in ${source}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
  }
}

// ───────────────────────────────────────────────────────────────────────────────
// Schema
// ───────────────────────────────────────────────────────────────────────────────

const ENV_VAR_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const MENTION_NAME = /^[A-Za-z0-9][A-Za-z0-9-]*(?:\[bot\])?$/;

const commandSchema = z.array(z.string().min(1)).min(1);

const projectEntrySchema = z.union([
  z.string().min(1).transform((url) => ({ url, toolingDirectory: undefined })),
  z
    .object({
      url: z.string().min(1),
      toolingDirectory: z.string().min(1).optional(),
    })
    .strict(),
]);

const configFileSchema = z
  .object({
    reposRoot: z.string().min(1).optional(),
    storage: z
      .object({
        key: z.string().min(1).optional(),
        secret: z.string().min(1).optional(),
        bucket: z.string().min(1).optional(),
        region: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    projects: z.record(projectEntrySchema),
    tool: z
      .object({
        name: z.string().min(1).default(DEFAULT_TOOL.name),
        install: commandSchema.default([...DEFAULT_TOOL.install]),
        inspect: commandSchema.default([...DEFAULT_TOOL.inspect]),
        deploy: commandSchema.default([...DEFAULT_TOOL.deploy]),
      })
      .strict()
      .default({}),
    deployEnvironmentVariable: z
      .string()
      .regex(ENV_VAR_NAME, "must be a valid environment variable name")
      .default(DEFAULT_DEPLOY_ENV_VAR),
    mention: z
      .string()
      .regex(MENTION_NAME, "must be a GitHub login without the leading @")
      .default(DEFAULT_MENTION),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

// ───────────────────────────────────────────────────────────────────────────────
// Helpers
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Project names are matched case-insensitively.
 */
export function normalizeProjectName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Root of a project's clone: `<reposRoot>/<lower-cased name>`.
 */
export function getProjectRoot(config: Pick<ReleaseConfig, "reposRoot">, projectName: string): string {
  return path.join(config.reposRoot, normalizeProjectName(projectName));
}

/**
 * Object-storage credentials as the variables handed to every child process.
 */
export function storageEnvironment(config: Pick<ReleaseConfig, "storage">): Record<string, string> {
  return {
    [STORAGE_ENV_VARS.key]: config.storage.key,
    [STORAGE_ENV_VARS.secret]: config.storage.secret,
    [STORAGE_ENV_VARS.bucket]: config.storage.bucket,
    [STORAGE_ENV_VARS.region]: config.storage.region,
  };
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env.RELEASE_BOT_CONFIG || DEFAULT_CONFIG_PATH);
}

function formatIssuePath(issuePath: ReadonlyArray<string | number>): string {
  return issuePath.length > 0 ? issuePath.join(".") : "(root)";
}

function buildProjects(file: ConfigFile, issues: string[]): Map<string, ProjectEntry> {
  const projects = new Map<string, ProjectEntry>();

  for (const [rawName, entry] of Object.entries(file.projects)) {
    const name = normalizeProjectName(rawName);
    if (!name) {
      issues.push("projects: project names must not be empty");
      continue;
    }
    if (name.includes("/") || name.includes("\\") || name === "." || name === "..") {
      issues.push(`projects.${rawName}: project names must be a single directory name`);
      continue;
    }
    if (projects.has(name)) {
      issues.push(`projects.${rawName}: duplicates "${name}" (names are case-insensitive)`);
      continue;
    }
    projects.set(name, {
      name,
      url: entry.url,
      ...(entry.toolingDirectory ? { toolingDirectory: entry.toolingDirectory } : {}),
    });
  }

  return projects;
}

function resolveStorage(file: ConfigFile, env: NodeJS.ProcessEnv, issues: string[]): StorageCredentials {
  const pick = (field: keyof StorageCredentials): string => {
    const value = env[STORAGE_ENV_VARS[field]] || file.storage[field];
    if (!value) {
      issues.push(`storage.${field}: required (or set ${STORAGE_ENV_VARS[field]})`);
      return "";
    }
    return value;
  };

  return {
    key: pick("key"),
    secret: pick("secret"),
    bucket: pick("bucket"),
    region: pick("region"),
  };
}

// ───────────────────────────────────────────────────────────────────────────────
// Parsing & Loading
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Parse and validate configuration text.
 *
 * @throws ReleaseConfigError listing every problem found
 */
export function parseReleaseConfig(
  text: string,
  options: { source?: string; env?: NodeJS.ProcessEnv } = {},
): ReleaseConfig {
  const source = options.source ?? "release configuration";
  const env = options.env ?? process.env;

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ReleaseConfigError(source, [`YAML parse error: ${error instanceof Error ? error.message : String(error)}`]);
  }

  if (raw === undefined || raw === null) {
    throw new ReleaseConfigError(source, ["file is empty"]);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReleaseConfigError(
      source,
      parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`),
    );
  }

  const file = parsed.data;
  const issues: string[] = [];

  const reposRoot = env.RELEASE_BOT_REPOS_ROOT || file.reposRoot;
  if (!reposRoot) {
    issues.push("reposRoot: required (or set RELEASE_BOT_REPOS_ROOT)");
  }
  const storage = resolveStorage(file, env, issues);
  const projects = buildProjects(file, issues);

  if (issues.length > 0 || !reposRoot) {
    throw new ReleaseConfigError(source, issues);
  }

  return {
    reposRoot: path.resolve(reposRoot),
    storage,
    projects,
    tool: file.tool,
    deployEnvironmentVariable: file.deployEnvironmentVariable,
    mention: file.mention,
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load the configuration file.
 *
 * Returns null when the file does not exist: the bot then runs unconfigured
 * and answers commands with MESSAGES.NOT_CONFIGURED.
 *
 * @throws ReleaseConfigError when the file exists but is invalid
 */
export async function loadReleaseConfig(
  configPath: string = resolveConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<ReleaseConfig | null> {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  return parseReleaseConfig(text, { source: configPath, env });
}
