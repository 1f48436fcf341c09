import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  getProjectRoot,
  loadReleaseConfig,
  normalizeProjectName,
  parseReleaseConfig,
  ReleaseConfigError,
  resolveConfigPath,
  storageEnvironment,
} from "./release-config.js";

const VALID_YAML = `
reposRoot: /srv/repos
storage:
  key: test-key
  secret: test-secret
  bucket: test-bucket
  region: eu-west-1
projects:
  MyApp: git@example.com:acme/myapp.git
  other:
    url: git@example.com:acme/other.git
    toolingDirectory: ios
`;

function expectConfigError(text: string, env: NodeJS.ProcessEnv = {}): ReleaseConfigError {
  try {
    parseReleaseConfig(text, { env });
  } catch (error) {
    expect(error).toBeInstanceOf(ReleaseConfigError);
    return error as ReleaseConfigError;
  }
  throw new Error("expected parseReleaseConfig to throw");
}

describe("parseReleaseConfig", () => {
  it("parses a complete file and fills in tool defaults", () => {
    const config = parseReleaseConfig(VALID_YAML, { env: {} });

    expect(config.reposRoot).toBe(path.resolve("/srv/repos"));
    expect(config.storage).toEqual({
      key: "test-key",
      secret: "test-secret",
      bucket: "test-bucket",
      region: "eu-west-1",
    });
    expect(config.tool).toEqual({
      name: "fastlane",
      install: ["bundle", "install"],
      inspect: ["fastlane", "env"],
      deploy: ["fastlane", "deploy"],
    });
    expect(config.deployEnvironmentVariable).toBe("ENV");
    expect(config.mention).toBe("release-bot");
  });

  it("lower-cases project names and accepts both entry forms", () => {
    const config = parseReleaseConfig(VALID_YAML, { env: {} });

    expect([...config.projects.keys()]).toEqual(["myapp", "other"]);
    expect(config.projects.get("myapp")).toEqual({
      name: "myapp",
      url: "git@example.com:acme/myapp.git",
    });
    expect(config.projects.get("other")).toEqual({
      name: "other",
      url: "git@example.com:acme/other.git",
      toolingDirectory: "ios",
    });
  });

  it("lets environment variables override the file", () => {
    const config = parseReleaseConfig(VALID_YAML, {
      env: { RELEASE_BOT_REPOS_ROOT: "/data/clones", S3_BUCKET: "override-bucket" },
    });

    expect(config.reposRoot).toBe(path.resolve("/data/clones"));
    expect(config.storage.bucket).toBe("override-bucket");
    expect(config.storage.key).toBe("test-key");
  });

  it("takes storage and repos root entirely from the environment", () => {
    const config = parseReleaseConfig("projects: {}\n", {
      env: {
        RELEASE_BOT_REPOS_ROOT: "/data/clones",
        S3_KEY: "k",
        S3_SECRET: "s",
        S3_BUCKET: "b",
        S3_REGION: "r",
      },
    });

    expect(config.storage).toEqual({ key: "k", secret: "s", bucket: "b", region: "r" });
    expect(config.projects.size).toBe(0);
  });

  it("accepts custom tool commands and variable names", () => {
    const config = parseReleaseConfig(
      `${VALID_YAML}
tool:
  install: [bundle, install, --jobs, "4"]
deployEnvironmentVariable: FASTLANE_ENV
mention: ship-it
`,
      { env: {} },
    );

    expect(config.tool.install).toEqual(["bundle", "install", "--jobs", "4"]);
    expect(config.tool.deploy).toEqual(["fastlane", "deploy"]);
    expect(config.deployEnvironmentVariable).toBe("FASTLANE_ENV");
    expect(config.mention).toBe("ship-it");
  });

  it("reports every missing required key", () => {
    const error = expectConfigError("projects: {}\n");

    expect(error.issues).toEqual([
      "reposRoot: required (or set RELEASE_BOT_REPOS_ROOT)",
      "storage.key: required (or set S3_KEY)",
      "storage.secret: required (or set S3_SECRET)",
      "storage.bucket: required (or set S3_BUCKET)",
      "storage.region: required (or set S3_REGION)",
    ]);
  });

  it("reports schema violations with their path", () => {
    const error = expectConfigError(`${VALID_YAML}\ndeployEnvironmentVariable: "not valid"\n`);

    expect(error.issues).toEqual([
      "deployEnvironmentVariable: must be a valid environment variable name",
    ]);
  });

  it("rejects unknown keys", () => {
    const error = expectConfigError(`${VALID_YAML}\nunexpected: true\n`);
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^\(root\): Unrecognized key/);
  });

  it("rejects project names differing only in case", () => {
    const error = expectConfigError(`${VALID_YAML}  myapp: git@example.com:acme/dup.git\n`);
    expect(error.issues).toEqual([
      'projects.myapp: duplicates "myapp" (names are case-insensitive)',
    ]);
  });

  it("rejects project names that are not a single directory", () => {
    const error = expectConfigError(`${VALID_YAML}  "../escape": git@example.com:acme/x.git\n`);
    expect(error.issues).toEqual([
      "projects.../escape: project names must be a single directory name",
    ]);
  });

  it("rejects empty and malformed files", () => {
    expect(expectConfigError("").issues).toEqual(["file is empty"]);
    expect(expectConfigError("projects: [unclosed").issues[0]).toMatch(/^YAML parse error:/);
  });
});

describe("project helpers", () => {
  const config = parseReleaseConfig(VALID_YAML, { env: {} });

  it("normalizes names case-insensitively", () => {
    expect(normalizeProjectName("  MyApp ")).toBe("myapp");
  });

  it("joins the repos root with the lower-cased project name", () => {
    expect(getProjectRoot(config, "MYAPP")).toBe(path.join(path.resolve("/srv/repos"), "myapp"));
    expect(getProjectRoot(config, "other")).toBe(path.join(path.resolve("/srv/repos"), "other"));
  });

  it("exposes storage credentials as child environment variables", () => {
    expect(storageEnvironment(config)).toEqual({
      S3_KEY: "test-key",
      S3_SECRET: "test-secret",
      S3_BUCKET: "test-bucket",
      S3_REGION: "eu-west-1",
    });
  });

  it("resolves the config path from RELEASE_BOT_CONFIG", () => {
    expect(resolveConfigPath({ RELEASE_BOT_CONFIG: "/etc/release-bot.yml" })).toBe(
      path.resolve("/etc/release-bot.yml"),
    );
    expect(resolveConfigPath({})).toBe(path.resolve("release-bot.yml"));
  });
});

describe("loadReleaseConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "release-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns null when the file does not exist", async () => {
    await expect(loadReleaseConfig(path.join(dir, "missing.yml"), {})).resolves.toBeNull();
  });

  it("loads and validates an existing file", async () => {
    const file = path.join(dir, "release-bot.yml");
    await writeFile(file, VALID_YAML, "utf8");

    const config = await loadReleaseConfig(file, {});
    expect(config?.projects.size).toBe(2);
  });

  it("names the file in validation errors", async () => {
    const file = path.join(dir, "release-bot.yml");
    await writeFile(file, "projects: {}\n", "utf8");

    await expect(loadReleaseConfig(file, {})).rejects.toThrow(`Invalid release configuration in ${file}`);
  });
});
