import { EventEmitter } from "node:events";
import { spawn } from "node:child_process";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildChildEnv, runCommand } from "./process-executor.js";
import { CommandFailedError } from "./errors.js";

vi.mock("node:child_process", () => ({
  spawn: vi.fn(),
}));

const mockedSpawn = vi.mocked(spawn);

function createFakeChild() {
  const child = Object.assign(new EventEmitter(), {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
  });
  mockedSpawn.mockReturnValue(child as unknown as ReturnType<typeof spawn>);
  return child;
}

describe("runCommand", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv, PATH: "/usr/bin" };
    delete process.env.ENV;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("spawns the command with its arguments in the given directory", async () => {
    const child = createFakeChild();

    const pending = runCommand(["git", "fetch", "-p"], { cwd: "/repos/myapp" });
    child.emit("close", 0, null);
    await pending;

    expect(mockedSpawn).toHaveBeenCalledWith(
      "git",
      ["fetch", "-p"],
      expect.objectContaining({ cwd: "/repos/myapp", stdio: ["ignore", "pipe", "pipe"] }),
    );
  });

  it("merges stdout and stderr in arrival order", async () => {
    const child = createFakeChild();

    const pending = runCommand(["fastlane", "env"], { cwd: "/repos/myapp" });
    child.stdout.emit("data", Buffer.from("line one\n"));
    child.stderr.emit("data", Buffer.from("warning: slow\n"));
    child.stdout.emit("data", Buffer.from("line two\n"));
    child.emit("close", 0, null);

    await expect(pending).resolves.toEqual({
      argv: ["fastlane", "env"],
      exitCode: 0,
      output: "line one\nwarning: slow\nline two\n",
    });
  });

  it("decodes multi-byte characters split across chunks", async () => {
    const child = createFakeChild();
    const encoded = Buffer.from("✅ done", "utf8");

    const pending = runCommand(["fastlane", "env"], { cwd: "/repos/myapp" });
    child.stdout.emit("data", encoded.subarray(0, 2));
    child.stdout.emit("data", encoded.subarray(2));
    child.emit("close", 0, null);

    await expect(pending).resolves.toMatchObject({ output: "✅ done" });
  });

  it("rejects with CommandFailedError carrying status and output on non-zero exit", async () => {
    const child = createFakeChild();

    const pending = runCommand(["bundle", "install"], { cwd: "/repos/myapp/ios" });
    child.stderr.emit("data", Buffer.from("Could not find gem 'fastlane'\n"));
    child.emit("close", 7, null);

    const error = await pending.catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error).toMatchObject({
      argv: ["bundle", "install"],
      exitCode: 7,
      signal: null,
      output: "Could not find gem 'fastlane'\n",
      message: "Command `bundle install` exited with status 7",
    });
  });

  it("reports termination by signal", async () => {
    const child = createFakeChild();

    const pending = runCommand(["fastlane", "deploy"], { cwd: "/repos/myapp" });
    child.emit("close", null, "SIGKILL");

    await expect(pending).rejects.toMatchObject({
      exitCode: null,
      signal: "SIGKILL",
      message: "Command `fastlane deploy` was terminated by SIGKILL",
    });
  });

  it("rejects when the binary cannot be started", async () => {
    const child = createFakeChild();

    const pending = runCommand(["fastlane", "env"], { cwd: "/repos/myapp" });
    child.emit("error", new Error("spawn fastlane ENOENT"));
    child.emit("close", -2, null);

    await expect(pending).rejects.toMatchObject({
      exitCode: null,
      output: "spawn fastlane ENOENT",
      message: "Command `fastlane env` could not be started",
    });
  });

  it("rejects an empty argument vector without spawning", async () => {
    await expect(runCommand([], { cwd: "/repos" })).rejects.toBeInstanceOf(CommandFailedError);
    expect(mockedSpawn).not.toHaveBeenCalled();
  });

  it("layers the overlay onto the child environment only", async () => {
    const child = createFakeChild();

    const pending = runCommand(["fastlane", "deploy"], { cwd: "/repos/myapp", env: { ENV: "staging" } });
    child.emit("close", 0, null);
    await pending;

    expect(mockedSpawn.mock.calls[0][2]).toEqual(
      expect.objectContaining({ env: { ...process.env, ENV: "staging" } }),
    );
    expect(process.env.ENV).toBeUndefined();
  });
});

describe("buildChildEnv", () => {
  it("lets the overlay win over inherited variables", () => {
    process.env.S3_REGION = "inherited";
    try {
      expect(buildChildEnv({ S3_REGION: "eu-west-1" }).S3_REGION).toBe("eu-west-1");
    } finally {
      delete process.env.S3_REGION;
    }
  });
});
