/**
 * Release Flow Errors
 *
 * Every failure a release flow can hit extends ReleaseFlowError, whose
 * `report` is the text relayed to the requester as the error attachment.
 */

export abstract class ReleaseFlowError extends Error {
  /** Text relayed back to the requester as the failure attachment. */
  abstract get report(): string;
}

/**
 * An external command exited non-zero, was killed by a signal, or could
 * not be started at all (exitCode and signal both null).
 */
export class CommandFailedError extends ReleaseFlowError {
  readonly name = "CommandFailedError";

  constructor(
    readonly argv: readonly string[],
    readonly exitCode: number | null,
    readonly output: string,
    readonly signal: NodeJS.Signals | null = null,
  ) {
    super(`Command \`${argv.join(" ")}\` ${describeExit(exitCode, signal)}`);
  }

  get report(): string {
    return this.output;
  }
}

function describeExit(exitCode: number | null, signal: NodeJS.Signals | null): string {
  if (signal) {
    return `was terminated by ${signal}`;
  }
  if (exitCode === null) {
    return "could not be started";
  }
  return `exited with status ${exitCode}`;
}

export class UnknownProjectError extends ReleaseFlowError {
  readonly name = "UnknownProjectError";

  constructor(
    readonly projectName: string,
    readonly knownProjects: readonly string[],
  ) {
    super(`Unknown project "${projectName}"`);
  }

  get report(): string {
    const known = this.knownProjects.length > 0 ? this.knownProjects.join(", ") : "(none configured)";
    return `${this.message}. Known projects: ${known}`;
  }
}

export class InvalidBranchNameError extends ReleaseFlowError {
  readonly name = "InvalidBranchNameError";

  constructor(readonly branchName: string) {
    super(`Invalid branch name "${branchName}"`);
  }

  get report(): string {
    return `${this.message}: branch names must be non-empty, contain no whitespace and not start with "-"`;
  }
}

export class ToolingNotFoundError extends ReleaseFlowError {
  readonly name = "ToolingNotFoundError";

  constructor(
    readonly projectRoot: string,
    readonly toolName: string,
    readonly searched: string,
  ) {
    super(`No "${toolName}" directory found in ${searched}`);
  }

  get report(): string {
    return this.message;
  }
}

export class AmbiguousToolingError extends ReleaseFlowError {
  readonly name = "AmbiguousToolingError";

  constructor(
    readonly projectRoot: string,
    readonly toolName: string,
    readonly candidates: readonly string[],
  ) {
    super(`Found ${candidates.length} "${toolName}" directories in ${projectRoot}`);
  }

  get report(): string {
    return [
      `${this.message}; pin one with \`toolingDirectory\` in the project configuration:`,
      ...this.candidates.map((candidate) => `- ${candidate}`),
    ].join("\n");
  }
}
