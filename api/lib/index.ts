/**
 * Library exports
 *
 * Central export point for shared library code used by the scripts.
 */

// Logging
export { logger, createLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

// Errors
export {
  ReleaseFlowError,
  CommandFailedError,
  UnknownProjectError,
  InvalidBranchNameError,
  ToolingNotFoundError,
  AmbiguousToolingError,
} from "./errors.js";

// Configuration
export {
  ReleaseConfigError,
  loadReleaseConfig,
  parseReleaseConfig,
  resolveConfigPath,
  normalizeProjectName,
  getProjectRoot,
  storageEnvironment,
} from "./release-config.js";
export type { ReleaseConfig, ProjectEntry, StorageCredentials, ToolCommands } from "./release-config.js";
export { getAppConfig, getServerPort, validateEnv } from "./env-validation.js";

// Release flows
export { runCommand, buildChildEnv } from "./process-executor.js";
export type { CommandExecutor, CommandResult as ExecutionResult, RunOptions } from "./process-executor.js";
export { synchronizeBranch, ensureClone, assertValidBranchName } from "./repository-sync.js";
export type { CloneStatus } from "./repository-sync.js";
export { locateToolingDirectory, findToolingCandidates } from "./tooling-locator.js";
export { ProjectLock } from "./project-lock.js";
export { ReleaseRunner, flowLabel } from "./release-runner.js";
export type { FlowOutcome, FlowRequest, FlowStep, ReleaseChannel } from "./release-runner.js";
export { activate } from "./activation.js";
export type { ActivationResult, ProjectActivation } from "./activation.js";
