/**
 * Release Runner
 *
 * Orchestrates one release flow:
 *
 *   Start → Synchronizing → Locating → InstallingDependencies → Executing
 *         → Reporting{Success|Failure} → Done
 *
 * The first failing step short-circuits to Reporting{Failure}. There are no
 * retries and no rollback: a clone left mid-sync is repaired by the forced
 * resync at the start of the next flow.
 *
 * Each flow emits, through its ReleaseChannel, exactly one in-progress
 * signal, exactly one terminal signal and exactly one attachment.
 */

import { artifactName } from "../config.js";
import { ReleaseFlowError, UnknownProjectError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { runCommand, type CommandExecutor } from "./process-executor.js";
import { ProjectLock } from "./project-lock.js";
import {
  getProjectRoot,
  normalizeProjectName,
  storageEnvironment,
  type ProjectEntry,
  type ReleaseConfig,
} from "./release-config.js";
import { synchronizeBranch } from "./repository-sync.js";
import { locateToolingDirectory } from "./tooling-locator.js";

// ───────────────────────────────────────────────────────────────────────────────
// Types
// ───────────────────────────────────────────────────────────────────────────────

export interface InspectRequest {
  kind: "env";
  projectName: string;
  branchName: string;
}

export interface DeployRequest {
  kind: "deploy";
  projectName: string;
  branchName: string;
  environment: string;
}

export type FlowRequest = InspectRequest | DeployRequest;

export type FlowStep = "resolving" | "synchronizing" | "locating" | "installing" | "executing";

export interface Attachment {
  name: string;
  content: string;
}

export type FlowOutcome =
  | { status: "succeeded"; request: FlowRequest; attachment: Attachment }
  | { status: "failed"; request: FlowRequest; attachment: Attachment; failedStep: FlowStep; error: Error };

/**
 * Where a flow reports progress. Implementations handle their own delivery
 * failures; the runner does not retry signals.
 */
export interface ReleaseChannel {
  markInProgress(): Promise<void>;
  markSucceeded(): Promise<void>;
  markFailed(): Promise<void>;
  sendAttachment(outcome: FlowOutcome): Promise<void>;
}

export interface ReleaseRunnerDeps {
  config: ReleaseConfig;
  exec?: CommandExecutor;
  synchronize?: typeof synchronizeBranch;
  locate?: typeof locateToolingDirectory;
  lock?: ProjectLock;
  /** Defaults to a console/Actions logger scoped to the project. */
  logger?: Logger;
}

// ───────────────────────────────────────────────────────────────────────────────
// Runner
// ───────────────────────────────────────────────────────────────────────────────

/** Label used in artifact names: "env" for inspection, the target for deploys. */
export function flowLabel(request: FlowRequest): string {
  return request.kind === "env" ? "env" : request.environment;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class ReleaseRunner {
  private readonly config: ReleaseConfig;
  private readonly exec: CommandExecutor;
  private readonly synchronize: typeof synchronizeBranch;
  private readonly locate: typeof locateToolingDirectory;
  private readonly lock: ProjectLock;

  constructor(private readonly deps: ReleaseRunnerDeps) {
    this.config = deps.config;
    this.exec = deps.exec ?? runCommand;
    this.synchronize = deps.synchronize ?? synchronizeBranch;
    this.locate = deps.locate ?? locateToolingDirectory;
    this.lock = deps.lock ?? new ProjectLock();
  }

  get knownProjects(): string[] {
    return [...this.config.projects.keys()];
  }

  /**
   * @throws UnknownProjectError for names missing from the registry
   */
  resolveProject(projectName: string): ProjectEntry {
    const entry = this.config.projects.get(normalizeProjectName(projectName));
    if (!entry) {
      throw new UnknownProjectError(normalizeProjectName(projectName), this.knownProjects);
    }
    return entry;
  }

  /**
   * Local clone directory of a registered project.
   *
   * @throws UnknownProjectError for names missing from the registry
   */
  getProjectRoot(projectName: string): string {
    return getProjectRoot(this.config, this.resolveProject(projectName).name);
  }

  /** Run the release tool's describe-environment action on a branch. */
  inspectEnvironment(
    params: { projectName: string; branchName: string },
    channel: ReleaseChannel,
  ): Promise<FlowOutcome> {
    return this.run({ kind: "env", ...params }, channel);
  }

  /** Run the release tool's deployment action on a branch for one environment. */
  deploy(
    params: { projectName: string; branchName: string; environment: string },
    channel: ReleaseChannel,
  ): Promise<FlowOutcome> {
    return this.run({ kind: "deploy", ...params }, channel);
  }

  async run(request: FlowRequest, channel: ReleaseChannel): Promise<FlowOutcome> {
    await channel.markInProgress();

    const outcome = await this.lock.run(request.projectName, () => this.execute(request));

    if (outcome.status === "succeeded") {
      await channel.markSucceeded();
    } else {
      await channel.markFailed();
    }
    await channel.sendAttachment(outcome);

    return outcome;
  }

  /**
   * Variables every child process of the flow receives: the storage
   * credentials, plus the deployment target for deploy flows. Scoped to the
   * flow's own children; process.env is left untouched.
   */
  flowEnvironment(request: FlowRequest): Record<string, string> {
    const env = storageEnvironment(this.config);
    if (request.kind === "deploy") {
      env[this.config.deployEnvironmentVariable] = request.environment;
    }
    return env;
  }

  private async execute(request: FlowRequest): Promise<FlowOutcome> {
    const log = this.deps.logger ?? createLogger({ scope: normalizeProjectName(request.projectName) });
    const label = flowLabel(request);
    const env = this.flowEnvironment(request);
    const { tool } = this.config;
    let step: FlowStep = "resolving";

    try {
      const project = this.resolveProject(request.projectName);
      const projectRoot = getProjectRoot(this.config, project.name);

      step = "synchronizing";
      log.info(`Synchronizing ${projectRoot} to origin/${request.branchName}`);
      await this.synchronize(projectRoot, request.branchName, { exec: this.exec, env });

      step = "locating";
      const toolingDirectory = await this.locate(projectRoot, tool.name, { pinned: project.toolingDirectory });
      log.debug(`Using tooling directory ${toolingDirectory}`);

      step = "installing";
      log.info(`Installing dependencies: ${tool.install.join(" ")}`);
      await this.exec(tool.install, { cwd: toolingDirectory, env });

      step = "executing";
      const action = request.kind === "env" ? tool.inspect : tool.deploy;
      log.info(`Running ${action.join(" ")}${request.kind === "deploy" ? ` for ${request.environment}` : ""}`);
      const result = await this.exec(action, { cwd: toolingDirectory, env });

      log.info(`${request.kind} flow finished`);
      return {
        status: "succeeded",
        request,
        attachment: { name: artifactName("response", label), content: result.output },
      };
    } catch (caught) {
      const error = toError(caught);
      const report = error instanceof ReleaseFlowError ? error.report : error.message;
      log.error(`${request.kind} flow failed while ${step}`, error);
      if (report) {
        log.debug(report);
      }
      return {
        status: "failed",
        request,
        failedStep: step,
        error,
        attachment: { name: artifactName("error", label), content: report },
      };
    }
  }
}
