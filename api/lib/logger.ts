/**
 * Logging Abstraction
 *
 * Release flows run both inside the webhook server and inside the clone
 * bootstrap script, which is usually executed by a GitHub Actions job.
 * Actions runs get @actions/core annotations; everything else logs to the
 * console.
 */

import * as core from "@actions/core";

const isGitHubActions = (): boolean => {
  return process.env.GITHUB_ACTIONS === "true";
};

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
  debug(message: string): void;
  group(name: string): void;
  groupEnd(): void;
}

export interface LoggerOptions {
  /** Prepended as `[scope]` to every line, e.g. the project a flow runs for. */
  scope?: string;
}

function prefixed(scope: string | undefined, message: string): string {
  return scope ? `[${scope}] ${message}` : message;
}

class ActionsLogger implements Logger {
  constructor(private readonly scope?: string) {}

  info(message: string): void {
    core.info(prefixed(this.scope, message));
  }

  warn(message: string): void {
    core.warning(prefixed(this.scope, message));
  }

  error(message: string, error?: Error): void {
    const line = prefixed(this.scope, message);
    if (!error) {
      core.error(line);
      return;
    }
    core.error(`${line}: ${error.message}`);
    if (error.stack) {
      core.debug(error.stack);
    }
  }

  debug(message: string): void {
    core.debug(prefixed(this.scope, message));
  }

  group(name: string): void {
    core.startGroup(prefixed(this.scope, name));
  }

  groupEnd(): void {
    core.endGroup();
  }
}

class ConsoleLogger implements Logger {
  constructor(private readonly scope?: string) {}

  info(message: string): void {
    console.log(prefixed(this.scope, message));
  }

  warn(message: string): void {
    console.warn(`⚠️  ${prefixed(this.scope, message)}`);
  }

  error(message: string, error?: Error): void {
    const line = `❌ ${prefixed(this.scope, message)}`;
    if (error) {
      console.error(`${line}:`, error);
    } else {
      console.error(line);
    }
  }

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(`🔍 ${prefixed(this.scope, message)}`);
    }
  }

  group(name: string): void {
    console.group(prefixed(this.scope, name));
  }

  groupEnd(): void {
    console.groupEnd();
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return isGitHubActions() ? new ActionsLogger(options.scope) : new ConsoleLogger(options.scope);
}

/**
 * Default logger instance
 */
export const logger = createLogger();
