/**
 * Shared Script Entry
 *
 * Entry point guard and fatal-error reporting for scripts run with tsx,
 * locally or from a GitHub Actions job.
 */

import * as core from "@actions/core";

/**
 * Report a fatal error the way Actions expects and exit non-zero.
 */
export function failAndExit(message: string): never {
  core.setFailed(message);
  process.exit(1);
}

/**
 * Runs main() only when the script is executed directly (not imported for testing).
 *
 * @param callerUrl - Pass `import.meta.url` from the calling module
 */
export function runIfMain(callerUrl: string, main: () => Promise<void>): void {
  const entryUrl = process.argv[1] ? new URL(process.argv[1], "file://").href : "";
  if (callerUrl === entryUrl) {
    main().catch((error: unknown) => {
      failAndExit(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
    });
  }
}
