/**
 * Tooling Locator
 *
 * Finds the directory a release command must run from: the parent of the
 * directory named after the release tool (e.g. `ios/` for `ios/fastlane/`).
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { TOOLING_SEARCH_DEPTH } from "../config.js";
import { AmbiguousToolingError, ToolingNotFoundError } from "./errors.js";

export interface LocateOptions {
  /** Project-relative directory that holds the tool directory; skips the search. */
  pinned?: string;
  /** Directory levels searched below the project root. */
  depth?: number;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * List every `toolName` directory at most `depth` levels below the root,
 * shallowest first, then in path order.
 */
export async function findToolingCandidates(
  projectRoot: string,
  toolName: string,
  depth: number = TOOLING_SEARCH_DEPTH,
): Promise<string[]> {
  const matches = await fg(`**/${fg.escapePath(toolName)}`, {
    cwd: projectRoot,
    deep: depth,
    onlyDirectories: true,
    followSymbolicLinks: false,
    dot: false,
  });

  return matches
    .sort((a, b) => a.split("/").length - b.split("/").length || a.localeCompare(b))
    .map((match) => path.dirname(path.join(projectRoot, match)));
}

/**
 * Resolve the tooling directory of a project.
 *
 * @throws ToolingNotFoundError when no tool directory exists (or the pin has none)
 * @throws AmbiguousToolingError when several exist and nothing is pinned
 */
export async function locateToolingDirectory(
  projectRoot: string,
  toolName: string,
  options: LocateOptions = {},
): Promise<string> {
  if (options.pinned) {
    const pinned = path.resolve(projectRoot, options.pinned);
    const relative = path.relative(projectRoot, pinned);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new ToolingNotFoundError(projectRoot, toolName, `${pinned} (outside the project)`);
    }
    if (!(await isDirectory(path.join(pinned, toolName)))) {
      throw new ToolingNotFoundError(projectRoot, toolName, pinned);
    }
    return pinned;
  }

  const candidates = await findToolingCandidates(projectRoot, toolName, options.depth);
  if (candidates.length === 0) {
    throw new ToolingNotFoundError(projectRoot, toolName, projectRoot);
  }
  if (candidates.length > 1) {
    throw new AmbiguousToolingError(projectRoot, toolName, candidates);
  }
  return candidates[0];
}
