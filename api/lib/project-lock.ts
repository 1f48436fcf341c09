/**
 * Per-project mutual exclusion.
 *
 * Every flow mutates its project's clone (fetch, reset, install), so two
 * flows on the same project must not overlap. Flows on different projects
 * run independently.
 */

import pLimit, { type LimitFunction } from "p-limit";
import { normalizeProjectName } from "./release-config.js";

export class ProjectLock {
  private readonly limits = new Map<string, LimitFunction>();

  /**
   * Run `task` once every earlier task for the same project has settled.
   */
  run<T>(projectName: string, task: () => Promise<T>): Promise<T> {
    const key = normalizeProjectName(projectName);
    let limit = this.limits.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.limits.set(key, limit);
    }
    return limit(task);
  }

  /** Tasks running or waiting for a project. */
  pending(projectName: string): number {
    const limit = this.limits.get(normalizeProjectName(projectName));
    return limit ? limit.activeCount + limit.pendingCount : 0;
  }
}
