/**
 * Priorities of watched directories
 *
 * Invariants:
 * - Priorities start at 0 and grow by one per newly registered path
 * - A path keeps its priority for the registry's lifetime; numbers are never reused
 * - Lower number = higher precedence
 */

import * as path from "node:path";
import type { PathsProvider, WatchHandler, WatchSubsystem } from "./types.js";

export const APPLICATIONS_SUBDIR = "applications";

export class PathPriorityRegistry {
  #priorities = new Map<string, number>();
  #next = 0;

  /**
   * Assign the next priority to `watchedPath`
   *
   * @returns The new priority, or undefined if the path was already registered
   */
  register(watchedPath: string): number | undefined {
    if (this.#priorities.has(watchedPath)) return undefined;
    const priority = this.#next++;
    this.#priorities.set(watchedPath, priority);
    return priority;
  }

  priorityOf(watchedPath: string): number | undefined {
    return this.#priorities.get(watchedPath);
  }

  get size(): number {
    return this.#priorities.size;
  }

  /**
   * Registered paths in priority order
   */
  paths(): string[] {
    return [...this.#priorities.keys()];
  }
}

/**
 * Register `<dir>/applications` for every data directory not seen before and
 * start watching it.
 *
 * The priority is recorded before the watch is installed: installation
 * replays existing files through `handler`, which must already be able to
 * resolve the path's priority.
 *
 * @returns The newly registered watched paths
 */
export function registerWatchedPaths(
  registry: PathPriorityRegistry,
  paths: PathsProvider,
  watch: WatchSubsystem,
  handler: WatchHandler
): string[] {
  const added: string[] = [];
  for (const dir of paths.dataDirs()) {
    const watchedPath = path.join(dir, APPLICATIONS_SUBDIR);
    if (registry.register(watchedPath) === undefined) continue;

    watch.add(watchedPath, false, handler);
    added.push(watchedPath);
  }
  return added;
}
