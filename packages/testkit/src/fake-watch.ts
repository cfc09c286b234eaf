/**
 * In-process stand-in for the filesystem notification subsystem
 */

import { posix } from "node:path";
import type { WatchEventKind, WatchHandler, WatchSubsystem } from "@launchdex/sdk";

export interface WatchCall {
  path: string;
  recursive: boolean;
}

/**
 * Replays seeded files on `add()` like a real watch and lets tests push
 * further events with `emit()`.
 */
export class FakeWatch implements WatchSubsystem {
  readonly calls: WatchCall[] = [];
  #seeded = new Map<string, string[]>();
  #handlers = new Map<string, WatchHandler>();
  #closed = false;

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Files that already exist in `dir` when it is first watched
   */
  seed(dir: string, ...subPaths: string[]): this {
    this.#seeded.set(dir, [...(this.#seeded.get(dir) ?? []), ...subPaths]);
    return this;
  }

  add(path: string, recursive: boolean, handler: WatchHandler): void {
    this.calls.push({ path, recursive });
    this.#handlers.set(path, handler);
    for (const subPath of this.#seeded.get(path) ?? []) {
      handler({ basePath: path, subPath, fullPath: posix.join(path, subPath), kind: "added" });
    }
  }

  /**
   * Deliver one event for a watched directory
   */
  emit(kind: WatchEventKind, basePath: string, subPath: string): void {
    const handler = this.#handlers.get(basePath);
    if (!handler) {
      throw new Error(`FakeWatch: ${basePath} is not watched`);
    }
    const fullPath = subPath === "" ? basePath : posix.join(basePath, subPath);
    handler({ basePath, subPath, fullPath, kind });
  }

  close(): void {
    this.#closed = true;
  }
}
