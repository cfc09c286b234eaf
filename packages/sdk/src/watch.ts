/**
 * Directory watching on top of chokidar
 *
 * `add()` replays the files already present as `added` events before it
 * returns, then hands live changes to the same handler.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { watch as chokidarWatch, type FSWatcher } from "chokidar";
import { logger } from "./observability/logs.js";
import type { WatchEvent, WatchEventKind, WatchHandler, WatchSubsystem } from "./types.js";

export interface DirectoryWatchOptions {
  /**
   * Keep watching after the initial replay (default: true).
   * With `false` the watch is a one-shot snapshot.
   */
  live?: boolean;
}

function hasUnknownType(entry: fs.Dirent): boolean {
  return !(
    entry.isFile() ||
    entry.isDirectory() ||
    entry.isSymbolicLink() ||
    entry.isBlockDevice() ||
    entry.isCharacterDevice() ||
    entry.isFIFO() ||
    entry.isSocket()
  );
}

/**
 * Classify a directory entry. Symlinks to files count as files, as chokidar
 * reports them; symlinked directories are not descended into.
 */
function entryKind(fullPath: string, entry: fs.Dirent): "file" | "directory" | undefined {
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "directory";
  if (!entry.isSymbolicLink() && !hasUnknownType(entry)) return undefined;

  let stats: fs.Stats;
  try {
    stats = fs.statSync(fullPath);
  } catch (err) {
    logger.debug("watch.replay.dangling", {
      path: fullPath,
      message: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }

  if (stats.isFile()) return "file";
  if (stats.isDirectory() && !entry.isSymbolicLink()) return "directory";
  return undefined;
}

/**
 * List regular files below `dir`, relative and `/`-separated, sorted by name.
 * A missing or unreadable directory lists as empty.
 */
export function listFilesSync(dir: string, recursive: boolean): string[] {
  const out: string[] = [];

  const walk = (relDir: string): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(path.join(dir, relDir), { withFileTypes: true });
    } catch (err) {
      const code = err instanceof Error && "code" in err ? String(err.code) : undefined;
      if (code === "ENOENT" || code === "ENOTDIR") {
        logger.debug("watch.replay.missing", { path: path.join(dir, relDir) });
      } else {
        logger.warn("watch.replay.error", {
          path: path.join(dir, relDir),
          message: err instanceof Error ? err.message : String(err),
        });
      }
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const rel = relDir === "" ? entry.name : `${relDir}/${entry.name}`;
      const kind = entryKind(path.join(dir, rel), entry);
      if (kind === "file") {
        out.push(rel);
      } else if (recursive && kind === "directory") {
        walk(rel);
      }
    }
  };

  walk("");
  return out;
}

/**
 * Build the event for a path reported under a watched directory
 */
export function toWatchEvent(basePath: string, kind: WatchEventKind, filePath: string): WatchEvent {
  const fullPath = path.resolve(basePath, filePath);
  const subPath = path.relative(basePath, fullPath).split(path.sep).join("/");
  return { basePath, subPath, fullPath, kind };
}

export class DirectoryWatch implements WatchSubsystem {
  readonly #live: boolean;
  #watchers: FSWatcher[] = [];
  #ready: Promise<void>[] = [];
  #closed = false;

  constructor(options: DirectoryWatchOptions = {}) {
    this.#live = options.live ?? true;
  }

  get closed(): boolean {
    return this.#closed;
  }

  add(dirPath: string, recursive: boolean, handler: WatchHandler): void {
    if (this.#closed) {
      throw new Error(`Cannot watch ${dirPath}: watch is closed`);
    }

    for (const subPath of listFilesSync(dirPath, recursive)) {
      handler(toWatchEvent(dirPath, "added", subPath));
    }

    if (!this.#live) return;

    const watcher = chokidarWatch(dirPath, {
      ignoreInitial: true,
      persistent: true,
      ...(recursive ? {} : { depth: 0 }),
    });

    this.#ready.push(
      new Promise<void>((resolve) => {
        watcher.once("ready", () => resolve());
      })
    );

    const dispatch = (kind: WatchEventKind, filePath: string): void => {
      try {
        handler(toWatchEvent(dirPath, kind, filePath));
      } catch (err) {
        logger.error("watch.handler.error", {
          path: filePath,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    };

    watcher.on("add", (filePath: string) => dispatch("added", filePath));
    watcher.on("change", (filePath: string) => dispatch("modified", filePath));
    watcher.on("unlink", (filePath: string) => dispatch("removed", filePath));
    watcher.on("unlinkDir", (dir: string) => {
      if (path.resolve(dir) === path.resolve(dirPath)) {
        dispatch("self-removed", dirPath);
      }
    });
    watcher.on("error", (err: unknown) => {
      logger.warn("watch.error", {
        path: dirPath,
        message: err instanceof Error ? err.message : String(err),
      });
    });

    this.#watchers.push(watcher);
    logger.debug("watch.add", { path: dirPath, details: { recursive } });
  }

  /**
   * Resolves once every live watcher has finished its initial scan; changes
   * made before that may be taken for existing files and not reported.
   */
  async ready(): Promise<void> {
    await Promise.all(this.#ready);
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    for (const watcher of this.#watchers) {
      watcher.close().catch((err: unknown) => {
        logger.warn("watch.close.error", {
          message: err instanceof Error ? err.message : String(err),
        });
      });
    }
    this.#watchers = [];
    this.#ready = [];
  }
}
