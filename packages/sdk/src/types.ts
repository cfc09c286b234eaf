/**
 * Core types for launchdex
 */

import type { Link } from "./link.js";

/**
 * Components of a locale specifier such as `en_US.UTF-8@euro`
 */
export interface Locale {
  language?: string;
  country?: string;
  modifier?: string;
}

/**
 * Kind of a filesystem notification
 */
export type WatchEventKind = "added" | "modified" | "removed" | "self-removed";

/**
 * One filesystem notification for a watched directory
 */
export interface WatchEvent {
  /** The watched directory, exactly as passed to `WatchSubsystem.add` */
  basePath: string;
  /** Path of the file relative to `basePath`, `/`-separated */
  subPath: string;
  /** Absolute path of the file */
  fullPath: string;
  kind: WatchEventKind;
}

export type WatchHandler = (event: WatchEvent) => void;

/**
 * Filesystem notification source
 *
 * `add` must deliver an `added` event for every file already present in
 * `path` before it returns.
 */
export interface WatchSubsystem {
  add(path: string, recursive: boolean, handler: WatchHandler): void;
  close(): void;
}

/**
 * Ordered list of base data directories, highest precedence first
 */
export interface PathsProvider {
  dataDirs(): readonly string[];
}

/**
 * Turns a desktop entry file into a link, or `null` when the file is unusable
 */
export interface LinkParser {
  parse(filePath: string, locale: Locale): Link | null;
}

/**
 * One indexed link and the priority of the directory it was found in
 */
export interface LinkBaseEntry {
  readonly priority: number;
  readonly link: Link;
}

export type UpdateKind = "added" | "removed";

/**
 * Change callback. `data` is whatever was passed to `setUpdateCallback`.
 */
export type UpdateFunc<T> = (base: LinkBaseHandle, kind: UpdateKind, link: Link, data: T) => void;

/**
 * Public surface of a link base
 */
export interface LinkBaseHandle {
  readonly locale: Readonly<Locale>;
  readonly environments: number;
  readonly refCount: number;
  retain(): void;
  release(): void;
  setUpdateCallback<T>(fn: UpdateFunc<T>, data: T): void;
  clearUpdateCallback(): void;
  lookupCategory(category: string): Link[];
  entries(id: string): readonly LinkBaseEntry[] | undefined;
  lookup(id: string): Link | undefined;
  ids(): string[];
  categories(): string[];
  priorityOf(watchedPath: string): number | undefined;
  refreshPaths(): void;
  stats(): LinkBaseStats;
}

/**
 * Options for `createLinkBase`
 */
export interface LinkBaseOptions {
  /** Record parser (default: DesktopEntryParser) */
  parser?: LinkParser;
  /** Notification source (default: live DirectoryWatch) */
  watch?: WatchSubsystem;
}

/**
 * Snapshot returned by `LinkBase.stats()`
 */
export interface LinkBaseStats {
  ids: number;
  entries: number;
  categories: number;
  watchedPaths: number;
  events: Record<WatchEventKind, number>;
  ignored: number;
  parseFailures: number;
  hidden: number;
  duplicates: number;
  added: number;
  removed: number;
}
