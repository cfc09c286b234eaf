/**
 * The link base: a live index of desktop entries across prioritized directories
 *
 * Invariants:
 * - Every stored entry list is sorted strictly ascending by priority
 * - Lists are never stored empty; the identity is deleted instead
 * - Stored lists are replaced on every mutation, never edited in place
 * - A link is in the category index under T iff it is stored in some list,
 *   is an Application and declares T
 * - Each stored entry owns exactly one reference to its link
 */

import { CategoryIndex } from "./categories.js";
import { DesktopEntryParser } from "./desktop-entry.js";
import { LinkBaseReleasedError, PathNotRegisteredError } from "./errors.js";
import { linkIdFromPath } from "./link.js";
import type { Link } from "./link.js";
import { parseLocale } from "./locale.js";
import { logger } from "./observability/logs.js";
import { LinkBaseMetrics } from "./observability/metrics.js";
import { PathPriorityRegistry, registerWatchedPaths } from "./registry.js";
import type {
  LinkBaseEntry,
  LinkBaseHandle,
  LinkBaseOptions,
  LinkBaseStats,
  LinkParser,
  Locale,
  PathsProvider,
  UpdateFunc,
  UpdateKind,
  WatchEvent,
  WatchSubsystem,
} from "./types.js";
import { DirectoryWatch } from "./watch.js";

export const DESKTOP_SUFFIX = ".desktop";

type EntryList = readonly LinkBaseEntry[];

/**
 * Link base implementation
 *
 * @example
 * ```typescript
 * const base = createLinkBase(new XdgPaths(), "en_US.UTF-8", LinkEnv.GNOME);
 *
 * base.setUpdateCallback((_base, kind, link) => {
 *   console.log(kind, link.name);
 * }, undefined);
 *
 * const office = base.lookupCategory("Office");
 * base.release();
 * ```
 */
class LinkBase implements LinkBaseHandle {
  #refs = 1;
  readonly #environments: number;
  readonly #locale: Readonly<Locale>;
  #paths: PathsProvider | undefined;
  readonly #watch: WatchSubsystem;
  readonly #parser: LinkParser;
  #base = new Map<string, EntryList>();
  #registry = new PathPriorityRegistry();
  #categories = new CategoryIndex();
  #metrics = new LinkBaseMetrics();
  #update: ((kind: UpdateKind, link: Link) => void) | undefined;

  constructor(
    paths: PathsProvider,
    locale: string,
    environments: number,
    options: LinkBaseOptions = {}
  ) {
    this.#environments = environments;
    this.#locale = Object.freeze(parseLocale(locale));
    this.#paths = paths;
    this.#parser = options.parser ?? new DesktopEntryParser();
    this.#watch = options.watch ?? new DirectoryWatch();

    const watched = this.#registerPaths(paths);
    logger.debug("linkbase.create", {
      details: { locale, environments, watched, ids: this.#base.size },
    });
  }

  get locale(): Readonly<Locale> {
    return this.#locale;
  }

  get environments(): number {
    return this.#environments;
  }

  get refCount(): number {
    return this.#refs;
  }

  retain(): void {
    this.#requireLive("retain");
    this.#refs++;
  }

  /**
   * Drop one reference. The last release unreferences every indexed link
   * once, clears the category index and closes the watch.
   */
  release(): void {
    this.#requireLive("release");
    if (--this.#refs > 0) return;

    let released = 0;
    for (const list of this.#base.values()) {
      for (const entry of list) {
        entry.link.unref();
        released++;
      }
    }
    this.#base.clear();
    this.#categories.clear();
    this.#watch.close();
    this.#paths = undefined;
    this.#update = undefined;

    logger.debug("linkbase.destroy", { details: { released } });
  }

  /**
   * Replace the change callback. Only one callback is kept.
   */
  setUpdateCallback<T>(fn: UpdateFunc<T>, data: T): void {
    this.#requireLive("setUpdateCallback");
    this.#update = (kind, link) => fn(this, kind, link, data);
  }

  clearUpdateCallback(): void {
    this.#requireLive("clearUpdateCallback");
    this.#update = undefined;
  }

  lookupCategory(category: string): Link[] {
    this.#requireLive("lookupCategory");
    return this.#categories.lookup(category);
  }

  /**
   * Entries for an identity, highest precedence first, or undefined when
   * no file with that identity is indexed
   */
  entries(id: string): EntryList | undefined {
    this.#requireLive("entries");
    return this.#base.get(id);
  }

  /**
   * The winning link for an identity
   */
  lookup(id: string): Link | undefined {
    return this.entries(id)?.[0]?.link;
  }

  ids(): string[] {
    this.#requireLive("ids");
    return [...this.#base.keys()];
  }

  categories(): string[] {
    this.#requireLive("categories");
    return this.#categories.tags();
  }

  priorityOf(watchedPath: string): number | undefined {
    this.#requireLive("priorityOf");
    return this.#registry.priorityOf(watchedPath);
  }

  /**
   * Register and watch data directories the paths provider has gained since
   * the last pass
   */
  refreshPaths(): void {
    const paths = this.#requireLive("refreshPaths");
    const watched = this.#registerPaths(paths);
    if (watched.length > 0) {
      logger.info("linkbase.paths.added", { details: { watched } });
    }
  }

  stats(): LinkBaseStats {
    this.#requireLive("stats");
    let entries = 0;
    for (const list of this.#base.values()) {
      entries += list.length;
    }
    return {
      ids: this.#base.size,
      entries,
      categories: this.#categories.size,
      watchedPaths: this.#registry.size,
      ...this.#metrics.snapshot(),
    };
  }

  #requireLive(operation: string): PathsProvider {
    if (this.#refs === 0 || !this.#paths) {
      throw new LinkBaseReleasedError(operation);
    }
    return this.#paths;
  }

  #registerPaths(paths: PathsProvider): string[] {
    return registerWatchedPaths(this.#registry, paths, this.#watch, (event) =>
      this.#handleEvent(event)
    );
  }

  /**
   * Apply one filesystem notification to the indexes
   */
  #handleEvent(event: WatchEvent): void {
    if (this.#refs === 0) {
      logger.debug("linkbase.event.released", { path: event.fullPath });
      return;
    }

    this.#metrics.recordEvent(event.kind);
    if (!event.subPath.endsWith(DESKTOP_SUFFIX)) {
      this.#metrics.recordIgnored();
      return;
    }

    const id = linkIdFromPath(event.subPath);
    const list = this.#base.get(id) ?? [];

    switch (event.kind) {
      case "self-removed":
        // Entries from the vanished directory stay indexed
        logger.debug("linkbase.self-removed", { path: event.basePath });
        break;
      case "removed":
        this.#removeEntry(id, list, event.fullPath);
        break;
      case "modified": {
        const remaining = this.#removeEntry(id, list, event.fullPath);
        if (this.#refs === 0) break;
        this.#addEntry(id, remaining, this.#priorityFor(event.basePath), event.fullPath);
        break;
      }
      case "added":
        this.#addEntry(id, list, this.#priorityFor(event.basePath), event.fullPath);
        break;
    }
  }

  #priorityFor(basePath: string): number {
    const priority = this.#registry.priorityOf(basePath);
    if (priority === undefined) {
      throw new PathNotRegisteredError(basePath);
    }
    return priority;
  }

  /**
   * Remove the entry read from `fullPath`, if it was indexed
   *
   * @returns The list now stored for `id`
   */
  #removeEntry(id: string, list: EntryList, fullPath: string): EntryList {
    const index = list.findIndex((entry) => entry.link.sourcePath === fullPath);
    // Not indexed: the file failed to parse or was hidden
    if (index === -1) return list;

    const { link } = list[index];
    this.#notify("removed", link);
    // Released from the callback: teardown has already unreferenced the entry
    if (this.#refs === 0) return [];

    if (link.type === "Application") {
      for (const category of link.categories) {
        this.#categories.remove(category, link);
      }
    }

    const next = [...list.slice(0, index), ...list.slice(index + 1)];
    link.unref();
    this.#store(id, next);

    this.#metrics.recordRemoved();
    logger.debug("linkbase.remove", { id, path: fullPath });
    return next;
  }

  /**
   * Parse `fullPath` and insert it at `priority`
   */
  #addEntry(id: string, list: EntryList, priority: number, fullPath: string): void {
    // First entry that does not take precedence over the new one
    const at = list.findIndex((entry) => entry.priority >= priority);
    if (at !== -1 && list[at].priority === priority) {
      this.#metrics.recordDuplicate();
      logger.debug("linkbase.skip.duplicate", { id, path: fullPath, details: { priority } });
      return;
    }

    const link = this.#parser.parse(fullPath, this.#locale);
    if (!link) {
      this.#metrics.recordParseFailure();
      logger.debug("linkbase.skip.parse", { id, path: fullPath });
      return;
    }

    if (!link.display(this.#environments)) {
      link.unref();
      this.#metrics.recordHidden();
      logger.debug("linkbase.skip.hidden", { id, path: fullPath });
      return;
    }

    this.#notify("added", link);
    // Released from the callback: the index is gone, drop the parser's reference
    if (this.#refs === 0) {
      link.unref();
      return;
    }

    const insertAt = at === -1 ? list.length : at;
    this.#store(id, [...list.slice(0, insertAt), { priority, link }, ...list.slice(insertAt)]);

    if (link.type === "Application") {
      for (const category of link.categories) {
        this.#categories.add(category, link);
      }
    }

    this.#metrics.recordAdded();
    logger.debug("linkbase.add", { id, path: fullPath, details: { priority } });
  }

  #store(id: string, list: EntryList): void {
    if (list.length === 0) {
      this.#base.delete(id);
    } else {
      this.#base.set(id, list);
    }
  }

  #notify(kind: UpdateKind, link: Link): void {
    if (!this.#update) return;
    try {
      this.#update(kind, link);
    } catch (err) {
      logger.error("linkbase.callback.error", {
        path: link.sourcePath,
        message: err instanceof Error ? err.message : String(err),
        details: { kind },
      });
    }
  }
}

/**
 * Create a link base over `paths`, watching `<dir>/applications` for each
 * data directory. The index is populated before this returns.
 *
 * The handle starts with one reference. The watch subsystem, whether
 * supplied or default, is closed by the last `release()`.
 *
 * @param paths - Data directories, highest precedence first
 * @param locale - Locale specifier used to pick localized strings
 * @param environments - Bitmask of active `LinkEnv` flags
 */
export function createLinkBase(
  paths: PathsProvider,
  locale: string,
  environments: number,
  options?: LinkBaseOptions
): LinkBaseHandle {
  return new LinkBase(paths, locale, environments, options);
}
