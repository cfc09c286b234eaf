/**
 * launchdex SDK
 *
 * A live, prioritized index of freedesktop desktop entries
 */

// Re-export types
export type {
  Locale,
  WatchEventKind,
  WatchEvent,
  WatchHandler,
  WatchSubsystem,
  PathsProvider,
  LinkParser,
  LinkBaseEntry,
  UpdateKind,
  UpdateFunc,
  LinkBaseHandle,
  LinkBaseOptions,
  LinkBaseStats,
} from "./types.js";

// Link base
export { createLinkBase, DESKTOP_SUFFIX } from "./link-base.js";
export { CategoryIndex } from "./categories.js";
export { PathPriorityRegistry, registerWatchedPaths, APPLICATIONS_SUBDIR } from "./registry.js";

// Records
export {
  Link,
  LinkEnv,
  LINK_ENV_NAMES,
  environmentFlags,
  environmentNames,
  isLinkEnvName,
  linkIdFromPath,
} from "./link.js";
export type { LinkEnvName, LinkType, LinkData, ApplicationInfo } from "./link.js";
export { parseLocale, localeSuffixes, formatLocale } from "./locale.js";

// Default collaborators
export { DesktopEntryParser, parseDesktopEntry, DESKTOP_ENTRY_GROUP } from "./desktop-entry.js";
export type { DesktopEntryOptions } from "./desktop-entry.js";
export { parseDesktopFile, unescapeValue, splitList } from "./ddparse.js";
export { XdgPaths, StaticPaths, findExecutable } from "./paths.js";
export { DirectoryWatch, listFilesSync, toWatchEvent } from "./watch.js";
export type { DirectoryWatchOptions } from "./watch.js";

// Configuration
export { resolveConfig, localeFromEnv, environmentsFromEnv, ConfigInputSchema } from "./config.js";
export type { ConfigInput, LinkBaseConfig } from "./config.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { LinkBaseMetrics } from "./observability/metrics.js";
export type { LinkBaseCounters } from "./observability/metrics.js";

// Errors
export {
  LaunchdexError,
  LinkBaseReleasedError,
  LinkDisposedError,
  PathNotRegisteredError,
  DesktopEntryParseError,
  ConfigError,
} from "./errors.js";

export { VERSION } from "./version.js";
