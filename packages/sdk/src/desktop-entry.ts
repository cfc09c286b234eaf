/**
 * Builds links from desktop entry files
 */

import { readFileSync } from "node:fs";
import { parseDesktopFile, unescapeValue, splitList, parseBoolean } from "./ddparse.js";
import type { DesktopGroup, RawValue } from "./ddparse.js";
import { DesktopEntryParseError } from "./errors.js";
import { Link, environmentFlags } from "./link.js";
import type { LinkData, LinkType } from "./link.js";
import { localeSuffixes } from "./locale.js";
import { findExecutable } from "./paths.js";
import { logger } from "./observability/logs.js";
import type { Locale, LinkParser } from "./types.js";

export const DESKTOP_ENTRY_GROUP = "Desktop Entry";

export interface DesktopEntryOptions {
  /** Whether a TryExec program is available (default: search `$PATH`) */
  tryExec?: (program: string) => boolean;
}

const defaultTryExec = (program: string): boolean => findExecutable(program) !== undefined;

/**
 * Typed access to the keys of the `[Desktop Entry]` group
 */
class EntryReader {
  readonly #group: DesktopGroup;
  readonly #filePath: string;
  readonly #suffixes: string[];

  constructor(group: DesktopGroup, filePath: string, locale: Locale) {
    this.#group = group;
    this.#filePath = filePath;
    this.#suffixes = localeSuffixes(locale);
  }

  #localized(key: string): RawValue | undefined {
    for (const suffix of this.#suffixes) {
      const raw = this.#group.get(suffix === "" ? key : `${key}[${suffix}]`);
      if (raw) return raw;
    }
    return undefined;
  }

  string(key: string): string | undefined {
    const raw = this.#group.get(key);
    return raw ? unescapeValue(raw.value) : undefined;
  }

  requireString(key: string): string {
    const value = this.string(key);
    if (value === undefined || value === "") {
      throw new DesktopEntryParseError(this.#filePath, `missing required key ${key}`);
    }
    return value;
  }

  localeString(key: string): string | undefined {
    const raw = this.#localized(key);
    return raw ? unescapeValue(raw.value) : undefined;
  }

  boolean(key: string): boolean | undefined {
    const raw = this.#group.get(key);
    return raw ? parseBoolean(raw, key, this.#filePath) : undefined;
  }

  list(key: string): string[] {
    const raw = this.#group.get(key);
    return raw ? splitList(raw.value) : [];
  }

  localeList(key: string): string[] {
    const raw = this.#localized(key);
    return raw ? splitList(raw.value) : [];
  }
}

function parseType(value: string, filePath: string): LinkType {
  switch (value) {
    case "Application":
    case "Link":
    case "Directory":
      return value;
    default:
      throw new DesktopEntryParseError(filePath, `unsupported Type "${value}"`);
  }
}

/**
 * Parse desktop entry text into link data
 *
 * @throws {DesktopEntryParseError} If the text is not a usable desktop entry
 */
export function parseDesktopEntry(
  text: string,
  filePath: string,
  locale: Locale,
  options: DesktopEntryOptions = {}
): LinkData {
  const file = parseDesktopFile(text, filePath);

  const [firstGroup] = file.keys();
  const group = file.get(DESKTOP_ENTRY_GROUP);
  if (firstGroup !== DESKTOP_ENTRY_GROUP || !group) {
    throw new DesktopEntryParseError(filePath, `first group must be [${DESKTOP_ENTRY_GROUP}]`);
  }

  const reader = new EntryReader(group, filePath, locale);
  const type = parseType(reader.requireString("Type"), filePath);

  const name = reader.localeString("Name");
  if (!name) {
    throw new DesktopEntryParseError(filePath, "missing required key Name");
  }

  const tryExec = reader.string("TryExec");
  const common = {
    sourcePath: filePath,
    name,
    genericName: reader.localeString("GenericName"),
    comment: reader.localeString("Comment"),
    icon: reader.localeString("Icon"),
    noDisplay: reader.boolean("NoDisplay") ?? false,
    hidden: reader.boolean("Hidden") ?? false,
    envRequired: environmentFlags(reader.list("OnlyShowIn")),
    envRestricted: environmentFlags(reader.list("NotShowIn")),
    tryExecOk: tryExec ? (options.tryExec ?? defaultTryExec)(tryExec) : true,
  };

  switch (type) {
    case "Application":
      return {
        ...common,
        type,
        app: {
          exec: reader.requireString("Exec"),
          workingDir: reader.string("Path") || undefined,
          terminal: reader.boolean("Terminal") ?? false,
          startupNotify: reader.boolean("StartupNotify"),
          startupWmClass: reader.string("StartupWMClass") || undefined,
          categories: [...new Set(reader.list("Categories"))],
          mimeTypes: reader.list("MimeType"),
          keywords: reader.localeList("Keywords"),
        },
      };
    case "Link":
      return { ...common, type, url: reader.requireString("URL") };
    case "Directory":
      return { ...common, type };
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Default record parser: reads a desktop entry from disk
 *
 * Files that cannot be read or are malformed yield `null`; the link base
 * skips them.
 */
export class DesktopEntryParser implements LinkParser {
  readonly #options: DesktopEntryOptions;

  constructor(options: DesktopEntryOptions = {}) {
    this.#options = options;
  }

  parse(filePath: string, locale: Locale): Link | null {
    let text: string;
    try {
      text = readFileSync(filePath, "utf8");
    } catch (err) {
      if (isErrnoException(err)) {
        logger.debug("desktop.read.skip", { path: filePath, message: err.code ?? err.message });
        return null;
      }
      throw err;
    }

    try {
      return new Link(parseDesktopEntry(text, filePath, locale, this.#options));
    } catch (err) {
      if (err instanceof DesktopEntryParseError) {
        logger.debug("desktop.parse.skip", { path: filePath, message: err.message });
        return null;
      }
      throw err;
    }
  }
}
