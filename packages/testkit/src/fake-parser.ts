/**
 * Record parser stand-in: links are defined per path instead of read from disk
 */

import { Link } from "@launchdex/sdk";
import type { LinkData, LinkParser, LinkType, Locale } from "@launchdex/sdk";

export interface FakeEntry {
  type?: LinkType;
  name?: string;
  categories?: string[];
  noDisplay?: boolean;
  hidden?: boolean;
  /** Bitmask for OnlyShowIn */
  envRequired?: number;
  /** Bitmask for NotShowIn */
  envRestricted?: number;
}

/**
 * Build link data for `sourcePath`; defaults to a visible Application
 */
export function fakeLinkData(sourcePath: string, entry: FakeEntry = {}): LinkData {
  const common = {
    sourcePath,
    name: entry.name ?? posixBasename(sourcePath),
    noDisplay: entry.noDisplay ?? false,
    hidden: entry.hidden ?? false,
    envRequired: entry.envRequired ?? 0,
    envRestricted: entry.envRestricted ?? 0,
    tryExecOk: true,
  };

  switch (entry.type ?? "Application") {
    case "Application":
      return {
        ...common,
        type: "Application",
        app: {
          exec: "true",
          terminal: false,
          categories: entry.categories ?? [],
          mimeTypes: [],
          keywords: [],
        },
      };
    case "Link":
      return { ...common, type: "Link", url: "https://example.invalid/" };
    case "Directory":
      return { ...common, type: "Directory" };
  }
}

function posixBasename(filePath: string): string {
  return filePath.slice(filePath.lastIndexOf("/") + 1);
}

/**
 * Parses only the paths it was told about; every other path fails to parse
 */
export class FakeParser implements LinkParser {
  readonly parsed: Link[] = [];
  readonly locales: Locale[] = [];
  #entries = new Map<string, FakeEntry>();

  define(fullPath: string, entry: FakeEntry = {}): this {
    this.#entries.set(fullPath, entry);
    return this;
  }

  forget(fullPath: string): this {
    this.#entries.delete(fullPath);
    return this;
  }

  parse(filePath: string, locale: Locale): Link | null {
    this.locales.push(locale);
    const entry = this.#entries.get(filePath);
    if (!entry) return null;

    const link = new Link(fakeLinkData(filePath, entry));
    this.parsed.push(link);
    return link;
  }
}
