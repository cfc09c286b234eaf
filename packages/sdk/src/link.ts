/**
 * Parsed launcher records
 *
 * Links are reference counted: the parser hands out a link holding one
 * reference, each owner calls `ref()` to share it and `unref()` when done.
 */

import { LinkDisposedError } from "./errors.js";

/**
 * Desktop environments a link can be restricted to, one bit each
 */
export const LinkEnv = {
  GNOME: 1 << 0,
  KDE: 1 << 1,
  LXDE: 1 << 2,
  MATE: 1 << 3,
  Razor: 1 << 4,
  ROX: 1 << 5,
  TDE: 1 << 6,
  Unity: 1 << 7,
  XFCE: 1 << 8,
  EDE: 1 << 9,
  Cinnamon: 1 << 10,
  Old: 1 << 11,
} as const;

export type LinkEnvName = keyof typeof LinkEnv;

export function isLinkEnvName(name: string): name is LinkEnvName {
  return Object.prototype.hasOwnProperty.call(LinkEnv, name);
}

export const LINK_ENV_NAMES: readonly LinkEnvName[] = Object.keys(LinkEnv).filter(isLinkEnvName);

/**
 * Fold environment names into a bitmask, ignoring unknown names
 */
export function environmentFlags(names: Iterable<string>): number {
  let flags = 0;
  for (const name of names) {
    if (isLinkEnvName(name)) {
      flags |= LinkEnv[name];
    }
  }
  return flags;
}

/**
 * Names of the environments set in a bitmask
 */
export function environmentNames(flags: number): LinkEnvName[] {
  return LINK_ENV_NAMES.filter((name) => (flags & LinkEnv[name]) !== 0);
}

export type LinkType = "Application" | "Link" | "Directory";

export interface ApplicationInfo {
  exec: string;
  workingDir?: string;
  terminal: boolean;
  /** Unset when the entry does not say */
  startupNotify?: boolean;
  startupWmClass?: string;
  categories: readonly string[];
  mimeTypes: readonly string[];
  keywords: readonly string[];
}

interface LinkCommon {
  sourcePath: string;
  name: string;
  genericName?: string;
  comment?: string;
  icon?: string;
  noDisplay: boolean;
  hidden: boolean;
  /** Bitmask from OnlyShowIn; 0 means no requirement */
  envRequired: number;
  /** Bitmask from NotShowIn */
  envRestricted: number;
  /** False when TryExec named a program that could not be found */
  tryExecOk: boolean;
}

export type LinkData = LinkCommon &
  (
    | { type: "Application"; app: ApplicationInfo }
    | { type: "Link"; url: string }
    | { type: "Directory" }
  );

const NO_CATEGORIES: readonly string[] = Object.freeze([]);

export class Link {
  readonly data: Readonly<LinkData>;
  #refs = 1;

  constructor(data: LinkData) {
    this.data = Object.freeze({ ...data });
  }

  get type(): LinkType {
    return this.data.type;
  }

  get sourcePath(): string {
    return this.data.sourcePath;
  }

  get name(): string {
    return this.data.name;
  }

  /**
   * Declared categories; always empty for non-Application links
   */
  get categories(): readonly string[] {
    return this.data.type === "Application" ? this.data.app.categories : NO_CATEGORIES;
  }

  get app(): ApplicationInfo | undefined {
    return this.data.type === "Application" ? this.data.app : undefined;
  }

  get url(): string | undefined {
    return this.data.type === "Link" ? this.data.url : undefined;
  }

  get refCount(): number {
    return this.#refs;
  }

  get disposed(): boolean {
    return this.#refs === 0;
  }

  ref(): this {
    if (this.#refs === 0) {
      throw new LinkDisposedError(this.data.sourcePath, "Link already disposed");
    }
    this.#refs++;
    return this;
  }

  unref(): void {
    if (this.#refs === 0) {
      throw new LinkDisposedError(this.data.sourcePath, "Link unreferenced too many times");
    }
    this.#refs--;
  }

  /**
   * Whether the link should be shown when `environments` are active
   */
  display(environments: number): boolean {
    const { hidden, noDisplay, tryExecOk, envRequired, envRestricted } = this.data;
    if (hidden || noDisplay || !tryExecOk) return false;
    if (envRequired !== 0 && (envRequired & environments) === 0) return false;
    if ((envRestricted & environments) !== 0) return false;
    return true;
  }
}

/**
 * Desktop file id: the path relative to its base directory with `/` turned into `-`
 */
export function linkIdFromPath(subPath: string): string {
  return subPath.split("/").filter(Boolean).join("-");
}
