/**
 * Desktop entry file syntax: groups of `Key[locale]=Value` lines
 *
 * Invariants:
 * - Group order follows the file; the first group is reported first
 * - The first occurrence of a key within a group wins
 * - Values are kept raw; escapes are decoded by the typed accessors
 */

import { DesktopEntryParseError } from "./errors.js";
import { logger } from "./observability/logs.js";

export interface RawValue {
  value: string;
  line: number;
}

export type DesktopGroup = Map<string, RawValue>;

/**
 * Parsed file: group name → (key, possibly with `[locale]`) → raw value
 */
export type DesktopFile = Map<string, DesktopGroup>;

const GROUP_PATTERN = /^\[([^[\]]+)\]\s*$/;
const ENTRY_PATTERN = /^([A-Za-z0-9-]+)(\[[^[\]=]+\])?\s*=\s*(.*)$/;

/**
 * Split file text into groups and entries
 */
export function parseDesktopFile(text: string, filePath: string): DesktopFile {
  const file: DesktopFile = new Map();
  let current: DesktopGroup | undefined;

  // Strip BOM if present
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const lines = cleaned.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = (lines[i] ?? "").trimStart();

    if (line === "" || line.startsWith("#")) continue;

    if (line.startsWith("[")) {
      const match = GROUP_PATTERN.exec(line);
      if (!match?.[1]) {
        throw new DesktopEntryParseError(filePath, "malformed group header", lineNo);
      }
      const name = match[1];
      if (file.has(name)) {
        throw new DesktopEntryParseError(filePath, `duplicate group "${name}"`, lineNo);
      }
      current = new Map();
      file.set(name, current);
      continue;
    }

    const match = ENTRY_PATTERN.exec(line);
    if (!match?.[1]) {
      throw new DesktopEntryParseError(filePath, "expected Key=Value", lineNo);
    }
    if (!current) {
      throw new DesktopEntryParseError(filePath, "entry outside of any group", lineNo);
    }

    const key = match[1] + (match[2] ?? "");
    if (current.has(key)) {
      logger.debug("desktop.key.duplicate", { path: filePath, message: `${key} at line ${lineNo}` });
      continue;
    }
    current.set(key, { value: (match[3] ?? "").trimEnd(), line: lineNo });
  }

  return file;
}

/**
 * Decode `\s`, `\n`, `\t`, `\r` and `\\`. With `listMode`, `\;` becomes `;`.
 * Unknown escapes are kept verbatim.
 */
export function unescapeValue(raw: string, listMode = false): string {
  let out = "";
  for (let i = 0; i < raw.length; i++) {
    const c = raw.charAt(i);
    if (c !== "\\" || i + 1 >= raw.length) {
      out += c;
      continue;
    }
    const next = raw.charAt(++i);
    switch (next) {
      case "s":
        out += " ";
        break;
      case "n":
        out += "\n";
        break;
      case "t":
        out += "\t";
        break;
      case "r":
        out += "\r";
        break;
      case "\\":
        out += "\\";
        break;
      case ";":
        out += listMode ? ";" : "\\;";
        break;
      default:
        out += c + next;
    }
  }
  return out;
}

/**
 * Split a `;`-separated list, honouring `\;`. Empty items are dropped.
 */
export function splitList(raw: string): string[] {
  const items: string[] = [];
  let start = 0;
  for (let i = 0; i < raw.length; i++) {
    const c = raw.charAt(i);
    if (c === "\\") {
      i++;
    } else if (c === ";") {
      items.push(raw.slice(start, i));
      start = i + 1;
    }
  }
  items.push(raw.slice(start));

  return items.map((item) => unescapeValue(item, true)).filter((item) => item !== "");
}

/**
 * Parse a `true`/`false` value
 */
export function parseBoolean(raw: RawValue, key: string, filePath: string): boolean {
  if (raw.value === "true") return true;
  if (raw.value === "false") return false;
  throw new DesktopEntryParseError(
    filePath,
    `${key} must be "true" or "false", got "${raw.value}"`,
    raw.line
  );
}
