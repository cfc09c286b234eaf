/**
 * XDG base directory resolution and executable lookup
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { homedir } from "node:os";
import type { PathsProvider } from "./types.js";

const DEFAULT_DATA_DIRS = ["/usr/local/share", "/usr/share"];

/**
 * Split a `:`-separated list, keeping absolute entries only
 */
function splitPathList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(":").filter((entry) => entry !== "" && path.isAbsolute(entry));
}

function dedupe(dirs: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const dir of dirs) {
    const normalized = path.normalize(dir).replace(/(.)\/+$/, "$1");
    if (!seen.has(normalized)) {
      seen.add(normalized);
      out.push(normalized);
    }
  }
  return out;
}

/**
 * Data directories per the XDG base directory specification
 *
 * `dataDirs()` lists `$XDG_DATA_HOME` first, then `$XDG_DATA_DIRS`.
 */
export class XdgPaths implements PathsProvider {
  readonly dataHome: string;
  readonly #dataDirs: readonly string[];

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const home = env.HOME || homedir();
    const dataHome = env.XDG_DATA_HOME;
    this.dataHome =
      dataHome && path.isAbsolute(dataHome) ? dataHome : path.join(home, ".local", "share");

    const systemDirs = splitPathList(env.XDG_DATA_DIRS);
    this.#dataDirs = dedupe([
      this.dataHome,
      ...(systemDirs.length > 0 ? systemDirs : DEFAULT_DATA_DIRS),
    ]);
  }

  dataDirs(): readonly string[] {
    return this.#dataDirs;
  }
}

/**
 * A fixed list of data directories
 */
export class StaticPaths implements PathsProvider {
  readonly #dirs: readonly string[];

  constructor(dirs: readonly string[]) {
    this.#dirs = dedupe(dirs.map((dir) => path.resolve(dir)));
  }

  dataDirs(): readonly string[] {
    return this.#dirs;
  }
}

function isExecutableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) return false;
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a program name the way a shell would: absolute paths are checked
 * directly, bare names are searched on `$PATH`.
 *
 * @returns The executable's path, or undefined when none is found
 */
export function findExecutable(
  program: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (program === "") return undefined;

  if (path.isAbsolute(program)) {
    return isExecutableFile(program) ? program : undefined;
  }

  for (const dir of splitPathList(env.PATH)) {
    const candidate = path.join(dir, program);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}
