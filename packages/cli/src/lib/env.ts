/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the data directories to index
 * Priority: CLI option > LAUNCHDEX_DATA_DIRS env var > XDG lookup (undefined)
 */
export function resolveDataDirs(
  cliDirs?: string,
  env: NodeJS.ProcessEnv = process.env
): string[] | undefined {
  const raw = cliDirs ?? env.LAUNCHDEX_DATA_DIRS;
  if (raw === undefined) {
    return undefined;
  }

  const dirs = raw
    .split(":")
    .filter(Boolean)
    .map((dir) => path.resolve(expandTilde(dir)));
  return dirs.length > 0 ? dirs : undefined;
}

/**
 * Split an environment list such as "GNOME:Unity" or "KDE, LXDE"
 */
export function parseEnvNames(value: string): string[] {
  return value
    .split(/[:,]/)
    .map((name) => name.trim())
    .filter(Boolean);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(flag?: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  return flag === true || env.LAUNCHDEX_CLI_DEBUG === "1";
}
