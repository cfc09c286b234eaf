/**
 * File system test utilities
 */

import { mkdtemp, rm, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "launchdex-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "launchdex-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Build desktop entry text from key/value pairs, in insertion order
 * @param fields - Keys (optionally with `[locale]`) and raw values
 * @param group - Group header (default: "Desktop Entry")
 */
export function desktopEntry(fields: Record<string, string>, group = "Desktop Entry"): string {
  const lines = [`[${group}]`];
  for (const [key, value] of Object.entries(fields)) {
    lines.push(`${key}=${value}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Write a desktop file under `<dataDir>/applications/`
 * @returns Absolute path of the written file
 */
export async function writeDesktopFile(
  dataDir: string,
  subPath: string,
  content: string
): Promise<string> {
  const filePath = join(dataDir, "applications", subPath);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf8");
  return filePath;
}
