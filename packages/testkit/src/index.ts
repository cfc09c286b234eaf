/**
 * Test helpers for launchdex
 */

export { createTempDir, removeDir, withTempDir, desktopEntry, writeDesktopFile } from "./fs.js";
export { FakeWatch } from "./fake-watch.js";
export type { WatchCall } from "./fake-watch.js";
export { FakeParser, fakeLinkData } from "./fake-parser.js";
export type { FakeEntry } from "./fake-parser.js";
