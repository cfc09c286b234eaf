/**
 * Unit tests for environment resolution
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { expandTilde, isVerbose, parseEnvNames, resolveDataDirs } from "../src/lib/env.js";

describe("environment resolution", () => {
  describe("resolveDataDirs", () => {
    it("should use CLI option when provided", () => {
      const result = resolveDataDirs("/cli/a:/cli/b", { LAUNCHDEX_DATA_DIRS: "/env/path" });
      expect(result).toEqual(["/cli/a", "/cli/b"]);
    });

    it("should use LAUNCHDEX_DATA_DIRS when CLI option not provided", () => {
      expect(resolveDataDirs(undefined, { LAUNCHDEX_DATA_DIRS: "/env/path" })).toEqual(["/env/path"]);
    });

    it("should defer to the XDG lookup when neither provided", () => {
      expect(resolveDataDirs(undefined, {})).toBeUndefined();
      expect(resolveDataDirs("::", {})).toBeUndefined();
    });

    it("should resolve relative and tilde paths to absolute", () => {
      expect(resolveDataDirs("share:~/data", {})).toEqual([
        path.resolve("share"),
        path.join(homedir(), "data"),
      ]);
    });
  });

  describe("expandTilde", () => {
    it("should expand a bare tilde and tilde prefixes", () => {
      expect(expandTilde("~")).toBe(homedir());
      expect(expandTilde("~/x")).toBe(path.join(homedir(), "x"));
    });

    it("should leave other paths alone", () => {
      expect(expandTilde("~user/x")).toBe("~user/x");
      expect(expandTilde("/abs/~")).toBe("/abs/~");
    });
  });

  describe("parseEnvNames", () => {
    it("should split on colons and commas", () => {
      expect(parseEnvNames("GNOME:Unity")).toEqual(["GNOME", "Unity"]);
      expect(parseEnvNames(" KDE , LXDE ")).toEqual(["KDE", "LXDE"]);
      expect(parseEnvNames("")).toEqual([]);
    });
  });

  describe("isVerbose", () => {
    it("should honour the flag and LAUNCHDEX_CLI_DEBUG", () => {
      expect(isVerbose(true, {})).toBe(true);
      expect(isVerbose(undefined, { LAUNCHDEX_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose(undefined, { LAUNCHDEX_CLI_DEBUG: "0" })).toBe(false);
      expect(isVerbose(false, {})).toBe(false);
    });
  });
});
