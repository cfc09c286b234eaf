/**
 * Integration tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as path from "node:path";
import { createLinkBase, StaticPaths, VERSION } from "@launchdex/sdk";
import {
  createTempDir,
  desktopEntry,
  FakeParser,
  FakeWatch,
  removeDir,
  writeDesktopFile,
} from "@launchdex/testkit";
import type { BaseOpener } from "../src/lib/base.js";
import { runCli } from "./helpers.js";

describe("CLI", () => {
  let root: string;
  let home: string;
  let usr: string;
  let globals: string[];

  beforeEach(async () => {
    root = await createTempDir();
    home = path.join(root, "home");
    usr = path.join(root, "usr");
    globals = ["--data-dirs", `${home}:${usr}`, "--locale", "C", "--env", "GNOME"];

    await writeDesktopFile(
      home,
      "calc.desktop",
      desktopEntry({ Type: "Application", Name: "My Calculator", Exec: "calc", Categories: "Utility;" })
    );
    await writeDesktopFile(
      usr,
      "calc.desktop",
      desktopEntry({
        Type: "Application",
        Name: "Calculator",
        "Name[sv]": "Kalkylator",
        Exec: "calc",
        Categories: "Utility;Office;",
      })
    );
    await writeDesktopFile(
      usr,
      "writer.desktop",
      desktopEntry({ Type: "Application", Name: "Writer", Exec: "writer", Categories: "Office;" })
    );
    await writeDesktopFile(usr, "broken.desktop", "not a desktop entry\n");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function appPath(dataDir: string, name: string): string {
    return path.join(dataDir, "applications", name);
  }

  describe("list", () => {
    it("should list the winning link of each identity", async () => {
      const result = await runCli([...globals, "list"]);

      expect(result.exitCode).toBe(0);
      const lines = result.stdout.trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toBe(`calc.desktop    My Calculator  ${appPath(home, "calc.desktop")}`);
      expect(lines[1]).toBe(`writer.desktop  Writer         ${appPath(usr, "writer.desktop")}`);
    });

    it("should output JSON", async () => {
      const result = await runCli([...globals, "list", "--json"]);

      expect(JSON.parse(result.stdout)).toEqual([
        {
          id: "calc.desktop",
          name: "My Calculator",
          type: "Application",
          priority: 0,
          path: appPath(home, "calc.desktop"),
        },
        {
          id: "writer.desktop",
          name: "Writer",
          type: "Application",
          priority: 1,
          path: appPath(usr, "writer.desktop"),
        },
      ]);
    });

    it("should list every member of a category", async () => {
      const result = await runCli([...globals, "list", "--category", "Office", "--json"]);

      expect(JSON.parse(result.stdout)).toEqual([
        {
          id: "calc.desktop",
          name: "Calculator",
          type: "Application",
          priority: 1,
          path: appPath(usr, "calc.desktop"),
        },
        {
          id: "writer.desktop",
          name: "Writer",
          type: "Application",
          priority: 1,
          path: appPath(usr, "writer.desktop"),
        },
      ]);
    });

    it("should print nothing for an unknown category", async () => {
      const result = await runCli([...globals, "list", "--category", "Game"]);
      expect(result).toEqual({ stdout: "", stderr: "", exitCode: 0 });
    });

    it("should read data directories from LAUNCHDEX_DATA_DIRS", async () => {
      const result = await runCli(["--locale", "C", "list", "--json"], {
        env: { LAUNCHDEX_DATA_DIRS: usr },
      });

      expect(JSON.parse(result.stdout)).toEqual([
        {
          id: "calc.desktop",
          name: "Calculator",
          type: "Application",
          priority: 0,
          path: appPath(usr, "calc.desktop"),
        },
        {
          id: "writer.desktop",
          name: "Writer",
          type: "Application",
          priority: 0,
          path: appPath(usr, "writer.desktop"),
        },
      ]);
    });
  });

  describe("show", () => {
    it("should show every entry with localized names", async () => {
      const result = await runCli([
        "--data-dirs",
        `${home}:${usr}`,
        "--locale",
        "sv_SE.UTF-8",
        "show",
        "calc.desktop",
        "--json",
      ]);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual([
        {
          priority: 0,
          path: appPath(home, "calc.desktop"),
          type: "Application",
          name: "My Calculator",
          categories: ["Utility"],
        },
        {
          priority: 1,
          path: appPath(usr, "calc.desktop"),
          type: "Application",
          name: "Kalkylator",
          categories: ["Utility", "Office"],
        },
      ]);
    });

    it("should print one row per entry", async () => {
      const result = await runCli([...globals, "show", "calc.desktop"]);

      expect(result.stdout).toBe(
        `0  Application  My Calculator  ${appPath(home, "calc.desktop")}\n` +
          `1  Application  Calculator     ${appPath(usr, "calc.desktop")}\n`
      );
    });

    it("should exit with code 2 for an unknown identity", async () => {
      const result = await runCli([...globals, "show", "nope.desktop"]);

      expect(result.exitCode).toBe(2);
      expect(result.stdout).toBe("");
      expect(result.stderr).toBe("Error: Link not found: nope.desktop\n");
    });
  });

  describe("categories", () => {
    it("should count links per category", async () => {
      const result = await runCli([...globals, "categories"]);
      expect(result.stdout).toBe("Office   2\nUtility  2\n");
    });

    it("should output JSON", async () => {
      const result = await runCli([...globals, "categories", "--json"]);
      expect(JSON.parse(result.stdout)).toEqual([
        { category: "Office", links: 2 },
        { category: "Utility", links: 2 },
      ]);
    });
  });

  describe("stats", () => {
    it("should summarize the index", async () => {
      const result = await runCli([...globals, "stats"]);

      expect(result.stdout).toBe(
        [
          "Identities: 2",
          "Entries: 3",
          "Categories: 2",
          "Watched paths: 2",
          "Ignored files: 0",
          "Parse failures: 1",
          "Hidden links: 0",
          "",
        ].join("\n")
      );
    });

    it("should output compact JSON", async () => {
      const result = await runCli([...globals, "stats", "--json"]);

      expect(result.stdout.trimEnd().split("\n")).toHaveLength(1);
      expect(JSON.parse(result.stdout)).toMatchObject({
        ids: 2,
        entries: 3,
        categories: 2,
        watchedPaths: 2,
        parseFailures: 1,
        added: 3,
      });
    });

    it("should emit timing metrics when verbose", async () => {
      const result = await runCli([...globals, "--verbose", "stats", "--json"]);

      expect(result.exitCode).toBe(0);
      expect(result.stderr).toMatch(/^metric cli\.stats duration_ms=\d+ success=true\n$/);
    });
  });

  describe("watch", () => {
    it("should print updates as JSON lines until shut down", async () => {
      const watch = new FakeWatch().seed("/data/applications", "old.desktop");
      const parser = new FakeParser()
        .define("/data/applications/old.desktop", { name: "Old" })
        .define("/data/applications/calc.desktop", { name: "Calculator" });
      const openBase = vi.fn<BaseOpener>(() =>
        createLinkBase(new StaticPaths(["/data"]), "C", 0, { watch, parser })
      );

      const result = await runCli(["watch"], {
        openBase,
        shutdown: async () => {
          watch.emit("added", "/data/applications", "calc.desktop");
          watch.emit("removed", "/data/applications", "old.desktop");
        },
      });

      expect(result.exitCode).toBe(0);
      expect(openBase).toHaveBeenCalledWith(expect.anything(), { live: true });
      expect(result.stdout.trimEnd().split("\n").map((line) => JSON.parse(line))).toEqual([
        {
          kind: "added",
          name: "Calculator",
          type: "Application",
          path: "/data/applications/calc.desktop",
        },
        {
          kind: "removed",
          name: "Old",
          type: "Application",
          path: "/data/applications/old.desktop",
        },
      ]);
      expect(watch.closed).toBe(true);
    });
  });

  describe("errors", () => {
    it("should reject unknown environment names", async () => {
      const result = await runCli(["--data-dirs", usr, "--env", "Plan9", "list"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toMatch(
        /^Error: Invalid configuration: environments\.0: unknown environment "Plan9"/
      );
    });

    it("should reject unknown commands", async () => {
      const result = await runCli(["frobnicate"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("unknown command 'frobnicate'");
    });

    it("should print the version", async () => {
      const result = await runCli(["--version"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(`${VERSION}\n`);
    });
  });
});
