/**
 * Link base over real directories with the default desktop entry parser
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import { createTempDir, desktopEntry, removeDir, writeDesktopFile } from "@launchdex/testkit";
import { DesktopEntryParser } from "./desktop-entry.js";
import { createLinkBase } from "./link-base.js";
import { LinkEnv } from "./link.js";
import { StaticPaths } from "./paths.js";
import { DirectoryWatch } from "./watch.js";
import type { LinkBaseHandle } from "./types.js";

describe("link base on disk", () => {
  let root: string;
  let home: string;
  let usr: string;
  let base: LinkBaseHandle | undefined;

  beforeEach(async () => {
    root = await createTempDir();
    home = path.join(root, "home");
    usr = path.join(root, "usr");

    await writeDesktopFile(
      home,
      "calc.desktop",
      desktopEntry({
        Type: "Application",
        Name: "My Calculator",
        Exec: "calc --user",
        Categories: "Utility;",
      })
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
      "kde/konsole.desktop",
      desktopEntry({ Type: "Application", Name: "Konsole", Exec: "konsole" })
    );
    await writeDesktopFile(
      usr,
      "writer.desktop",
      desktopEntry({
        Type: "Application",
        Name: "Writer",
        "Name[sv]": "Skrivare",
        Exec: "writer %U",
        Categories: "Office;",
      })
    );
    await writeDesktopFile(
      usr,
      "kde-only.desktop",
      desktopEntry({ Type: "Application", Name: "KDE Tool", Exec: "kt", OnlyShowIn: "KDE;" })
    );
    await writeDesktopFile(usr, "broken.desktop", "Name=No group\n");
    await writeFile(path.join(usr, "applications", "mimeinfo.cache"), "[MIME Cache]\n");
  });

  afterEach(async () => {
    if (base && base.refCount > 0) {
      base.release();
    }
    base = undefined;
    await removeDir(root);
  });

  function open(locale = "sv_SE.UTF-8"): LinkBaseHandle {
    base = createLinkBase(new StaticPaths([home, usr]), locale, LinkEnv.GNOME, {
      parser: new DesktopEntryParser({ tryExec: () => true }),
      watch: new DirectoryWatch({ live: false }),
    });
    return base;
  }

  it("should prefer the higher precedence directory", () => {
    const links = open();

    expect(links.entries("calc.desktop")?.map((entry) => entry.priority)).toEqual([0, 1]);
    expect(links.lookup("calc.desktop")?.name).toBe("My Calculator");
    expect(links.lookup("calc.desktop")?.app?.exec).toBe("calc --user");
  });

  it("should index only displayable desktop entries", () => {
    const links = open();

    expect(links.ids().sort()).toEqual(["calc.desktop", "writer.desktop"]);
    expect(links.stats()).toMatchObject({ ids: 2, entries: 3, ignored: 1, parseFailures: 1, hidden: 1 });
  });

  it("should pick localized names", () => {
    expect(open().lookup("writer.desktop")?.name).toBe("Skrivare");
    base?.release();
    expect(open("C").lookup("writer.desktop")?.name).toBe("Writer");
  });

  it("should list every competing application by category", () => {
    const links = open();

    expect(links.categories().sort()).toEqual(["Office", "Utility"]);
    expect(links.lookupCategory("Office").map((link) => link.name)).toEqual(["Kalkylator", "Skrivare"]);
    expect(links.lookupCategory("Utility").map((link) => link.name)).toEqual([
      "My Calculator",
      "Kalkylator",
    ]);
  });

  it("should not descend into subdirectories", () => {
    expect(open().lookup("kde-konsole.desktop")).toBeUndefined();
  });

  it("should tolerate data directories without an applications folder", () => {
    base = createLinkBase(new StaticPaths([path.join(root, "absent"), usr]), "C", LinkEnv.GNOME, {
      parser: new DesktopEntryParser({ tryExec: () => true }),
      watch: new DirectoryWatch({ live: false }),
    });

    expect(base.priorityOf(path.join(usr, "applications"))).toBe(1);
    expect(base.entries("calc.desktop")?.map((entry) => entry.priority)).toEqual([1]);
  });
});
