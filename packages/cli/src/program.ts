/**
 * launchdex command line program
 */

import { Command, CommanderError } from "commander";
import { logger, VERSION } from "@launchdex/sdk";
import type { LinkBaseEntry, LinkBaseHandle, LinkType } from "@launchdex/sdk";
import { indexLinks, openCliLinkBase, withLinkBase } from "./lib/base.js";
import type { BaseOpener, GlobalOptions } from "./lib/base.js";
import { isVerbose } from "./lib/env.js";
import { CliError, ExitCode, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { processIO, waitForSignal } from "./lib/io.js";
import type { CliIO } from "./lib/io.js";
import { colorize, formatColumns, printJson, printLines } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";
import { registerWatchCommand } from "./commands/watch.js";

export interface ProgramOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  /** Replaces the default opener built from the global options */
  openBase?: BaseOpener;
  /** Resolves when a long-running command should stop (default: SIGINT/SIGTERM) */
  shutdown?: () => Promise<unknown>;
}

/**
 * What commands need from the program they are registered on
 */
export interface CommandContext {
  io: CliIO;
  globals(): GlobalOptions;
  open: BaseOpener;
  shutdown: () => Promise<unknown>;
  timed<T>(label: string, fn: () => Promise<T>): Promise<T>;
}

interface ListItem {
  id: string;
  name: string;
  type: LinkType;
  priority: number;
  path: string;
}

function toListItem(id: string, { priority, link }: LinkBaseEntry): ListItem {
  return { id, name: link.name, type: link.type, priority, path: link.sourcePath };
}

/**
 * Winning link of every identity, sorted by identity
 */
function listWinners(base: LinkBaseHandle): ListItem[] {
  return base
    .ids()
    .sort()
    .flatMap((id) => {
      const [winner] = base.entries(id) ?? [];
      return winner ? [toListItem(id, winner)] : [];
    });
}

/**
 * Every link filed under `category`, in index order
 */
function listCategory(base: LinkBaseHandle, category: string): ListItem[] {
  const refs = indexLinks(base);
  return base.lookupCategory(category).flatMap((link) => {
    const ref = refs.get(link);
    return ref ? [toListItem(ref.id, { priority: ref.priority, link })] : [];
  });
}

/**
 * Build the command tree. Output goes through `options.io` so the program can
 * run in-process.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? processIO;
  const env = options.env ?? process.env;
  const open: BaseOpener = options.openBase ?? ((opts, mode) => openCliLinkBase(opts, mode, env));
  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const verbose = (): boolean => isVerbose(globals().verbose, env);

  function timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withTiming(label, fn, verbose() ? (line) => io.stderr(line) : undefined);
  }

  const ctx: CommandContext = {
    io,
    globals,
    open,
    shutdown: options.shutdown ?? (() => waitForSignal()),
    timed,
  };

  program
    .name("launchdex")
    .description("Browse the desktop entries installed under the XDG data directories")
    .version(VERSION)
    .option("--data-dirs <dirs>", "Colon-separated data directories, highest precedence first")
    .option("--locale <locale>", "Locale for localized strings (default: $LC_ALL, $LC_MESSAGES, $LANG)")
    .option("--env <names>", "Active desktop environments, e.g. GNOME:Unity")
    .option("--verbose", "Verbose diagnostics")
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", io.isTTY("stderr"))),
    })
    .exitOverride()
    .hook("preAction", () => {
      logger.setEnabled(verbose());
    });

  // List command
  program
    .command("list")
    .description("List the winning link of every identity, or the members of a category")
    .option("--category <tag>", "Only links filed under this category")
    .option("--json", "Output as JSON")
    .action(async (cmdOpts: { category?: string; json?: boolean }) => {
      await timed("cli.list", () =>
        withLinkBase(open, globals(), (base) => {
          const items =
            cmdOpts.category === undefined
              ? listWinners(base)
              : listCategory(base, cmdOpts.category);

          if (cmdOpts.json) {
            printJson(io, items);
          } else {
            printLines(io, formatColumns(items.map((item) => [item.id, item.name, item.path])));
          }
        })
      );
    });

  // Show command
  program
    .command("show <id>")
    .description("Show every entry for an identity, highest precedence first")
    .option("--json", "Output as JSON")
    .action(async (id: string, cmdOpts: { json?: boolean }) => {
      await timed("cli.show", () =>
        withLinkBase(open, globals(), (base) => {
          const entries = base.entries(id);
          if (!entries) {
            throw new CliError(`Link not found: ${id}`, { exitCode: ExitCode.NotFound });
          }

          const details = entries.map(({ priority, link }) => ({
            priority,
            path: link.sourcePath,
            type: link.type,
            name: link.name,
            categories: [...link.categories],
          }));

          if (cmdOpts.json) {
            printJson(io, details);
          } else {
            printLines(
              io,
              formatColumns(details.map((d) => [String(d.priority), d.type, d.name, d.path]))
            );
          }
        })
      );
    });

  // Categories command
  program
    .command("categories")
    .description("List categories with the number of links in each")
    .option("--json", "Output as JSON")
    .action(async (cmdOpts: { json?: boolean }) => {
      await timed("cli.categories", () =>
        withLinkBase(open, globals(), (base) => {
          const rows = base
            .categories()
            .sort()
            .map((category) => ({ category, links: base.lookupCategory(category).length }));

          if (cmdOpts.json) {
            printJson(io, rows);
          } else {
            printLines(io, formatColumns(rows.map((row) => [row.category, String(row.links)])));
          }
        })
      );
    });

  // Stats command
  program
    .command("stats")
    .description("Show index statistics")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (cmdOpts: { json?: boolean }) => {
      await timed("cli.stats", () =>
        withLinkBase(open, globals(), (base) => {
          const stats = base.stats();

          if (cmdOpts.json) {
            printJson(io, stats, { raw: true });
            return;
          }

          printLines(io, [
            `Identities: ${stats.ids}`,
            `Entries: ${stats.entries}`,
            `Categories: ${stats.categories}`,
            `Watched paths: ${stats.watchedPaths}`,
            `Ignored files: ${stats.ignored}`,
            `Parse failures: ${stats.parseFailures}`,
            `Hidden links: ${stats.hidden}`,
          ]);
        })
      );
    });

  registerWatchCommand(program, ctx);

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the command
 *
 * @returns The process exit code
 */
export async function run(argv: string[], options: ProgramOptions = {}): Promise<number> {
  const io = options.io ?? processIO;
  const program = createProgram(options);

  try {
    await program.parseAsync(argv, { from: "user" });
    return ExitCode.Ok;
  } catch (err) {
    // Commander has already printed help, the version or the usage error
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = isVerbose(program.opts<GlobalOptions>().verbose, options.env ?? process.env);
    io.stderr(colorize(`Error: ${formatCliError(err, verbose)}\n`, "red", io.isTTY("stderr")));
    return mapErrorToExitCode(err);
  }
}
