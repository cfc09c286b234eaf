/**
 * Live watch command for CLI
 */

import type { Command } from "commander";
import { logger } from "@launchdex/sdk";
import type { CommandContext } from "../program.js";

/**
 * Register `watch`: index the data directories, then print one JSON line per
 * link added or removed until the shutdown signal arrives
 */
export function registerWatchCommand(program: Command, ctx: CommandContext): Command {
  return program
    .command("watch")
    .description("Print link additions and removals as JSON lines until interrupted")
    .addHelpText(
      "after",
      `
Examples:
  $ launchdex watch
  $ launchdex --data-dirs ~/.local/share:/usr/share watch | jq .name`
    )
    .action(async () => {
      await ctx.timed("cli.watch", async () => {
        const base = ctx.open(ctx.globals(), { live: true });

        try {
          base.setUpdateCallback(
            (_base, kind, link, io) => {
              io.stdout(
                JSON.stringify({ kind, name: link.name, type: link.type, path: link.sourcePath }) +
                  "\n"
              );
            },
            ctx.io
          );

          logger.info("cli.watch.start", { details: { paths: base.stats().watchedPaths } });
          await ctx.shutdown();
          logger.info("cli.watch.stop");
        } finally {
          base.release();
        }
      });
    });
}
