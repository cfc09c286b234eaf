/**
 * Link base adapter for CLI
 * Resolves global options into SDK configuration and owns the handle's lifetime
 */

import { createLinkBase, DirectoryWatch, resolveConfig } from "@launchdex/sdk";
import type { Link, LinkBaseHandle } from "@launchdex/sdk";
import { parseEnvNames, resolveDataDirs } from "./env.js";

/**
 * Options accepted by every command
 */
export type GlobalOptions = {
  dataDirs?: string;
  locale?: string;
  env?: string;
  verbose?: boolean;
};

/**
 * Opens a link base; `live` keeps watching after the initial scan
 */
export type BaseOpener = (opts: GlobalOptions, mode: { live: boolean }) => LinkBaseHandle;

/**
 * Open a link base from CLI options
 *
 * @throws {ConfigError} If an option does not validate
 */
export function openCliLinkBase(
  opts: GlobalOptions,
  mode: { live: boolean },
  env: NodeJS.ProcessEnv = process.env
): LinkBaseHandle {
  const config = resolveConfig(
    {
      locale: opts.locale,
      environments: opts.env === undefined ? undefined : parseEnvNames(opts.env),
      dataDirs: resolveDataDirs(opts.dataDirs, env),
    },
    env
  );

  return createLinkBase(config.paths, config.locale, config.environments, {
    watch: new DirectoryWatch({ live: mode.live }),
  });
}

/**
 * Run `fn` against a one-shot snapshot, releasing the handle afterwards
 */
export async function withLinkBase<T>(
  open: BaseOpener,
  opts: GlobalOptions,
  fn: (base: LinkBaseHandle) => T | Promise<T>
): Promise<T> {
  const base = open(opts, { live: false });
  try {
    return await fn(base);
  } finally {
    base.release();
  }
}

export interface LinkRef {
  id: string;
  priority: number;
}

/**
 * Identity and priority of every indexed link
 */
export function indexLinks(base: LinkBaseHandle): Map<Link, LinkRef> {
  const refs = new Map<Link, LinkRef>();
  for (const id of base.ids()) {
    for (const entry of base.entries(id) ?? []) {
      refs.set(entry.link, { id, priority: entry.priority });
    }
  }
  return refs;
}
