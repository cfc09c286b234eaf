/**
 * Configuration resolution for a link base
 * Priority: explicit input > environment variables > defaults
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { environmentFlags, isLinkEnvName, LINK_ENV_NAMES } from "./link.js";
import type { LinkEnvName } from "./link.js";
import { StaticPaths, XdgPaths } from "./paths.js";
import type { PathsProvider } from "./types.js";

const EnvNameSchema = z.string().refine(isLinkEnvName, (name) => ({
  message: `unknown environment "${name}" (expected one of ${LINK_ENV_NAMES.join(", ")})`,
}));

export const ConfigInputSchema = z
  .object({
    locale: z.string().optional(),
    environments: z.array(EnvNameSchema).optional(),
    dataDirs: z.array(z.string().min(1, "data directory must be non-empty")).min(1).optional(),
  })
  .strict();

export type ConfigInput = z.input<typeof ConfigInputSchema>;

export interface LinkBaseConfig {
  locale: string;
  environmentNames: LinkEnvName[];
  environments: number;
  paths: PathsProvider;
}

const DEFAULT_LOCALE = "C";

/**
 * Locale from the first non-empty of LC_ALL, LC_MESSAGES, LANG
 */
export function localeFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  return env.LC_ALL || env.LC_MESSAGES || env.LANG || DEFAULT_LOCALE;
}

/**
 * Active environments from LAUNCHDEX_ENVIRONMENTS or XDG_CURRENT_DESKTOP.
 * Unknown names are dropped.
 */
export function environmentsFromEnv(env: NodeJS.ProcessEnv = process.env): LinkEnvName[] {
  const raw = env.LAUNCHDEX_ENVIRONMENTS || env.XDG_CURRENT_DESKTOP || "";
  const names = raw
    .split(/[:,]/)
    .map((name) => name.trim())
    .filter(isLinkEnvName);
  return [...new Set(names)];
}

/**
 * Resolve and validate link base settings
 *
 * @throws {ConfigError} If `input` does not match the config schema
 */
export function resolveConfig(
  input: unknown = {},
  env: NodeJS.ProcessEnv = process.env
): LinkBaseConfig {
  const parsed = ConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid configuration",
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      ),
      { cause: parsed.error }
    );
  }

  const { locale, environments, dataDirs } = parsed.data;
  const environmentNames = environments ? [...new Set(environments)] : environmentsFromEnv(env);

  return {
    locale: locale ?? localeFromEnv(env),
    environmentNames,
    environments: environmentFlags(environmentNames),
    paths: dataDirs ? new StaticPaths(dataDirs) : new XdgPaths(env),
  };
}
