/**
 * Locale specifier parsing: `language[_COUNTRY][.charset][@modifier]`
 */

import type { Locale } from "./types.js";

function isAsciiLetter(c: string): boolean {
  return (c >= "A" && c <= "Z") || (c >= "a" && c <= "z");
}

/**
 * Read a run of ASCII letters starting at `start`, ended by the end of the
 * string or one of `terminators`. Returns undefined when any other character
 * interrupts the run.
 */
function readRun(
  spec: string,
  start: number,
  terminators: string
): { value: string; end: number } | undefined {
  for (let i = start; ; i++) {
    if (i >= spec.length) {
      return { value: spec.slice(start, i), end: i };
    }
    const c = spec.charAt(i);
    if (terminators.includes(c)) {
      return { value: spec.slice(start, i), end: i };
    }
    if (!isAsciiLetter(c)) {
      return undefined;
    }
  }
}

/**
 * Split a locale specifier into its components.
 *
 * Never fails: a malformed segment is left unset along with every segment
 * after it. The charset segment is skipped whatever it contains.
 *
 * @example
 * parseLocale("en_US.UTF-8@euro"); // { language: "en", country: "US", modifier: "euro" }
 * parseLocale("de@euro");          // { language: "de" }
 */
export function parseLocale(spec: string): Locale {
  const locale: Locale = {};

  const language = readRun(spec, 0, "_.@");
  if (!language) return locale;
  locale.language = language.value;

  if (spec.charAt(language.end) !== "_") return locale;

  const country = readRun(spec, language.end + 1, ".@");
  if (!country) return locale;
  locale.country = country.value;

  let i = country.end;
  if (spec.charAt(i) === ".") {
    const at = spec.indexOf("@", i);
    i = at === -1 ? spec.length : at;
  }

  if (spec.charAt(i) === "@") {
    const modifier = readRun(spec, i + 1, "");
    if (modifier) {
      locale.modifier = modifier.value;
    }
  }

  return locale;
}

/**
 * Suffixes to try for a localized key, most specific first, ending with the
 * unlocalized key (empty suffix)
 */
export function localeSuffixes(locale: Locale): string[] {
  const { language, country, modifier } = locale;
  const suffixes: string[] = [];

  if (language) {
    if (country && modifier) suffixes.push(`${language}_${country}@${modifier}`);
    if (country) suffixes.push(`${language}_${country}`);
    if (modifier) suffixes.push(`${language}@${modifier}`);
    suffixes.push(language);
  }
  suffixes.push("");

  return suffixes;
}

/**
 * Render a locale back to `language_COUNTRY@modifier` form
 */
export function formatLocale(locale: Locale): string {
  let out = locale.language ?? "";
  if (locale.country !== undefined) out += `_${locale.country}`;
  if (locale.modifier !== undefined) out += `@${locale.modifier}`;
  return out;
}
