/**
 * Token matching against declared flags.
 */

import type { FlagSpec } from "@flagline/sdk";

export const SHORT_PREFIX = "-";
export const LONG_PREFIX = "--";

/**
 * True when the token carries a flag prefix. Every "--" token also starts
 * with "-", so a single check on either prefix is enough to classify it.
 */
export function isFlagToken(token: string): boolean {
  return token.startsWith(SHORT_PREFIX) || token.startsWith(LONG_PREFIX);
}

/** Exact, case-sensitive match of `-{short}` or `--{long}`. */
export function matchesFlag(flag: FlagSpec, token: string): boolean {
  return token === `${SHORT_PREFIX}${flag.short}` || token === `${LONG_PREFIX}${flag.long}`;
}
