/**
 * Argument partitioner.
 *
 * Splits user tokens into positional input and flag assignments:
 *   partition([ferris], ["world", "-f"])        → ["world"], ferris = true
 *   partition([repeat], ["-r", "3", "world"])   → ["world"], repeat = 3
 *   partition([], ["-x", "world"])              → ["world"], "-x" dropped
 *
 * The token list is scanned once and never modified; positional tokens are
 * collected into a fresh array.
 */

import { ErrorCode, FlagValueError, type FlagSpec } from "@flagline/sdk";
import { isFlagToken, matchesFlag } from "../flag/matcher.js";
import { coerceFlagValue } from "../flag/coerce.js";

export interface PartitionOptions {
  /** Called for each flag token that matches no declared flag. */
  onUnknownFlag?: (token: string) => void;
}

/**
 * Update matching flags in place and return the positional tokens in order.
 *
 * Boolean flags are set to true. Text, integer and float flags take the
 * next token as their value, whatever it looks like (so `-n -5` works).
 * Throws FlagValueError when that token is missing or does not coerce.
 */
export function partition(
  flags: readonly FlagSpec[],
  tokens: readonly string[],
  options: PartitionOptions = {},
): string[] {
  const positional: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (!isFlagToken(token)) {
      positional.push(token);
      continue;
    }

    const matched = flags.filter((flag) => matchesFlag(flag, token));
    if (matched.length === 0) {
      options.onUnknownFlag?.(token);
      continue;
    }

    const takesValue = matched.some((flag) => flag.value.kind !== "boolean");
    let raw: string | undefined;
    if (takesValue) {
      if (i + 1 >= tokens.length) {
        throw new FlagValueError(token, "a value is required", {
          code: ErrorCode.FLAG_VALUE_MISSING,
        });
      }
      raw = tokens[++i];
    }

    for (const flag of matched) {
      const kind = flag.value.kind;
      if (kind === "boolean") {
        flag.value = { kind, value: true };
      } else if (raw !== undefined) {
        flag.value = coerceFlagValue(kind, raw, token);
      }
    }
  }

  return positional;
}
