/**
 * Flag factories and helpers.
 *
 * Each factory fixes the flag's value kind for its whole lifetime:
 *   createBooleanFlag("f", "ferris", "say hello from ferris")  → -f / --ferris, false until seen
 *   createIntegerFlag("r", "repeat", "repeat count")           → -r 3 / --repeat 3
 */

import {
  ConfigError,
  ErrorCode,
  type BooleanValue,
  type FlagSpec,
  type FlagValue,
  type FloatValue,
  type IntegerValue,
  type TextValue,
} from "@flagline/sdk";
import { FlagDefinitionSchema, validateInput, type FlagDefinition } from "@flagline/shared";
import { LONG_PREFIX, SHORT_PREFIX, matchesFlag } from "./matcher.js";

/**
 * Throws ConfigError when an identifier is empty, starts with "-" or
 * contains whitespace.
 */
export function assertFlagDefinition(definition: FlagDefinition): void {
  const result = validateInput(FlagDefinitionSchema, definition);
  if (!result.success) {
    throw new ConfigError(`Invalid flag definition: ${result.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }
}

/** Create a flag with an explicit initial value. */
export function createFlag<V extends FlagValue>(
  short: string,
  long: string,
  description: string,
  value: V,
): FlagSpec<V> {
  assertFlagDefinition({ short, long, description });
  return { short, long, description, value };
}

export function createBooleanFlag(short: string, long: string, description: string): FlagSpec<BooleanValue> {
  return createFlag<BooleanValue>(short, long, description, { kind: "boolean", value: false });
}

export function createTextFlag(short: string, long: string, description: string): FlagSpec<TextValue> {
  return createFlag<TextValue>(short, long, description, { kind: "text", value: undefined });
}

export function createIntegerFlag(short: string, long: string, description: string): FlagSpec<IntegerValue> {
  return createFlag<IntegerValue>(short, long, description, { kind: "integer", value: undefined });
}

export function createFloatFlag(short: string, long: string, description: string): FlagSpec<FloatValue> {
  return createFlag<FloatValue>(short, long, description, { kind: "float", value: undefined });
}

/** True only for a boolean flag that has been seen. */
export function isFlagSet(flag: FlagSpec): boolean {
  return flag.value.kind === "boolean" && flag.value.value;
}

/**
 * Find a flag by identifier. Accepts a bare id ("f", "ferris") or a
 * prefixed token ("-f", "--ferris").
 */
export function findFlag(flags: readonly FlagSpec[], id: string): FlagSpec | undefined {
  return flags.find(
    (flag) => matchesFlag(flag, id) || flag.short === id || flag.long === id,
  );
}

/** Help line for a flag: `  -f, --ferris<TAB>description`. */
export function formatFlag(flag: FlagSpec): string {
  return `  ${SHORT_PREFIX}${flag.short}, ${LONG_PREFIX}${flag.long}\t${flag.description}`;
}
