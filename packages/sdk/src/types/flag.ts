/**
 * Flag declaration and value types.
 */

/** Presence-only flag payload. Defaults to `false`. */
export interface BooleanValue {
  kind: "boolean";
  value: boolean;
}

/** Text payload, `undefined` until a value is seen on the command line. */
export interface TextValue {
  kind: "text";
  value: string | undefined;
}

/** 32-bit signed integer payload. */
export interface IntegerValue {
  kind: "integer";
  value: number | undefined;
}

/** 32-bit float payload, stored rounded through `Math.fround`. */
export interface FloatValue {
  kind: "float";
  value: number | undefined;
}

/**
 * Closed set of flag payloads. The kind is fixed when the flag is created;
 * parsing only ever replaces the payload with one of the same kind.
 */
export type FlagValue = BooleanValue | TextValue | IntegerValue | FloatValue;

export type FlagKind = FlagValue["kind"];

/** Kinds that take the following token as their value. */
export type TypedFlagKind = Exclude<FlagKind, "boolean">;

/** A declared command-line flag. */
export interface FlagSpec<V extends FlagValue = FlagValue> {
  /** Identifier matched after the short prefix, e.g. `f` for `-f` */
  readonly short: string;

  /** Identifier matched after the long prefix, e.g. `ferris` for `--ferris` */
  readonly long: string;

  /** One-line description shown in help output */
  readonly description: string;

  /** Current value. Overwritten in place when a matching token is parsed. */
  value: V;
}
