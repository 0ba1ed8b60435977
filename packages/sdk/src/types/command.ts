/**
 * Command, renderer and IO contracts.
 */

import type { FlagSpec } from "./flag.js";
import type { FlagValueError, MissingInputError } from "../errors/base.js";

/**
 * Supplies the raw process arguments.
 * Element 0 is the program path; user tokens start at index 1.
 */
export type ArgumentSource = () => readonly string[];

/** Line-oriented output consumer. */
export interface OutputSink {
  writeLine(line: string): void;
}

/** Read-only view of a command handed to renderers. */
export interface CommandInfo {
  /** Program name, e.g. "hello" */
  readonly name: string;

  /** Program version, e.g. "1.2.0" */
  readonly version: string;

  /** One-line description shown at the top of help output */
  readonly description: string;

  /** Usage line, e.g. "hello [FLAGS] TEXT" */
  readonly usage: string;

  /** All declared flags, reserved help/version flags first */
  readonly flags: readonly FlagSpec[];
}

export interface HelpRenderer {
  render(command: CommandInfo): string;
}

export interface VersionRenderer {
  render(command: CommandInfo): string;
}

export interface HandlerContext {
  /** Every positional token, `input` included */
  positional: readonly string[];

  output: OutputSink;
}

/**
 * User-supplied command body. Receives the first positional token and the
 * declared flags without the reserved help/version flags.
 */
export type CommandHandler = (
  input: string,
  flags: readonly FlagSpec[],
  ctx: HandlerContext,
) => void;

/** What to do with flag tokens that match no declared flag. */
export type UnknownFlagPolicy = "ignore" | "warn";

/** Terminal branch taken by one execution of a command. */
export type ExecutionResult =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "handled"; input: string; flags: readonly FlagSpec[] }
  | { kind: "no-input"; error: MissingInputError }
  | { kind: "invalid-flag-value"; error: FlagValueError };
