/**
 * Error hierarchy for command parsing and dispatch.
 */

import { ErrorCode, type ErrorCodeValue } from "./codes.js";

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "CliError";
  }
}

/**
 * Thrown at construction time when a command or flag definition is invalid.
 */
export class ConfigError extends CliError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: ErrorCodeValue },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * Thrown when a flag reuses a short or long identifier already declared
 * on the same command.
 */
export class DuplicateFlagError extends CliError {
  constructor(public readonly identifier: string) {
    super(`Flag identifier "${identifier}" is already declared`, ErrorCode.DUPLICATE_FLAG);
    this.name = "DuplicateFlagError";
  }
}

/**
 * Dispatch was reached without any positional token to hand to the handler.
 */
export class MissingInputError extends CliError {
  constructor(public readonly command: string) {
    super(`Command "${command}" requires an input argument`, ErrorCode.MISSING_INPUT);
    this.name = "MissingInputError";
  }
}

/**
 * A typed flag was given no value, or a value that does not fit its kind.
 */
export class FlagValueError extends CliError {
  public readonly value?: string;

  constructor(
    public readonly flag: string,
    message: string,
    options?: { value?: string; cause?: Error; code?: ErrorCodeValue },
  ) {
    super(
      `Invalid value for flag "${flag}": ${message}`,
      options?.code ?? ErrorCode.FLAG_VALUE_ERROR,
      options,
    );
    this.name = "FlagValueError";
    this.value = options?.value;
  }
}
