/**
 * Stable error codes carried by every CliError.
 */

export const ErrorCode = {
  CLI_ERROR: "CLI_ERROR",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
  DUPLICATE_FLAG: "DUPLICATE_FLAG",
  MISSING_INPUT: "MISSING_INPUT",
  FLAG_VALUE_ERROR: "FLAG_VALUE_ERROR",
  FLAG_VALUE_MISSING: "FLAG_VALUE_MISSING",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
