/**
 * Coercion of raw command-line tokens into typed flag values.
 */

import { z, type ZodType, type ZodTypeDef } from "zod";
import { FlagValueError, type FlagValue, type TypedFlagKind } from "@flagline/sdk";
import { formatZodError } from "@flagline/shared";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const IntegerTokenSchema = z.string().transform((raw, ctx) => {
  if (!INTEGER_PATTERN.test(raw)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected an integer" });
    return z.NEVER;
  }
  const value = Number(raw);
  if (value < INT32_MIN || value > INT32_MAX) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "out of 32-bit integer range" });
    return z.NEVER;
  }
  // Folds "-0" into 0.
  return value | 0;
});

export const FloatTokenSchema = z.string().transform((raw, ctx) => {
  const value = raw.trim() === "" ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a number" });
    return z.NEVER;
  }
  const single = Math.fround(value);
  if (!Number.isFinite(single)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "out of 32-bit float range" });
    return z.NEVER;
  }
  return single;
});

function parseToken<T>(schema: ZodType<T, ZodTypeDef, string>, raw: string, flag: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new FlagValueError(flag, formatZodError(result.error), { value: raw });
  }
  return result.data;
}

/**
 * Build a value of the given kind from a raw token.
 * `flag` is the token that selected the flag, used in error messages.
 * Throws FlagValueError when the token does not fit the kind.
 */
export function coerceFlagValue(kind: TypedFlagKind, raw: string, flag: string): FlagValue {
  switch (kind) {
    case "text":
      return { kind, value: raw };
    case "integer":
      return { kind, value: parseToken(IntegerTokenSchema, raw, flag) };
    case "float":
      return { kind, value: parseToken(FloatTokenSchema, raw, flag) };
  }
}
