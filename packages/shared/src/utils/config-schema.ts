/**
 * Zod schemas for command and flag definitions.
 *
 * Checked when a command or flag is constructed, so a misdeclared CLI fails
 * before any argument is parsed.
 */

import { z } from "zod";

export const FlagIdentifierSchema = z
  .string()
  .min(1, "Flag identifier must not be empty")
  .regex(/^(?!-)\S*$/, 'Flag identifier must not start with "-" or contain whitespace');

export const FlagDefinitionSchema = z.object({
  short: FlagIdentifierSchema,
  long: FlagIdentifierSchema,
  description: z.string(),
});

export const UnknownFlagPolicySchema = z.enum(["ignore", "warn"]);

export const CommandConfigSchema = z.object({
  name: z.string().min(1, "Command name must not be empty"),
  version: z.string().min(1, "Command version must not be empty"),
  description: z.string(),
  usage: z.string(),
  unknownFlags: UnknownFlagPolicySchema.optional().default("ignore"),
});

/** The subset of package.json an application needs for help and version output. */
export const PackageMetadataSchema = z.object({
  name: z.string().min(1, "Package name must not be empty"),
  version: z.string().min(1, "Package version must not be empty"),
});

export type FlagDefinition = z.infer<typeof FlagDefinitionSchema>;
export type PackageMetadata = z.infer<typeof PackageMetadataSchema>;
