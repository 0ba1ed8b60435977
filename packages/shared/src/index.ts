export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { generateInvocationId } from "./utils/invocation-id.js";
export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  FlagIdentifierSchema,
  FlagDefinitionSchema,
  UnknownFlagPolicySchema,
  CommandConfigSchema,
  PackageMetadataSchema,
} from "./utils/config-schema.js";
export type {
  FlagDefinition,
  PackageMetadata,
} from "./utils/config-schema.js";
