// Flags
export {
  createFlag,
  assertFlagDefinition,
  createBooleanFlag,
  createTextFlag,
  createIntegerFlag,
  createFloatFlag,
  isFlagSet,
  findFlag,
  formatFlag,
} from "./flag/flag.js";
export { SHORT_PREFIX, LONG_PREFIX, isFlagToken, matchesFlag } from "./flag/matcher.js";
export { coerceFlagValue, IntegerTokenSchema, FloatTokenSchema } from "./flag/coerce.js";

// Parsing
export { partition } from "./parser/partition.js";
export type { PartitionOptions } from "./parser/partition.js";

// Rendering
export { createDefaultHelpRenderer } from "./render/help.js";
export { createDefaultVersionRenderer } from "./render/version.js";

// Command
export {
  createCommand,
  HELP_SHORT,
  HELP_LONG,
  VERSION_SHORT,
  VERSION_LONG,
} from "./command/command.js";
export type { Command, CommandConfig } from "./command/command.js";

// IO
export { processArguments, consoleOutput } from "./io/process.js";
