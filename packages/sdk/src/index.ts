// Types
export type {
  BooleanValue,
  TextValue,
  IntegerValue,
  FloatValue,
  FlagValue,
  FlagKind,
  TypedFlagKind,
  FlagSpec,
} from "./types/flag.js";

export type {
  ArgumentSource,
  OutputSink,
  CommandInfo,
  HelpRenderer,
  VersionRenderer,
  HandlerContext,
  CommandHandler,
  UnknownFlagPolicy,
  ExecutionResult,
} from "./types/command.js";

// Errors
export {
  CliError,
  ConfigError,
  DuplicateFlagError,
  MissingInputError,
  FlagValueError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
