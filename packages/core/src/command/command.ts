/**
 * Command: owns its flag set and runs one invocation.
 *
 * Execution is a small state machine:
 *   Start → Partitioned → HelpExit | VersionExit | Dispatch → End
 *
 * Help and version flags are injected at construction, in that order, and
 * always short-circuit before the handler. Help wins when both are set.
 */

import {
  ConfigError,
  DuplicateFlagError,
  ErrorCode,
  FlagValueError,
  MissingInputError,
  type ArgumentSource,
  type CommandHandler,
  type CommandInfo,
  type ExecutionResult,
  type FlagSpec,
  type FlagValue,
  type HelpRenderer,
  type OutputSink,
  type UnknownFlagPolicy,
  type VersionRenderer,
} from "@flagline/sdk";
import {
  CommandConfigSchema,
  createLogger,
  generateInvocationId,
  validateInput,
  type Logger,
} from "@flagline/shared";
import { assertFlagDefinition, createBooleanFlag, isFlagSet } from "../flag/flag.js";
import { LONG_PREFIX, SHORT_PREFIX } from "../flag/matcher.js";
import { partition } from "../parser/partition.js";
import { createDefaultHelpRenderer } from "../render/help.js";
import { createDefaultVersionRenderer } from "../render/version.js";
import { consoleOutput, processArguments } from "../io/process.js";

export const HELP_SHORT = "h";
export const HELP_LONG = "help";
export const VERSION_SHORT = "v";
export const VERSION_LONG = "version";

export interface CommandConfig {
  /** Program name shown in help and version output */
  name: string;

  /** Program version shown by --version */
  version: string;

  description: string;

  usage: string;

  /** Called at most once per execution with the first positional token */
  handler: CommandHandler;

  /** Default: createDefaultHelpRenderer() */
  helpRenderer?: HelpRenderer;

  /** Default: createDefaultVersionRenderer() */
  versionRenderer?: VersionRenderer;

  /** Default: process.argv without the runtime path */
  args?: ArgumentSource;

  /** Default: console.log per line */
  output?: OutputSink;

  /** Default: "ignore" */
  unknownFlags?: UnknownFlagPolicy;

  /** Default: createLogger("command") */
  logger?: Logger;
}

export interface Command extends CommandInfo {
  /**
   * Declare another flag. Throws DuplicateFlagError when its short or long
   * identifier is already taken, including by -h/--help and -v/--version.
   */
  addFlag(flag: FlagSpec): void;

  /** Declared flags without the reserved help and version flags */
  userFlags(): FlagSpec[];

  /** Parse the process arguments and take exactly one terminal branch */
  execute(): ExecutionResult;
}

/**
 * Create a command with help and version flags already declared.
 * Throws ConfigError when the name, version or policy is invalid.
 */
export function createCommand(config: CommandConfig): Command {
  const validated = validateInput(CommandConfigSchema, {
    name: config.name,
    version: config.version,
    description: config.description,
    usage: config.usage,
    unknownFlags: config.unknownFlags,
  });
  if (!validated.success) {
    throw new ConfigError(`Invalid command configuration: ${validated.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }

  const { name, version, description, usage, unknownFlags } = validated.data;
  const helpRenderer = config.helpRenderer ?? createDefaultHelpRenderer();
  const versionRenderer = config.versionRenderer ?? createDefaultVersionRenderer();
  const readArgs = config.args ?? processArguments;
  const output = config.output ?? consoleOutput;
  const logger = (config.logger ?? createLogger("command")).child(name);
  logger.setContext({ command: name });

  const flags: FlagSpec[] = [];
  // Values each flag held when declared; restored before every run.
  const initialValues = new Map<FlagSpec, FlagValue>();
  const helpFlag = createBooleanFlag(HELP_SHORT, HELP_LONG, `help for ${name}`);
  const versionFlag = createBooleanFlag(VERSION_SHORT, VERSION_LONG, `version for ${name}`);

  function addFlag(flag: FlagSpec): void {
    assertFlagDefinition(flag);
    for (const existing of flags) {
      if (existing.short === flag.short) {
        throw new DuplicateFlagError(`${SHORT_PREFIX}${flag.short}`);
      }
      if (existing.long === flag.long) {
        throw new DuplicateFlagError(`${LONG_PREFIX}${flag.long}`);
      }
    }
    flags.push(flag);
    initialValues.set(flag, flag.value);
    logger.debug(`Declared flag: ${SHORT_PREFIX}${flag.short}, ${LONG_PREFIX}${flag.long}`);
  }

  function userFlags(): FlagSpec[] {
    return flags.filter((flag) => flag !== helpFlag && flag !== versionFlag);
  }

  function writeText(text: string): void {
    for (const line of text.split("\n")) {
      output.writeLine(line);
    }
  }

  function resetFlags(): void {
    for (const flag of flags) {
      const initial = initialValues.get(flag);
      if (initial !== undefined) flag.value = initial;
    }
  }

  function run(log: Logger): ExecutionResult {
    resetFlags();
    const raw = readArgs();
    // Index 0 is the program path; with nothing after it, behave like --help.
    const tokens = raw.length <= 1 ? [`${LONG_PREFIX}${HELP_LONG}`] : raw.slice(1);

    let positional: string[];
    try {
      positional = partition(flags, tokens, {
        onUnknownFlag: (token) => {
          if (unknownFlags === "warn") {
            log.warn(`Unrecognized flag: ${token}`, { token });
          } else {
            log.debug(`Ignoring unrecognized flag: ${token}`);
          }
        },
      });
    } catch (err) {
      if (err instanceof FlagValueError) {
        log.debug("Rejected flag value", { flag: err.flag, code: err.code });
        return { kind: "invalid-flag-value", error: err };
      }
      throw err;
    }
    log.debug("Partitioned arguments", { tokens: tokens.length, positional: positional.length });

    if (isFlagSet(helpFlag)) {
      writeText(helpRenderer.render(command));
      return { kind: "help" };
    }

    if (isFlagSet(versionFlag)) {
      output.writeLine(versionRenderer.render(command));
      return { kind: "version" };
    }

    if (positional.length === 0) {
      return { kind: "no-input", error: new MissingInputError(name) };
    }

    const input = positional[0];
    const handlerFlags = userFlags();
    log.debug("Dispatching to handler", { input });
    config.handler(input, handlerFlags, { positional, output });
    return { kind: "handled", input, flags: handlerFlags };
  }

  const command: Command = {
    name,
    version,
    description,
    usage,
    get flags(): readonly FlagSpec[] {
      return flags;
    },
    addFlag,
    userFlags,
    execute(): ExecutionResult {
      const log = logger.child("execute");
      log.setContext({ invocationId: generateInvocationId() });
      const stop = log.time("execute");
      try {
        return run(log);
      } finally {
        stop();
      }
    },
  };

  addFlag(helpFlag);
  addFlag(versionFlag);

  return command;
}
