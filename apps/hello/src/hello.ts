/**
 * The hello command.
 *
 *   hello world                 → hello, world!
 *   hello -g howdy -r 2 world   → howdy, world! (twice)
 *   hello --ferris world        → Ferris says the greeting
 */

import {
  createBooleanFlag,
  createCommand,
  createIntegerFlag,
  createTextFlag,
  isFlagSet,
  type Command,
} from "@flagline/core";
import type { ArgumentSource, OutputSink } from "@flagline/sdk";
import type { Logger, PackageMetadata } from "@flagline/shared";
import { FERRIS, frame } from "./ferris.js";
import { programName } from "./metadata.js";

export interface HelloCommandOptions {
  metadata: PackageMetadata;
  args?: ArgumentSource;
  output?: OutputSink;
  logger?: Logger;
}

export function createHelloCommand(options: HelloCommandOptions): Command {
  const ferris = createBooleanFlag("f", "ferris", "say hello from ferris");
  const greeting = createTextFlag("g", "greeting", "greeting to use instead of hello");
  const repeat = createIntegerFlag("r", "repeat", "number of times to greet");

  const command = createCommand({
    name: programName(options.metadata.name),
    version: options.metadata.version,
    description: "gives a friendly hello",
    usage: "hello [FLAGS] TEXT",
    args: options.args,
    output: options.output,
    logger: options.logger,
    unknownFlags: "warn",
    handler: (text, _flags, ctx) => {
      const message = `${greeting.value.value ?? "hello"}, ${text}!`;
      const times = Math.max(repeat.value.value ?? 1, 0);
      if (times === 0) return;

      if (!isFlagSet(ferris)) {
        for (let i = 0; i < times; i++) ctx.output.writeLine(message);
        return;
      }
      // Every repetition is the same line, so one framed row is reused.
      const [top, row, bottom] = frame([message]);
      ctx.output.writeLine(top);
      for (let i = 0; i < times; i++) ctx.output.writeLine(row);
      ctx.output.writeLine(bottom);
      for (const line of FERRIS) ctx.output.writeLine(line);
    },
  });

  command.addFlag(ferris);
  command.addFlag(greeting);
  command.addFlag(repeat);

  return command;
}
