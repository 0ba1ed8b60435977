/**
 * Runs the hello command once and maps the outcome to an exit code:
 *   0  help, version or greeting printed
 *   1  missing input or a bad flag value
 *   2  the command itself is misconfigured
 */

import { CliError, type ArgumentSource, type OutputSink } from "@flagline/sdk";
import type { Logger, PackageMetadata } from "@flagline/shared";
import { createHelloCommand } from "./hello.js";
import { readPackageMetadata } from "./metadata.js";

export interface RunOptions {
  /** Default: read from this app's package.json */
  metadata?: PackageMetadata;
  args?: ArgumentSource;
  output?: OutputSink;
  logger?: Logger;
}

export function runHello(options: RunOptions = {}): number {
  try {
    const command = createHelloCommand({
      metadata: options.metadata ?? readPackageMetadata(),
      args: options.args,
      output: options.output,
      logger: options.logger,
    });

    const result = command.execute();
    switch (result.kind) {
      case "help":
      case "version":
      case "handled":
        return 0;
      case "no-input":
      case "invalid-flag-value":
        console.error(result.error.message);
        console.error(`Run "${command.name} --help" for usage.`);
        return 1;
    }
  } catch (err) {
    if (err instanceof CliError) {
      console.error(err.message);
      return 2;
    }
    throw err;
  }
}
