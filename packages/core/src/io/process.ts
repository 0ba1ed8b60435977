/**
 * Process-backed argument source and console output sink.
 */

import type { ArgumentSource, OutputSink } from "@flagline/sdk";

/** `process.argv` without the runtime path, so index 0 is the script path. */
export const processArguments: ArgumentSource = () => process.argv.slice(1);

export const consoleOutput: OutputSink = {
  writeLine(line: string): void {
    console.log(line);
  },
};
