/**
 * Default help rendering.
 *
 *   gives a friendly hello
 *
 *   Usage:
 *     hello TEXT
 *
 *   Flags:
 *     -h, --help	help for hello
 *     -v, --version	version for hello
 */

import type { CommandInfo, HelpRenderer } from "@flagline/sdk";
import { formatFlag } from "../flag/flag.js";

export function createDefaultHelpRenderer(): HelpRenderer {
  return {
    render(command: CommandInfo): string {
      return [
        command.description,
        "",
        "Usage:",
        `  ${command.usage}`,
        "",
        "Flags:",
        ...command.flags.map(formatFlag),
      ].join("\n");
    },
  };
}
