import type { CommandInfo, VersionRenderer } from "@flagline/sdk";

/** Renders `{name} version {version}`. */
export function createDefaultVersionRenderer(): VersionRenderer {
  return {
    render(command: CommandInfo): string {
      return `${command.name} version ${command.version}`;
    },
  };
}
