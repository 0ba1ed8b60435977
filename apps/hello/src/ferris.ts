/**
 * Ferris the crab, speaking from under a framed bubble:
 *
 *   +---------------+
 *   | hello, world! |
 *   +---------------+
 *           \
 *            \
 *               _~^~^~_
 *           \) /  o o  \ (/
 *             '_   -   _'
 *             / '-----' \
 */

export const FERRIS: readonly string[] = [
  "        \\",
  "         \\",
  "            _~^~^~_",
  "        \\) /  o o  \\ (/",
  "          '_   -   _'",
  "          / '-----' \\",
];

/** Frames lines in an ASCII box, padding each to the widest. */
export function frame(lines: readonly string[]): string[] {
  const width = Math.max(0, ...lines.map((line) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  return [border, ...lines.map((line) => `| ${line.padEnd(width)} |`), border];
}
