import { randomUUID } from "node:crypto";

/** Correlates every log line emitted during one `execute` call. */
export function generateInvocationId(): string {
  return randomUUID();
}
