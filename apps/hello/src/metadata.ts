/**
 * Program name and version, read from this app's package.json.
 */

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, ErrorCode } from "@flagline/sdk";
import { PackageMetadataSchema, validateInput, type PackageMetadata } from "@flagline/shared";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** package.json one level above src/ (tests) or dist/ (installed bin) */
export const DEFAULT_PACKAGE_PATH = resolve(__dirname, "../package.json");

export function readPackageMetadata(path: string = DEFAULT_PACKAGE_PATH): PackageMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Failed to read package metadata from ${path}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  const result = validateInput(PackageMetadataSchema, raw);
  if (!result.success) {
    throw new ConfigError(`Invalid package metadata in ${path}: ${result.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }
  return result.data;
}

/** "@scope/hello" → "hello" */
export function programName(packageName: string): string {
  return packageName.replace(/^@[^/]+\//, "");
}
