import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "@flagline/sdk";
import { readPackageMetadata, programName, DEFAULT_PACKAGE_PATH } from "../src/metadata.js";

describe("readPackageMetadata", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "flagline-hello-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads the app's own package.json by default", () => {
    expect(DEFAULT_PACKAGE_PATH.endsWith(join("hello", "package.json"))).toBe(true);
    expect(readPackageMetadata()).toEqual({ name: "@flagline/hello", version: "0.1.0" });
  });

  it("keeps only name and version", () => {
    const path = join(dir, "package.json");
    writeFileSync(path, JSON.stringify({ name: "greeter", version: "2.0.0", private: true }));

    expect(readPackageMetadata(path)).toEqual({ name: "greeter", version: "2.0.0" });
  });

  it("throws ConfigError when the file is missing", () => {
    const path = join(dir, "missing.json");

    expect(() => readPackageMetadata(path)).toThrow(ConfigError);
    expect(() => readPackageMetadata(path)).toThrow(`Failed to read package metadata from ${path}`);
  });

  it("throws ConfigError when the file is not JSON", () => {
    const path = join(dir, "package.json");
    writeFileSync(path, "{ not json");

    expect(() => readPackageMetadata(path)).toThrow(ConfigError);
  });

  it("throws ConfigError when the version is missing", () => {
    const path = join(dir, "package.json");
    writeFileSync(path, JSON.stringify({ name: "greeter" }));

    expect(() => readPackageMetadata(path)).toThrow(
      `Invalid package metadata in ${path}: version: Required`,
    );
  });
});

describe("programName", () => {
  it("strips an npm scope", () => {
    expect(programName("@flagline/hello")).toBe("hello");
  });

  it("keeps unscoped names", () => {
    expect(programName("hello")).toBe("hello");
  });
});
