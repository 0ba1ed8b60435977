import { describe, it, expect } from "vitest";
import { ConfigError } from "@flagline/sdk";
import {
  createFlag,
  createBooleanFlag,
  createTextFlag,
  createIntegerFlag,
  createFloatFlag,
  isFlagSet,
  findFlag,
  formatFlag,
} from "./flag.js";

describe("flag factories", () => {
  it("creates a boolean flag defaulting to false", () => {
    const flag = createBooleanFlag("f", "ferris", "say hello from ferris");
    expect(flag).toEqual({
      short: "f",
      long: "ferris",
      description: "say hello from ferris",
      value: { kind: "boolean", value: false },
    });
  });

  it("creates typed flags with no value yet", () => {
    expect(createTextFlag("g", "greeting", "").value).toEqual({ kind: "text", value: undefined });
    expect(createIntegerFlag("r", "repeat", "").value).toEqual({ kind: "integer", value: undefined });
    expect(createFloatFlag("s", "scale", "").value).toEqual({ kind: "float", value: undefined });
  });

  it("accepts an explicit initial value", () => {
    const flag = createFlag("g", "greeting", "", { kind: "text", value: "hi" });
    expect(flag.value.value).toBe("hi");
  });

  it("throws ConfigError for an empty identifier", () => {
    expect(() => createBooleanFlag("", "ferris", "")).toThrow(ConfigError);
    expect(() => createBooleanFlag("", "ferris", "")).toThrow(
      "Invalid flag definition: short: Flag identifier must not be empty",
    );
  });

  it("throws ConfigError for a prefixed identifier", () => {
    expect(() => createBooleanFlag("f", "--ferris", "")).toThrow(
      'Invalid flag definition: long: Flag identifier must not start with "-" or contain whitespace',
    );
  });

  it("reports the validation code", () => {
    let caught: unknown;
    try {
      createBooleanFlag("f f", "ferris", "");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toHaveProperty("code", "CONFIG_VALIDATION_ERROR");
  });
});

describe("isFlagSet", () => {
  it("is true only for a boolean flag set to true", () => {
    const flag = createBooleanFlag("f", "ferris", "");
    expect(isFlagSet(flag)).toBe(false);
    flag.value = { kind: "boolean", value: true };
    expect(isFlagSet(flag)).toBe(true);
  });

  it("is false for typed flags even when they hold a value", () => {
    const flag = createTextFlag("g", "greeting", "");
    flag.value = { kind: "text", value: "true" };
    expect(isFlagSet(flag)).toBe(false);
  });
});

describe("findFlag", () => {
  const flags = [
    createBooleanFlag("b", "box", "draw a box"),
    createIntegerFlag("r", "repeat", "repeat count"),
  ];

  it("finds by bare short or long id", () => {
    expect(findFlag(flags, "b")).toBe(flags[0]);
    expect(findFlag(flags, "repeat")).toBe(flags[1]);
  });

  it("finds by prefixed token", () => {
    expect(findFlag(flags, "-r")).toBe(flags[1]);
    expect(findFlag(flags, "--box")).toBe(flags[0]);
  });

  it("returns undefined when nothing matches", () => {
    expect(findFlag(flags, "x")).toBeUndefined();
  });
});

describe("formatFlag", () => {
  it("renders the help line with a tab before the description", () => {
    const flag = createBooleanFlag("f", "ferris", "say hello from ferris");
    expect(formatFlag(flag)).toBe("  -f, --ferris\tsay hello from ferris");
  });
});
