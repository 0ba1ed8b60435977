import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { createMockIO } from "@flagline/sdk/testing";
import { createHelloCommand } from "../src/hello.js";
import { FERRIS, frame } from "../src/ferris.js";

const metadata = { name: "@flagline/hello", version: "0.1.0" };

function run(args: string[]) {
  const io = createMockIO({ program: "hello", args });
  const command = createHelloCommand({ metadata, args: io.args, output: io.output });
  const result = command.execute();
  return { io, result, command };
}

describe("hello command", () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it("greets the input", () => {
    const { io, result } = run(["world"]);

    expect(result.kind).toBe("handled");
    expect(io.lines).toEqual(["hello, world!"]);
  });

  it("uses the program name without the package scope", () => {
    const { io, command } = run(["--version"]);

    expect(command.name).toBe("hello");
    expect(io.lines).toEqual(["hello version 0.1.0"]);
  });

  it("lists its flags in help output", () => {
    const { io } = run([]);

    expect(io.lines).toEqual([
      "gives a friendly hello",
      "",
      "Usage:",
      "  hello [FLAGS] TEXT",
      "",
      "Flags:",
      "  -h, --help\thelp for hello",
      "  -v, --version\tversion for hello",
      "  -f, --ferris\tsay hello from ferris",
      "  -g, --greeting\tgreeting to use instead of hello",
      "  -r, --repeat\tnumber of times to greet",
    ]);
  });

  it("replaces the greeting and repeats it", () => {
    const { io } = run(["-g", "howdy", "--repeat", "2", "partner"]);

    expect(io.lines).toEqual(["howdy, partner!", "howdy, partner!"]);
  });

  it("lets Ferris say the greeting with --ferris", () => {
    const { io } = run(["world", "--ferris"]);

    expect(io.lines).toEqual([
      "+---------------+",
      "| hello, world! |",
      "+---------------+",
      "        \\",
      "         \\",
      "            _~^~^~_",
      "        \\) /  o o  \\ (/",
      "          '_   -   _'",
      "          / '-----' \\",
    ]);
  });

  it("puts every repetition inside one bubble", () => {
    const { io } = run(["-f", "-r", "2", "world"]);

    expect(io.lines).toEqual([
      "+---------------+",
      "| hello, world! |",
      "| hello, world! |",
      "+---------------+",
      ...FERRIS,
    ]);
  });

  it("streams a large repeat count line by line", () => {
    const io = createMockIO({ program: "hello", args: ["-r", "100000", "world"] });
    const writeLine = vi.fn<(line: string) => void>();
    const command = createHelloCommand({ metadata, args: io.args, output: { writeLine } });

    command.execute();

    expect(writeLine).toHaveBeenCalledTimes(100000);
    expect(writeLine).toHaveBeenLastCalledWith("hello, world!");
  });

  it("prints nothing for a zero repeat count", () => {
    const { io, result } = run(["-r", "0", "world"]);

    expect(result.kind).toBe("handled");
    expect(io.lines).toEqual([]);
  });

  it("warns about unknown flags and still greets", () => {
    const { io } = run(["--loud", "world"]);

    expect(io.lines).toEqual(["hello, world!"]);
    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(String(consoleErrorSpy.mock.calls[0][0])).toContain("Unrecognized flag: --loud");
  });

  it("reports a bad repeat count", () => {
    const { io, result } = run(["-r", "twice", "world"]);

    expect(result.kind).toBe("invalid-flag-value");
    expect(io.lines).toEqual([]);
  });
});

describe("frame", () => {
  it("pads every line to the widest one", () => {
    expect(frame(["hi", "hello"])).toEqual([
      "+-------+",
      "| hi    |",
      "| hello |",
      "+-------+",
    ]);
  });
});
