import { describe, expect, test } from "vitest";
import { CliUsageError, parseCliArgs } from "#/interfaces/cli/args";

describe("parseCliArgs", () => {
  test("runs the agent without a command", () => {
    expect(parseCliArgs([])).toEqual({ command: { name: "run" }, json: false });
  });

  test("parses commands with and without operands", () => {
    expect(parseCliArgs(["status", "--json"])).toEqual({
      command: { name: "status" },
      json: true,
    });
    expect(parseCliArgs(["set-player-id", " 42 "])).toEqual({
      command: { name: "set-player-id", playerId: "42" },
      json: false,
    });
    expect(parseCliArgs(["--json", "set-server", "http://10.0.0.5"])).toEqual({
      command: { name: "set-server", serverUrl: "http://10.0.0.5" },
      json: true,
    });
  });

  test("prefers help over everything else", () => {
    expect(parseCliArgs(["bogus", "-h"])).toEqual({
      command: { name: "run" },
      json: false,
      help: true,
    });
  });

  test.each([
    [["--verbose"], "Unknown flag: --verbose"],
    [["flash"], "Unknown command: flash"],
    [["set-player-id"], "Missing value for set-player-id"],
    [["set-server", "   "], "Missing value for set-server"],
    [["status", "now"], "Unexpected argument for status: now"],
    [["set-player-id", "1", "2"], "Unexpected argument for set-player-id: 2"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new CliUsageError(message));
  });
});
