export type CliCommand =
  | { name: "run" }
  | { name: "show-id" }
  | { name: "status" }
  | { name: "heartbeat" }
  | { name: "set-player-id"; playerId: string }
  | { name: "clear-player-id" }
  | { name: "set-server"; serverUrl: string }
  | { name: "reset-registration" };

export interface CliArgs {
  command: CliCommand;
  json: boolean;
  help?: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const requireValue = (name: string, value: string | undefined): string => {
  const normalized = value?.trim();
  if (!normalized || normalized.startsWith("--")) {
    throw new CliUsageError(`Missing value for ${name}`);
  }
  return normalized;
};

const parseCommand = (name: string, operands: string[]): CliCommand => {
  const [first, ...rest] = operands;
  const expectNone = () => {
    if (first !== undefined) {
      throw new CliUsageError(`Unexpected argument for ${name}: ${first}`);
    }
  };

  switch (name) {
    case "run":
    case "show-id":
    case "status":
    case "heartbeat":
    case "clear-player-id":
    case "reset-registration":
      expectNone();
      return { name };
    case "set-player-id":
      if (rest.length > 0) {
        throw new CliUsageError(`Unexpected argument for ${name}: ${rest[0]}`);
      }
      return { name, playerId: requireValue("set-player-id", first) };
    case "set-server":
      if (rest.length > 0) {
        throw new CliUsageError(`Unexpected argument for ${name}: ${rest[0]}`);
      }
      return { name, serverUrl: requireValue("set-server", first) };
    default:
      throw new CliUsageError(`Unknown command: ${name}`);
  }
};

export function parseCliArgs(argv: string[]): CliArgs {
  if (argv.includes("--help") || argv.includes("-h")) {
    return { command: { name: "run" }, json: false, help: true };
  }

  let json = false;
  const positional: string[] = [];
  for (const arg of argv) {
    if (arg === "--json") {
      json = true;
      continue;
    }
    if (arg.startsWith("-")) {
      throw new CliUsageError(`Unknown flag: ${arg}`);
    }
    positional.push(arg);
  }

  const [name, ...operands] = positional;
  return {
    command: name === undefined ? { name: "run" } : parseCommand(name, operands),
    json,
  };
}
