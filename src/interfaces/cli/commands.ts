import {
  describeError,
  NotConfiguredError,
  TransportError,
  ValidationError,
} from "#/application/errors";
import { initialHeartbeatState } from "#/application/use-cases/heartbeat/heartbeat-client";
import { CliUsageError, type CliCommand } from "#/interfaces/cli/args";
import { type AgentContainer } from "#/interfaces/container";
import { toRegistrationView } from "#/interfaces/registration-view";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID_ARGUMENT = 2;
export const EXIT_NOT_CONFIGURED = 3;
export const EXIT_TRANSPORT = 4;

export const usage = [
  "Usage: player-agent [command] [--json]",
  "",
  "Commands:",
  "  run                     Start the agent and the local API (default).",
  "  show-id                 Print the device id.",
  "  status                  Print registration, connectivity and active content.",
  "  heartbeat               Send one heartbeat; pending commands are reported, not executed.",
  "  set-player-id <id>      Associate the device with a player.",
  "  clear-player-id         Forget the player association.",
  "  set-server <url>        Point the agent at another control server.",
  "  reset-registration      Forget the player and executed commands; keep the device id.",
  "",
  "Flags:",
  "  --json                  Print machine-readable output.",
  "  --help, -h              Print this help and exit.",
  "",
  "Exit codes: 0 ok, 1 failure, 2 invalid argument, 3 not configured, 4 transport failure.",
].join("\n");

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out(line) {
    console.log(line);
  },
  err(line) {
    console.error(line);
  },
};

export const exitCodeFor = (error: unknown): number => {
  if (error instanceof CliUsageError || error instanceof ValidationError) {
    return EXIT_INVALID_ARGUMENT;
  }
  if (error instanceof NotConfiguredError) {
    return EXIT_NOT_CONFIGURED;
  }
  if (error instanceof TransportError) {
    return EXIT_TRANSPORT;
  }
  return EXIT_FAILURE;
};

type OneShotCommand = Exclude<CliCommand, { name: "run" }>;

interface Printer {
  line(text: string): void;
  result(text: string, value: unknown): void;
}

const printerFor = (output: CliOutput, json: boolean): Printer => ({
  line(text) {
    if (!json) output.out(text);
  },
  result(text, value) {
    output.out(json ? JSON.stringify(value) : text);
  },
});

const heartbeat = async (container: AgentContainer, print: Printer) => {
  const config = await container.identity.refresh();
  const active = await container.reconciler.activePlaylist();
  const { outcome } = await container.heartbeat.runCycle(
    initialHeartbeatState(),
    {
      config,
      currentContentRef: active?.playlistVersion ?? null,
      lastError: null,
    },
  );

  switch (outcome.type) {
    case "failed":
      throw outcome.error;
    case "unregistered":
      throw new NotConfiguredError(
        `Device ${config.deviceId} is not registered with ${config.serverUrl} yet`,
      );
    case "registered":
      print.result(`registered as player ${outcome.playerId}`, {
        outcome: outcome.type,
        playerId: outcome.playerId,
      });
      return;
    case "delivered": {
      const { pendingCommand, contentAssignment } = outcome.response;
      print.result(
        [
          `heartbeat delivered for player ${outcome.playerId}`,
          `pending command: ${pendingCommand ? `${pendingCommand.kind} (${pendingCommand.commandId}, not executed)` : "none"}`,
          `content assignment: ${contentAssignment?.playlistVersion ?? "none"}`,
        ].join("\n"),
        {
          outcome: outcome.type,
          playerId: outcome.playerId,
          pendingCommand,
          contentAssignment: contentAssignment
            ? {
                playlistVersion: contentAssignment.playlistVersion,
                items: contentAssignment.items.length,
              }
            : null,
          rejected: outcome.response.rejected,
        },
      );
      return;
    }
  }
};

const status = async (container: AgentContainer, print: Printer) => {
  const config = await container.identity.refresh();
  const [observation, active] = await Promise.all([
    container.monitor.probe(config),
    container.reconciler.activePlaylist(),
  ]);
  const view = {
    ...toRegistrationView(config),
    networkReachable: observation.networkReachable,
    serverReachable: observation.serverReachable,
    activePlaylistVersion: active?.playlistVersion ?? null,
  };
  print.result(
    [
      `device id:       ${view.deviceId}`,
      `player id:       ${view.playerId ?? "(none)"}`,
      `server:          ${view.serverUrl}${view.apiPrefix}`,
      `network:         ${view.networkReachable ? "reachable" : "unreachable"}`,
      `control server:  ${view.serverReachable ? "reachable" : "unreachable"}`,
      `active playlist: ${view.activePlaylistVersion ?? "(none)"}`,
    ].join("\n"),
    view,
  );
};

/** Runs a one-shot operator command and resolves its exit code. */
export const runCliCommand = async (input: {
  command: OneShotCommand;
  container: AgentContainer;
  json: boolean;
  output: CliOutput;
}): Promise<number> => {
  const { command, container, output } = input;
  const print = printerFor(output, input.json);

  try {
    switch (command.name) {
      case "show-id": {
        const deviceId = await container.identity.getOrCreateDeviceId();
        print.result(deviceId, { deviceId });
        break;
      }
      case "status":
        await status(container, print);
        break;
      case "heartbeat":
        await heartbeat(container, print);
        break;
      case "set-player-id": {
        const config = await container.identity.setPlayerId(command.playerId);
        print.result(
          `player id set to ${config.playerId}`,
          toRegistrationView(config),
        );
        break;
      }
      case "clear-player-id": {
        const config = await container.identity.clearPlayerId();
        print.result("player id cleared", toRegistrationView(config));
        break;
      }
      case "set-server": {
        const config = await container.identity.setServerUrl(command.serverUrl);
        print.result(
          `server set to ${config.serverUrl}`,
          toRegistrationView(config),
        );
        break;
      }
      case "reset-registration": {
        const config = await container.identity.resetRegistration();
        print.line(`device id ${config.deviceId} kept`);
        print.result("registration reset", toRegistrationView(config));
        break;
      }
    }
    return EXIT_OK;
  } catch (error) {
    output.err(`error: ${describeError(error)}`);
    return exitCodeFor(error);
  }
};
