import { type CommandResult } from "#/application/use-cases/commands/command-executor";
import { type ReconcileResult } from "#/application/use-cases/content/content-reconciler";
import {
  type HeartbeatOutcome,
  type HeartbeatState,
  initialHeartbeatState,
} from "#/application/use-cases/heartbeat/heartbeat-client";
import {
  type ConnectivityMode,
  type ConnectivityState,
  initialConnectivityState,
  type ServerSignal,
} from "#/domain/connectivity/connectivity";
import { type DeviceConfig } from "#/domain/identity/registration";

export interface HeartbeatSummary {
  outcome: HeartbeatOutcome["type"];
  at: string;
}

/**
 * Everything the control loop carries from one cycle to the next. Phases take
 * a state and return the next one; nothing else is kept between cycles.
 */
export interface AgentState {
  cycle: number;
  /** Player id seen by the previous cycle; `undefined` before the first one. */
  knownPlayerId: string | null | undefined;
  connectivity: ConnectivityState;
  heartbeat: HeartbeatState;
  lastHeartbeat: HeartbeatSummary | null;
  lastError: string | null;
  refreshRequested: boolean;
  reconcilePending: boolean;
  lastCommand: CommandResult | null;
  lastReconcile: ReconcileResult | null;
  accessPointActive: boolean;
}

export const initialAgentState = (): AgentState => ({
  cycle: 0,
  knownPlayerId: undefined,
  connectivity: initialConnectivityState(),
  heartbeat: initialHeartbeatState(),
  lastHeartbeat: null,
  lastError: null,
  refreshRequested: false,
  reconcilePending: false,
  lastCommand: null,
  lastReconcile: null,
  accessPointActive: false,
});

export interface AgentStatus {
  deviceId: string;
  playerId: string | null;
  serverUrl: string;
  apiPrefix: string;
  mode: ConnectivityMode;
  serverSignal: ServerSignal;
  fallbackActive: boolean;
  accessPointActive: boolean;
  cycle: number;
  heartbeat: {
    consecutiveFailures: number;
    nextAttemptAt: string | null;
    lastSeenOnlineAt: string | null;
    last: HeartbeatSummary | null;
  };
  lastError: string | null;
  activePlaylistVersion: string | null;
  lastCommand: {
    commandId: string;
    kind: string;
    status: CommandResult["status"];
  } | null;
  lastReconcile: ReconcileResult["status"] | null;
}

export const describeAgentStatus = (input: {
  config: DeviceConfig;
  state: AgentState;
  activePlaylistVersion: string | null;
}): AgentStatus => {
  const { config, state } = input;
  return {
    deviceId: config.deviceId,
    playerId: config.playerId,
    serverUrl: config.serverUrl,
    apiPrefix: config.apiPrefix,
    mode: state.connectivity.mode,
    serverSignal: state.connectivity.serverSignal,
    fallbackActive: state.connectivity.fallbackActive,
    accessPointActive: state.accessPointActive,
    cycle: state.cycle,
    heartbeat: {
      consecutiveFailures: state.heartbeat.consecutiveFailures,
      nextAttemptAt:
        state.heartbeat.nextAttemptAtMs > 0
          ? new Date(state.heartbeat.nextAttemptAtMs).toISOString()
          : null,
      lastSeenOnlineAt: state.heartbeat.lastSeenOnlineAt,
      last: state.lastHeartbeat,
    },
    lastError: state.lastError,
    activePlaylistVersion: input.activePlaylistVersion,
    lastCommand: state.lastCommand
      ? {
          commandId: state.lastCommand.command.commandId,
          kind: state.lastCommand.command.kind,
          status: state.lastCommand.status,
        }
      : null,
    lastReconcile: state.lastReconcile?.status ?? null,
  };
};
