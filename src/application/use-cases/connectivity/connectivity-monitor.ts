import { type ControlServerClient } from "#/application/ports/control-server";
import { type NetworkProbe } from "#/application/ports/network";
import { type Logger } from "#/application/ports/observability";
import {
  applyHeartbeatOutcome,
  applyProbeObservation,
  type ConnectivityPolicy,
  type ConnectivityState,
  type ProbeObservation,
} from "#/domain/connectivity/connectivity";
import { type ServerEndpoint } from "#/domain/identity/registration";

const hostOf = (serverUrl: string): string | null => {
  try {
    return new URL(serverUrl).hostname;
  } catch {
    return null;
  }
};

export class ConnectivityMonitor {
  constructor(
    private readonly deps: {
      networkProbe: NetworkProbe;
      controlServer: ControlServerClient;
      policy: ConnectivityPolicy;
      logger: Logger;
    },
  ) {}

  async probe(endpoint: ServerEndpoint): Promise<ProbeObservation> {
    const host = hostOf(endpoint.serverUrl);
    if (!host) {
      this.deps.logger.warn(
        { serverUrl: endpoint.serverUrl },
        "server URL has no host; treating network as unreachable",
      );
      return { networkReachable: false, serverReachable: false };
    }

    const networkReachable = await this.deps.networkProbe
      .isLocalNetworkReachable(host)
      .catch((error: unknown) => {
        this.deps.logger.debug({ err: error, host }, "network probe failed");
        return false;
      });
    if (!networkReachable) {
      return { networkReachable: false, serverReachable: false };
    }

    const serverReachable = await this.deps.controlServer
      .checkHealth(endpoint)
      .catch((error: unknown) => {
        this.deps.logger.debug(
          { err: error, serverUrl: endpoint.serverUrl },
          "server probe failed",
        );
        return false;
      });

    return { networkReachable, serverReachable };
  }

  async observe(
    state: ConnectivityState,
    endpoint: ServerEndpoint,
  ): Promise<ConnectivityState> {
    const observation = await this.probe(endpoint);
    const next = applyProbeObservation(state, observation, this.deps.policy);
    this.logTransition(state, next, "probe");
    return next;
  }

  recordHeartbeat(
    state: ConnectivityState,
    outcome: "success" | "failure",
  ): ConnectivityState {
    const next = applyHeartbeatOutcome(state, outcome, this.deps.policy);
    this.logTransition(state, next, "heartbeat");
    return next;
  }

  private logTransition(
    previous: ConnectivityState,
    next: ConnectivityState,
    source: "probe" | "heartbeat",
  ) {
    if (previous.mode !== next.mode) {
      this.deps.logger.info(
        { from: previous.mode, to: next.mode, source },
        "connectivity mode changed",
      );
    }
    if (previous.serverSignal !== next.serverSignal) {
      this.deps.logger.info(
        {
          from: previous.serverSignal,
          to: next.serverSignal,
          heartbeatFailureStreak: next.heartbeatFailureStreak,
          source,
        },
        "server signal changed",
      );
    }
    if (previous.fallbackActive !== next.fallbackActive) {
      this.deps.logger.warn(
        {
          fallbackActive: next.fallbackActive,
          noNetworkStreak: next.noNetworkStreak,
        },
        next.fallbackActive
          ? "no network past grace period; access-point fallback requested"
          : "network recovered; access-point fallback released",
      );
    }
  }
}
