export type ConnectivityMode = "NO_NETWORK" | "NETWORK_NO_SERVER" | "SERVER_ONLINE";

/**
 * Server reachability as seen by both detectors: the lightweight probe and
 * the heartbeat failure streak. `degraded` means the probe answers but
 * heartbeats keep failing.
 */
export type ServerSignal = "reachable" | "unreachable" | "degraded";

export interface ConnectivityPolicy {
  fallbackGraceCycles: number;
  degradedAfterHeartbeatFailures: number;
}

export interface ConnectivityState {
  mode: ConnectivityMode;
  networkReachable: boolean;
  serverProbeReachable: boolean;
  serverSignal: ServerSignal;
  heartbeatFailureStreak: number;
  noNetworkStreak: number;
  fallbackActive: boolean;
}

export interface ProbeObservation {
  networkReachable: boolean;
  serverReachable: boolean;
}

export const DEFAULT_CONNECTIVITY_POLICY: ConnectivityPolicy = {
  fallbackGraceCycles: 3,
  degradedAfterHeartbeatFailures: 3,
};

export const initialConnectivityState = (): ConnectivityState => ({
  mode: "NO_NETWORK",
  networkReachable: false,
  serverProbeReachable: false,
  serverSignal: "unreachable",
  heartbeatFailureStreak: 0,
  noNetworkStreak: 0,
  fallbackActive: false,
});

const deriveServerSignal = (
  serverProbeReachable: boolean,
  heartbeatFailureStreak: number,
  policy: ConnectivityPolicy,
): ServerSignal => {
  if (!serverProbeReachable) return "unreachable";
  return heartbeatFailureStreak >= policy.degradedAfterHeartbeatFailures
    ? "degraded"
    : "reachable";
};

const deriveMode = (
  networkReachable: boolean,
  serverSignal: ServerSignal,
): ConnectivityMode => {
  if (!networkReachable) return "NO_NETWORK";
  return serverSignal === "reachable" ? "SERVER_ONLINE" : "NETWORK_NO_SERVER";
};

const withDerivedFields = (
  state: Omit<ConnectivityState, "mode" | "serverSignal">,
  policy: ConnectivityPolicy,
): ConnectivityState => {
  const serverSignal = deriveServerSignal(
    state.serverProbeReachable,
    state.heartbeatFailureStreak,
    policy,
  );
  return {
    ...state,
    serverSignal,
    mode: deriveMode(state.networkReachable, serverSignal),
  };
};

/**
 * Fallback needs `fallbackGraceCycles` consecutive NO_NETWORK observations to
 * activate, and a single observation outside NO_NETWORK to deactivate.
 */
export const applyProbeObservation = (
  state: ConnectivityState,
  observation: ProbeObservation,
  policy: ConnectivityPolicy,
): ConnectivityState => {
  const networkReachable = observation.networkReachable;
  const noNetworkStreak = networkReachable ? 0 : state.noNetworkStreak + 1;

  return withDerivedFields(
    {
      networkReachable,
      serverProbeReachable: networkReachable && observation.serverReachable,
      heartbeatFailureStreak: state.heartbeatFailureStreak,
      noNetworkStreak,
      fallbackActive:
        !networkReachable && noNetworkStreak >= policy.fallbackGraceCycles,
    },
    policy,
  );
};

export const applyHeartbeatOutcome = (
  state: ConnectivityState,
  outcome: "success" | "failure",
  policy: ConnectivityPolicy,
): ConnectivityState =>
  withDerivedFields(
    {
      networkReachable: state.networkReachable,
      serverProbeReachable: state.serverProbeReachable,
      heartbeatFailureStreak:
        outcome === "success" ? 0 : state.heartbeatFailureStreak + 1,
      noNetworkStreak: state.noNetworkStreak,
      fallbackActive: state.fallbackActive,
    },
    policy,
  );

/** Heartbeats keep being attempted while degraded so that a success can clear it. */
export const canAttemptHeartbeat = (state: ConnectivityState): boolean =>
  state.networkReachable && state.serverProbeReachable;
