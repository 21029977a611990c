import { describeError, TransportError } from "#/application/errors";
import { type Clock } from "#/application/ports/clock";
import {
  type ControlServerClient,
  type HeartbeatRecord,
  type HeartbeatResponse,
} from "#/application/ports/control-server";
import {
  type DisplayPowerControl,
  type DisplayPowerState,
} from "#/application/ports/device-control";
import {
  type SystemInfo,
  type SystemInfoProvider,
} from "#/application/ports/hardware";
import { type Logger } from "#/application/ports/observability";
import { type IdentityStore } from "#/application/use-cases/identity/identity-store";
import { heartbeatDelayMs } from "#/domain/heartbeat/backoff";
import { type DeviceConfig } from "#/domain/identity/registration";

export interface HeartbeatState {
  consecutiveFailures: number;
  /** Epoch millis; `0` means due now. */
  nextAttemptAtMs: number;
  lastSeenOnlineAt: string | null;
  /**
   * Content ref the server last acknowledged with a 2xx. `undefined` until
   * the first acknowledgement so that the initial heartbeat always reports it.
   */
  lastAcknowledgedContentRef: string | null | undefined;
}

export type HeartbeatOutcome =
  | { type: "registered"; playerId: string }
  | { type: "unregistered" }
  | { type: "delivered"; playerId: string; response: HeartbeatResponse }
  | { type: "failed"; error: Error };

export interface HeartbeatCycleInput {
  config: DeviceConfig;
  currentContentRef: string | null;
  lastError: string | null;
}

export const initialHeartbeatState = (): HeartbeatState => ({
  consecutiveFailures: 0,
  nextAttemptAtMs: 0,
  lastSeenOnlineAt: null,
  lastAcknowledgedContentRef: undefined,
});

const UNKNOWN_SYSTEM_INFO: SystemInfo = {
  ipAddress: null,
  macAddress: null,
  storageUsedBytes: 0,
  storageTotalBytes: 0,
  screenResolution: "unknown",
  uptimeSeconds: 0,
  agentVersion: "unknown",
};

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export class HeartbeatClient {
  constructor(
    private readonly deps: {
      controlServer: ControlServerClient;
      identity: IdentityStore;
      systemInfo: SystemInfoProvider;
      displayPower: DisplayPowerControl;
      clock: Clock;
      logger: Logger;
    },
  ) {}

  isDue(state: HeartbeatState): boolean {
    return this.deps.clock.now().getTime() >= state.nextAttemptAtMs;
  }

  /**
   * One exchange with the control server: the registration lookup while no
   * player id is known, the heartbeat itself afterwards. Failures are returned
   * as an outcome and folded into the backoff, never thrown.
   */
  async runCycle(
    state: HeartbeatState,
    input: HeartbeatCycleInput,
  ): Promise<{ state: HeartbeatState; outcome: HeartbeatOutcome }> {
    if (input.config.playerId === null) {
      return this.lookupRegistration(state, input.config);
    }
    return this.sendHeartbeat(state, input, input.config.playerId);
  }

  /** Makes the next heartbeat due immediately without touching the backoff. */
  dueNow(state: HeartbeatState): HeartbeatState {
    return { ...state, nextAttemptAtMs: 0 };
  }

  private async lookupRegistration(
    state: HeartbeatState,
    config: DeviceConfig,
  ): Promise<{ state: HeartbeatState; outcome: HeartbeatOutcome }> {
    try {
      const lookup = await this.deps.controlServer.lookupRegistration(
        config,
        config.deviceId,
      );
      const next = this.succeeded(state, config);
      if (!lookup.registered || lookup.playerId === null) {
        this.deps.logger.info(
          { deviceId: config.deviceId },
          "device not registered yet; waiting for operator",
        );
        return { state: next, outcome: { type: "unregistered" } };
      }

      const { current } = await this.deps.identity.adoptPlayerId(
        lookup.playerId,
      );
      return {
        state: next,
        outcome: { type: "registered", playerId: current },
      };
    } catch (error) {
      return this.failed(state, config, error, "registration lookup failed");
    }
  }

  private async sendHeartbeat(
    state: HeartbeatState,
    input: HeartbeatCycleInput,
    playerId: string,
  ): Promise<{ state: HeartbeatState; outcome: HeartbeatOutcome }> {
    const contentChanged =
      input.currentContentRef !== state.lastAcknowledgedContentRef;
    const record = await this.buildRecord(input, playerId, contentChanged);

    try {
      const response = await this.deps.controlServer.sendHeartbeat(
        input.config,
        record,
      );
      if (response.rejected.length > 0) {
        this.deps.logger.warn(
          { rejected: response.rejected, playerId },
          "heartbeat response contained unparseable parts; they were dropped",
        );
      }
      const next = this.succeeded(state, input.config);
      return {
        state: contentChanged
          ? { ...next, lastAcknowledgedContentRef: input.currentContentRef }
          : next,
        outcome: { type: "delivered", playerId, response },
      };
    } catch (error) {
      return this.failed(state, input.config, error, "heartbeat failed");
    }
  }

  private async buildRecord(
    input: HeartbeatCycleInput,
    playerId: string,
    includeContentRef: boolean,
  ): Promise<HeartbeatRecord> {
    const [systemInfo, displayPower] = await Promise.all([
      this.collectSystemInfo(),
      this.readDisplayPower(),
    ]);

    return {
      deviceId: input.config.deviceId,
      playerId,
      ipAddress: systemInfo.ipAddress,
      macAddress: systemInfo.macAddress,
      ...(includeContentRef
        ? { currentContentRef: input.currentContentRef }
        : {}),
      systemInfo: { ...systemInfo, displayPower },
      timestamp: this.deps.clock.now().toISOString(),
      lastError: input.lastError,
    };
  }

  private async collectSystemInfo(): Promise<SystemInfo> {
    try {
      return await this.deps.systemInfo.collect();
    } catch (error) {
      this.deps.logger.warn({ err: error }, "system info unavailable");
      return UNKNOWN_SYSTEM_INFO;
    }
  }

  private async readDisplayPower(): Promise<DisplayPowerState> {
    try {
      return await this.deps.displayPower.getState();
    } catch (error) {
      this.deps.logger.debug({ err: error }, "display power state unavailable");
      return "unknown";
    }
  }

  private succeeded(state: HeartbeatState, config: DeviceConfig): HeartbeatState {
    const now = this.deps.clock.now();
    if (state.consecutiveFailures > 0) {
      this.deps.logger.info(
        { previousFailures: state.consecutiveFailures },
        "control server reachable again",
      );
    }
    return {
      ...state,
      consecutiveFailures: 0,
      nextAttemptAtMs:
        now.getTime() + heartbeatDelayMs(config.heartbeatIntervalSeconds * 1000, 0),
      lastSeenOnlineAt: now.toISOString(),
    };
  }

  private failed(
    state: HeartbeatState,
    config: DeviceConfig,
    error: unknown,
    message: string,
  ): { state: HeartbeatState; outcome: HeartbeatOutcome } {
    const consecutiveFailures = state.consecutiveFailures + 1;
    const delayMs = heartbeatDelayMs(
      config.heartbeatIntervalSeconds * 1000,
      consecutiveFailures,
    );
    this.deps.logger.warn(
      {
        err: error,
        reason: error instanceof TransportError ? error.reason : undefined,
        status: error instanceof TransportError ? error.status : undefined,
        consecutiveFailures,
        retryInMs: delayMs,
      },
      `${message}: ${describeError(error)}`,
    );
    return {
      state: {
        ...state,
        consecutiveFailures,
        nextAttemptAtMs: this.deps.clock.now().getTime() + delayMs,
      },
      outcome: { type: "failed", error: toError(error) },
    };
  }
}
