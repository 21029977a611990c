import { describeError } from "#/application/errors";
import { type Clock } from "#/application/ports/clock";
import { type Logger } from "#/application/ports/observability";
import {
  type AgentState,
  type AgentStatus,
  describeAgentStatus,
  initialAgentState,
} from "#/application/use-cases/agent/agent-state";
import { type CommandExecutor } from "#/application/use-cases/commands/command-executor";
import { type ConnectivityMonitor } from "#/application/use-cases/connectivity/connectivity-monitor";
import { type ContentReconciler } from "#/application/use-cases/content/content-reconciler";
import {
  type HeartbeatClient,
  type HeartbeatOutcome,
} from "#/application/use-cases/heartbeat/heartbeat-client";
import { type IdentityStore } from "#/application/use-cases/identity/identity-store";
import { type AccessPointProvisioner } from "#/application/use-cases/provisioning/access-point-provisioner";
import { canAttemptHeartbeat } from "#/domain/connectivity/connectivity";
import { type DeviceConfig } from "#/domain/identity/registration";

type DeliveredOutcome = Extract<HeartbeatOutcome, { type: "delivered" }>;

export interface AgentControlLoopDeps {
  identity: IdentityStore;
  monitor: ConnectivityMonitor;
  provisioner: AccessPointProvisioner;
  heartbeat: HeartbeatClient;
  executor: CommandExecutor;
  reconciler: ContentReconciler;
  clock: Clock;
  probeIntervalMs: number;
  logger: Logger;
}

/**
 * Drives one cycle at a time through probe, provisioning, heartbeat,
 * command and reconcile phases. A cycle never rejects; failures end up in
 * `lastError` and the backoff.
 */
export class AgentControlLoop {
  private state: AgentState = initialAgentState();
  private inFlight: Promise<AgentState> | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private heartbeatForced = false;
  private immediateRequested = false;

  constructor(private readonly deps: AgentControlLoopDeps) {}

  getState(): AgentState {
    return this.state;
  }

  async status(): Promise<AgentStatus> {
    const config = await this.deps.identity.refresh();
    const active = await this.deps.reconciler.activePlaylist();
    return describeAgentStatus({
      config,
      state: this.state,
      activePlaylistVersion: active?.playlistVersion ?? null,
    });
  }

  /** Runs one cycle, or joins the one already running. */
  tick(): Promise<AgentState> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.inFlight = this.runCycle().finally(() => {
      this.inFlight = null;
      if (this.immediateRequested) {
        this.immediateRequested = false;
        this.scheduleNext(0);
      }
    });
    return this.inFlight;
  }

  /** Makes the next heartbeat due now and runs a fresh cycle for it. */
  async forceHeartbeat(): Promise<AgentState> {
    this.heartbeatForced = true;
    if (this.inFlight) {
      await this.inFlight;
    }
    return this.tick();
  }

  /** Asks the running loop to start its next cycle without waiting for the interval. */
  requestImmediateCycle(): void {
    if (this.inFlight) {
      this.immediateRequested = true;
      return;
    }
    this.scheduleNext(0);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.deps.logger.info(
      { probeIntervalMs: this.deps.probeIntervalMs },
      "agent control loop started",
    );
    this.scheduleNext(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.deps.logger.info({ cycle: this.state.cycle }, "agent control loop stopped");
  }

  async probePhase(state: AgentState, config: DeviceConfig): Promise<AgentState> {
    const previousMode = state.connectivity.mode;
    const connectivity = await this.deps.monitor.observe(
      state.connectivity,
      config,
    );
    const enteredOnline =
      connectivity.mode === "SERVER_ONLINE" && previousMode !== "SERVER_ONLINE";
    return {
      ...state,
      connectivity,
      heartbeat: enteredOnline
        ? this.deps.heartbeat.dueNow(state.heartbeat)
        : state.heartbeat,
    };
  }

  async provisioningPhase(state: AgentState): Promise<AgentState> {
    const { provisioner } = this.deps;
    let lastError = state.lastError;
    try {
      if (state.connectivity.fallbackActive) {
        await provisioner.activate();
      } else {
        await provisioner.deactivate();
      }
    } catch (error) {
      lastError = `access point: ${describeError(error)}`;
      this.deps.logger.error({ err: error }, "access point control failed");
    }
    return { ...state, lastError, accessPointActive: provisioner.isActive() };
  }

  async heartbeatPhase(
    state: AgentState,
    config: DeviceConfig,
  ): Promise<{ state: AgentState; outcome: HeartbeatOutcome | null }> {
    if (
      !canAttemptHeartbeat(state.connectivity) ||
      !this.deps.heartbeat.isDue(state.heartbeat)
    ) {
      return { state, outcome: null };
    }

    const active = await this.deps.reconciler.activePlaylist();
    const result = await this.deps.heartbeat.runCycle(state.heartbeat, {
      config,
      currentContentRef: active?.playlistVersion ?? null,
      lastError: state.lastError,
    });
    const { outcome } = result;
    const failed = outcome.type === "failed";
    const connectivity = this.deps.monitor.recordHeartbeat(
      state.connectivity,
      failed ? "failure" : "success",
    );

    let lastError = state.lastError;
    if (outcome.type === "failed") {
      lastError = describeError(outcome.error);
    } else if (outcome.type === "delivered") {
      lastError = null;
    }

    return {
      state: {
        ...state,
        connectivity,
        heartbeat:
          outcome.type === "registered"
            ? this.deps.heartbeat.dueNow(result.state)
            : result.state,
        lastHeartbeat: {
          outcome: outcome.type,
          at: this.deps.clock.now().toISOString(),
        },
        lastError,
      },
      outcome,
    };
  }

  /**
   * Picks up player id changes made outside the loop (operator CLI or local
   * API). Moving from one player to another re-homes the device.
   */
  async registrationChangePhase(
    state: AgentState,
    config: DeviceConfig,
  ): Promise<AgentState> {
    const known = state.knownPlayerId;
    if (known === undefined || known === config.playerId) {
      return { ...state, knownPlayerId: config.playerId };
    }

    this.deps.logger.info(
      { previous: known, playerId: config.playerId },
      "player id changed locally",
    );
    const next = { ...state, knownPlayerId: config.playerId };
    return known === null ? next : this.rehome(next);
  }

  /**
   * A different player id in a heartbeat response re-homes the device. The
   * rest of that response belongs to the old player and is dropped.
   */
  async registrationPhase(
    state: AgentState,
    outcome: DeliveredOutcome,
  ): Promise<{ state: AgentState; reassigned: boolean }> {
    const incoming = outcome.response.playerId;
    if (incoming === null || incoming === outcome.playerId) {
      return { state, reassigned: false };
    }

    try {
      await this.deps.identity.adoptPlayerId(incoming);
    } catch (error) {
      this.deps.logger.error(
        { err: error, playerId: incoming },
        "player id from control server rejected",
      );
      return {
        state: { ...state, lastError: describeError(error) },
        reassigned: true,
      };
    }

    this.deps.logger.warn(
      { previous: outcome.playerId, playerId: incoming },
      "player id reassigned by control server",
    );
    return {
      state: await this.rehome({ ...state, knownPlayerId: incoming }),
      reassigned: true,
    };
  }

  async commandPhase(
    state: AgentState,
    config: DeviceConfig,
    outcome: DeliveredOutcome,
  ): Promise<AgentState> {
    const command = outcome.response.pendingCommand;
    if (!command) {
      return state;
    }

    try {
      const result = await this.deps.executor.apply(command, {
        endpoint: config,
        deviceId: config.deviceId,
        playerId: outcome.playerId,
      });
      return {
        ...state,
        lastCommand: result,
        lastError:
          result.status === "failed" ? result.error.message : state.lastError,
        refreshRequested:
          state.refreshRequested ||
          (result.status === "executed" && command.kind === "refresh"),
      };
    } catch (error) {
      this.deps.logger.error(
        { err: error, commandId: command.commandId },
        "command could not be applied",
      );
      return { ...state, lastError: describeError(error) };
    }
  }

  async assignmentPhase(
    state: AgentState,
    outcome: DeliveredOutcome,
  ): Promise<AgentState> {
    const assignment = outcome.response.contentAssignment;
    if (!assignment) {
      return state;
    }
    const changed = await this.deps.reconciler.accept(assignment);
    return changed ? { ...state, reconcilePending: true } : state;
  }

  async reconcilePhase(
    state: AgentState,
    config: DeviceConfig,
  ): Promise<AgentState> {
    const due =
      state.reconcilePending || state.refreshRequested || state.cycle === 1;
    if (!due || !state.connectivity.networkReachable) {
      return state;
    }

    const result = await this.deps.reconciler.reconcile({
      serverUrl: config.serverUrl,
      force: state.refreshRequested,
    });
    const unfinished =
      result.status === "incomplete" || result.status === "failed";

    let lastError = state.lastError;
    if (result.status === "incomplete") {
      lastError = `content ${result.playlistVersion} incomplete: ${result.missing.length} item(s) missing`;
    } else if (result.status === "failed") {
      lastError = result.error;
    }

    return {
      ...state,
      lastReconcile: result,
      reconcilePending: unfinished,
      refreshRequested: state.refreshRequested && unfinished,
      lastError,
    };
  }

  private async runCycle(): Promise<AgentState> {
    let state: AgentState = { ...this.state, cycle: this.state.cycle + 1 };
    if (this.heartbeatForced) {
      this.heartbeatForced = false;
      state = { ...state, heartbeat: this.deps.heartbeat.dueNow(state.heartbeat) };
    }

    try {
      const config = await this.deps.identity.refresh();
      state = await this.registrationChangePhase(state, config);
      state = await this.probePhase(state, config);
      state = await this.provisioningPhase(state);

      const heartbeat = await this.heartbeatPhase(state, config);
      state = heartbeat.state;
      if (heartbeat.outcome?.type === "delivered") {
        const registration = await this.registrationPhase(
          state,
          heartbeat.outcome,
        );
        state = registration.state;
        if (!registration.reassigned) {
          state = await this.commandPhase(state, config, heartbeat.outcome);
          state = await this.assignmentPhase(state, heartbeat.outcome);
        }
      }

      state = await this.reconcilePhase(state, config);
    } catch (error) {
      this.deps.logger.error(
        { err: error, cycle: state.cycle },
        "agent cycle aborted",
      );
      state = { ...state, lastError: describeError(error) };
    }

    this.state = state;
    return state;
  }

  /**
   * Drops the command watermark and the cached assignment of the previous
   * player. The active playlist keeps playing until the new player's
   * assignment is complete; its media are collected after that swap.
   */
  private async rehome(state: AgentState): Promise<AgentState> {
    await this.deps.executor.resetWatermark().catch((error: unknown) => {
      this.deps.logger.warn({ err: error }, "command watermark reset failed");
    });
    await this.deps.reconciler
      .discardCachedAssignment()
      .catch((error: unknown) => {
        this.deps.logger.warn({ err: error }, "cached assignment reset failed");
      });
    return {
      ...state,
      heartbeat: this.deps.heartbeat.dueNow(state.heartbeat),
      reconcilePending: false,
      refreshRequested: false,
    };
  }

  private scheduleNext(delayMs: number): void {
    if (!this.running) return;
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick().then(() => {
        if (!this.timer) {
          this.scheduleNext(this.deps.probeIntervalMs);
        }
      });
    }, delayMs);
  }
}
