import {
  ConfigError,
  describeError,
  ExecutionError,
  StorageError,
} from "#/application/errors";
import { type Clock } from "#/application/ports/clock";
import { type ControlServerClient } from "#/application/ports/control-server";
import {
  type DisplayPowerControl,
  type ScreenCapture,
  type SystemPowerControl,
} from "#/application/ports/device-control";
import { type CommandWatermarkStore } from "#/application/ports/documents";
import { type Logger } from "#/application/ports/observability";
import {
  type Command,
  type CommandWatermark,
  isNewerThanWatermark,
  isProcessTerminating,
} from "#/domain/commands/command";
import { type ServerEndpoint } from "#/domain/identity/registration";

export type CommandResult =
  | { status: "executed"; command: Command }
  | {
      status: "skipped";
      command: Command;
      reason: "already_executed" | "already_in_state";
    }
  | { status: "failed"; command: Command; error: ExecutionError };

export interface CommandContext {
  endpoint: ServerEndpoint;
  deviceId: string;
  playerId: string;
}

/**
 * Applies server commands at most once. The watermark of the newest executed
 * command is written before any side effect runs, so a crash mid-effect never
 * replays it.
 */
export class CommandExecutor {
  /** Watermark that could not be written; wins over what is on disk. */
  private unpersisted: CommandWatermark | null = null;

  constructor(
    private readonly deps: {
      watermarkStore: CommandWatermarkStore;
      displayPower: DisplayPowerControl;
      systemPower: SystemPowerControl;
      screenCapture: ScreenCapture;
      controlServer: ControlServerClient;
      clock: Clock;
      logger: Logger;
    },
  ) {}

  async apply(command: Command, context: CommandContext): Promise<CommandResult> {
    const watermark = await this.currentWatermark();
    if (!isNewerThanWatermark(command, watermark)) {
      return { status: "skipped", command, reason: "already_executed" };
    }

    const persisted = await this.advanceWatermark(command);
    if (!persisted && isProcessTerminating(command.kind)) {
      return this.fail(
        command,
        new ExecutionError(
          command.kind,
          "Command watermark could not be persisted; refusing to reboot",
        ),
      );
    }

    this.deps.logger.info(
      { commandId: command.commandId, kind: command.kind },
      "executing command",
    );

    try {
      const changed = await this.run(command, context);
      if (!changed) {
        return { status: "skipped", command, reason: "already_in_state" };
      }
      return { status: "executed", command };
    } catch (error) {
      return this.fail(
        command,
        new ExecutionError(
          command.kind,
          `${command.kind} failed: ${describeError(error)}`,
          { cause: error },
        ),
      );
    }
  }

  /** Forgets every executed command, on disk and in memory. */
  async resetWatermark(): Promise<void> {
    this.unpersisted = null;
    await this.deps.watermarkStore.remove();
  }

  private async run(command: Command, context: CommandContext): Promise<boolean> {
    switch (command.kind) {
      case "reboot":
        await this.deps.systemPower.reboot();
        return true;
      case "refresh":
        // The control loop forces reconciliation when it sees this result.
        return true;
      case "screen_on":
        return this.setDisplayPower("on");
      case "screen_off":
        return this.setDisplayPower("off");
      case "screenshot": {
        const image = await this.deps.screenCapture.capture();
        await this.deps.controlServer.uploadScreenshot(context.endpoint, {
          playerId: context.playerId,
          deviceId: context.deviceId,
          image,
          capturedAt: this.deps.clock.now(),
        });
        return true;
      }
    }
  }

  private async setDisplayPower(target: "on" | "off"): Promise<boolean> {
    const current = await this.deps.displayPower.getState().catch(
      (error: unknown) => {
        this.deps.logger.debug(
          { err: error },
          "display power state unavailable; applying anyway",
        );
        return "unknown" as const;
      },
    );
    if (current === target) {
      return false;
    }
    await this.deps.displayPower.setState(target);
    return true;
  }

  private async currentWatermark(): Promise<CommandWatermark | null> {
    if (this.unpersisted) {
      return this.unpersisted;
    }
    try {
      return await this.deps.watermarkStore.read();
    } catch (error) {
      if (error instanceof ConfigError || error instanceof StorageError) {
        this.deps.logger.warn(
          { err: error },
          "command watermark unreadable; treating as absent",
        );
        return null;
      }
      throw error;
    }
  }

  private async advanceWatermark(command: Command): Promise<boolean> {
    const watermark: CommandWatermark = {
      commandId: command.commandId,
      issuedAt: command.issuedAt,
      executedAt: this.deps.clock.now().toISOString(),
    };
    try {
      await this.deps.watermarkStore.write(watermark);
      this.unpersisted = null;
      return true;
    } catch (error) {
      // A refused reboot must stay eligible for the next delivery.
      if (isProcessTerminating(command.kind)) {
        this.deps.logger.warn(
          { err: error, commandId: command.commandId },
          "command watermark could not be persisted",
        );
        return false;
      }
      this.unpersisted = watermark;
      this.deps.logger.warn(
        { err: error, commandId: command.commandId },
        "command watermark kept in memory only",
      );
      return false;
    }
  }

  private fail(command: Command, error: ExecutionError): CommandResult {
    this.deps.logger.error(
      { err: error, commandId: command.commandId, kind: command.kind },
      "command failed",
    );
    return { status: "failed", command, error };
  }
}
