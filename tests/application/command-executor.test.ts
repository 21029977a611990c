import { describe, expect, test } from "vitest";
import { ConfigError, ExecutionError, TransportError } from "#/application/errors";
import { silentLogger } from "#/application/ports/observability";
import {
  type CommandContext,
  CommandExecutor,
} from "#/application/use-cases/commands/command-executor";
import { type Command, type CommandWatermark } from "#/domain/commands/command";
import {
  FakeClock,
  FakeControlServer,
  FakeDisplayPower,
  MemoryDocumentStore,
} from "../helpers/fakes";

const CONTEXT: CommandContext = {
  endpoint: { serverUrl: "https://signage.test", apiPrefix: "/api/v1" },
  deviceId: "DIG0123456789A",
  playerId: "12",
};

const command = (commandId: string, kind: Command["kind"]): Command => ({
  commandId,
  kind,
  issuedAt: null,
});

const setup = () => {
  const watermarkStore = new MemoryDocumentStore<CommandWatermark>();
  const displayPower = new FakeDisplayPower("on");
  const controlServer = new FakeControlServer();
  const reboots: Array<string | null> = [];
  const executor = new CommandExecutor({
    watermarkStore,
    displayPower,
    systemPower: {
      reboot: async () => {
        reboots.push(watermarkStore.value?.commandId ?? null);
      },
    },
    screenCapture: { capture: async () => new Uint8Array([1, 2, 3]) },
    controlServer,
    clock: new FakeClock(),
    logger: silentLogger,
  });
  return { executor, watermarkStore, displayPower, controlServer, reboots };
};

describe("CommandExecutor", () => {
  test("the same screen_off delivered twice switches the display once", async () => {
    const { executor, displayPower, watermarkStore } = setup();

    const first = await executor.apply(command("1", "screen_off"), CONTEXT);
    const second = await executor.apply(command("1", "screen_off"), CONTEXT);

    expect(first.status).toBe("executed");
    expect(second).toMatchObject({ status: "skipped", reason: "already_executed" });
    expect(displayPower.sets).toEqual(["off"]);
    expect(watermarkStore.value).toEqual({
      commandId: "1",
      issuedAt: null,
      executedAt: "2025-01-01T00:00:00.000Z",
    });
  });

  test("a display already in the target state is left alone", async () => {
    const { executor, displayPower, watermarkStore } = setup();

    const result = await executor.apply(command("2", "screen_on"), CONTEXT);

    expect(result).toMatchObject({ status: "skipped", reason: "already_in_state" });
    expect(displayPower.sets).toEqual([]);
    expect(watermarkStore.value?.commandId).toBe("2");
  });

  test("older commands are not replayed", async () => {
    const { executor, displayPower } = setup();

    await executor.apply(command("10", "screen_off"), CONTEXT);
    const result = await executor.apply(command("9", "screen_on"), CONTEXT);

    expect(result.status).toBe("skipped");
    expect(displayPower.sets).toEqual(["off"]);
  });

  test("the watermark is on disk before the reboot starts", async () => {
    const { executor, reboots } = setup();

    const result = await executor.apply(command("7", "reboot"), CONTEXT);

    expect(result.status).toBe("executed");
    expect(reboots).toEqual(["7"]);
  });

  test("refuses to reboot when the watermark cannot be persisted", async () => {
    const { executor, watermarkStore, reboots } = setup();
    watermarkStore.failWrites = true;

    const result = await executor.apply(command("7", "reboot"), CONTEXT);

    expect(result.status).toBe("failed");
    expect(result.status === "failed" && result.error.message).toBe(
      "Command watermark could not be persisted; refusing to reboot",
    );
    expect(reboots).toEqual([]);
  });

  test("a refused reboot runs once the watermark can be written again", async () => {
    const { executor, watermarkStore, reboots } = setup();
    watermarkStore.failWrites = true;

    const refused = await executor.apply(command("7", "reboot"), CONTEXT);
    watermarkStore.failWrites = false;
    const retried = await executor.apply(command("7", "reboot"), CONTEXT);

    expect(refused.status).toBe("failed");
    expect(retried.status).toBe("executed");
    expect(reboots).toEqual(["7"]);
  });

  test("keeps an unwritable watermark in memory for other kinds", async () => {
    const { executor, watermarkStore, displayPower } = setup();
    watermarkStore.failWrites = true;

    await executor.apply(command("3", "screen_off"), CONTEXT);
    const replay = await executor.apply(command("3", "screen_off"), CONTEXT);

    expect(replay.status).toBe("skipped");
    expect(displayPower.sets).toEqual(["off"]);
  });

  test("treats a corrupt watermark as absent", async () => {
    const { executor, watermarkStore } = setup();
    watermarkStore.readError = new ConfigError("command watermark is not valid JSON");

    const result = await executor.apply(command("4", "refresh"), CONTEXT);

    expect(result.status).toBe("executed");
  });

  test("uploads screenshots for the current player", async () => {
    const { executor, controlServer } = setup();

    const result = await executor.apply(command("5", "screenshot"), CONTEXT);

    expect(result.status).toBe("executed");
    expect(controlServer.screenshots).toEqual([
      { playerId: "12", bytes: 3, capturedAt: "2025-01-01T00:00:00.000Z" },
    ]);
  });

  test("reports a failed side effect once as an execution error", async () => {
    const { executor, controlServer } = setup();
    controlServer.uploadError = new TransportError(
      "Screenshot upload failed: HTTP 500",
      "http",
      500,
    );

    const first = await executor.apply(command("6", "screenshot"), CONTEXT);
    const again = await executor.apply(command("6", "screenshot"), CONTEXT);

    expect(first.status).toBe("failed");
    if (first.status === "failed") {
      expect(first.error).toBeInstanceOf(ExecutionError);
      expect(first.error.kind).toBe("screenshot");
      expect(first.error.message).toBe(
        "screenshot failed: Screenshot upload failed: HTTP 500",
      );
    }
    expect(again.status).toBe("skipped");
  });

  test("a reset watermark lets the same command run again", async () => {
    const { executor, watermarkStore, displayPower } = setup();

    await executor.apply(command("1", "screen_off"), CONTEXT);
    await executor.resetWatermark();
    displayPower.state = "on";
    const result = await executor.apply(command("1", "screen_off"), CONTEXT);

    expect(watermarkStore.removals).toBe(1);
    expect(result.status).toBe("executed");
    expect(displayPower.sets).toEqual(["off", "off"]);
  });
});
