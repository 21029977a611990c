import { describe, expect, test } from "vitest";
import { StorageError } from "#/application/errors";
import { createLocalApp } from "#/interfaces/http";
import { makeAgentHarness } from "../../helpers/agent-harness";

const setup = () => {
  const harness = makeAgentHarness();
  const app = createLocalApp({
    identity: harness.identity,
    executor: harness.executor,
    provisioner: harness.provisioner,
    loop: harness.loop,
  });
  return { ...harness, app };
};

const jsonRequest = (method: string, body: unknown): RequestInit => ({
  method,
  headers: { "Content-Type": "application/json" },
  body: JSON.stringify(body),
});

const REGISTRATION = {
  deviceId: "DIG0123456789A",
  playerId: "12",
  serverUrl: "https://signage.test",
  apiPrefix: "/api/v1",
  heartbeatIntervalSeconds: 30,
};

describe("local API", () => {
  test("answers health checks with a request id", async () => {
    const { app } = setup();

    const response = await app.request("/health");

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok" });
    expect(response.headers.get("X-Request-Id")).toBeTruthy();
  });

  test("reports status before the first cycle", async () => {
    const { app } = setup();

    const response = await app.request("/status");

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      data: {
        deviceId: "DIG0123456789A",
        playerId: "12",
        serverUrl: "https://signage.test",
        apiPrefix: "/api/v1",
        mode: "NO_NETWORK",
        serverSignal: "unreachable",
        fallbackActive: false,
        accessPointActive: false,
        cycle: 0,
        heartbeat: {
          consecutiveFailures: 0,
          nextAttemptAt: null,
          lastSeenOnlineAt: null,
          last: null,
        },
        lastError: null,
        activePlaylistVersion: null,
        lastCommand: null,
        lastReconcile: null,
      },
    });
  });

  test("shows the device id to register while no player id is set", async () => {
    const harness = makeAgentHarness({ playerId: null });
    const app = createLocalApp({
      identity: harness.identity,
      executor: harness.executor,
      provisioner: harness.provisioner,
      loop: harness.loop,
    });

    const response = await app.request("/");
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get("Content-Type")).toMatch(/^text\/html/);
    expect(html).toContain("<h1>Register this player</h1>");
    expect(html).toContain('<p class="device-id">DIG0123456789A</p>');
    expect(html).toContain(
      "<p>Add this device ID as a player on <strong>https://signage.test</strong>. The screen changes once the server knows it.</p>",
    );
    expect(html).not.toContain("<h1>Player");
  });

  test("shows the player status once registered", async () => {
    const { app } = setup();

    const html = await (await app.request("/")).text();

    expect(html).toContain("<h1>Player 12</h1>");
    expect(html).toContain(
      "<dl><dt>Device</dt><dd>DIG0123456789A</dd><dt>Server</dt><dd>https://signage.test</dd><dt>Connection</dt><dd>NO_NETWORK</dd><dt>Last contact</dt><dd>never</dd><dt>Playlist</dt><dd>none</dd></dl>",
    );
    expect(html).not.toContain("Register this player");
  });

  test("forces a heartbeat and returns the new status", async () => {
    const { app, controlServer } = setup();

    const response = await app.request("/control/heartbeat", { method: "POST" });

    expect(response.status).toBe(200);
    expect(controlServer.heartbeats).toHaveLength(1);
    expect(await response.json()).toMatchObject({
      data: {
        mode: "SERVER_ONLINE",
        cycle: 1,
        heartbeat: {
          consecutiveFailures: 0,
          lastSeenOnlineAt: "2025-01-01T00:00:00.000Z",
          last: { outcome: "delivered", at: "2025-01-01T00:00:00.000Z" },
        },
        lastReconcile: "idle",
      },
    });
  });

  test("sets, validates and clears the player id", async () => {
    const { app, configStore } = setup();

    const set = await app.request("/control/player-id", jsonRequest("PUT", { player_id: 42 }));
    expect(set.status).toBe(200);
    expect(await set.json()).toEqual({ data: { ...REGISTRATION, playerId: "42" } });
    expect(configStore.value?.playerId).toBe("42");

    const rejected = await app.request(
      "/control/player-id",
      jsonRequest("PUT", { player_id: "bad id!" }),
    );
    expect(rejected.status).toBe(422);
    expect(await rejected.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Player id may only contain letters, digits, '-' and '_'",
      },
    });

    const cleared = await app.request("/control/player-id", { method: "DELETE" });
    expect(await cleared.json()).toEqual({ data: { ...REGISTRATION, playerId: null } });
  });

  test("reports schema errors per field", async () => {
    const { app } = setup();

    const response = await app.request(
      "/control/player-id",
      jsonRequest("PUT", { player_id: true }),
    );

    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({
      error: {
        code: "VALIDATION_ERROR",
        message: "Invalid request",
        details: [{ field: "player_id" }],
      },
    });
  });

  test("changes the server url", async () => {
    const { app } = setup();

    const response = await app.request(
      "/control/server-url",
      jsonRequest("PUT", { server_url: "http://10.0.0.5:8080/" }),
    );

    expect(await response.json()).toEqual({
      data: { ...REGISTRATION, serverUrl: "http://10.0.0.5:8080" },
    });

    const invalid = await app.request(
      "/control/server-url",
      jsonRequest("PUT", { server_url: "ftp://10.0.0.5" }),
    );
    expect(invalid.status).toBe(422);
    expect(await invalid.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Server URL must use http or https" },
    });
  });

  test("resets the registration but keeps the device id", async () => {
    const { app, configStore, watermarkStore } = setup();
    watermarkStore.value = {
      commandId: "7",
      issuedAt: "2025-01-01T00:00:00.000Z",
      executedAt: "2025-01-01T00:00:01.000Z",
    };

    const response = await app.request("/control/reset-registration", { method: "POST" });

    expect(await response.json()).toEqual({ data: { ...REGISTRATION, playerId: null } });
    expect(configStore.value?.deviceId).toBe("DIG0123456789A");
    expect(watermarkStore.value).toBeNull();
  });

  test("maps storage failures to 503", async () => {
    const { app, configStore } = setup();
    configStore.readError = new StorageError("disk gone", "/etc/player");

    const response = await app.request("/status");

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      error: { code: "STORAGE_UNAVAILABLE", message: "disk gone" },
    });
  });

  test("hides unexpected errors", async () => {
    const { app, configStore } = setup();
    configStore.readError = new Error("EACCES: permission denied");

    const response = await app.request("/status");

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Unexpected error" },
    });
  });

  test("answers unknown routes with 404", async () => {
    const { app } = setup();

    const response = await app.request("/firmware");

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for GET /firmware" },
    });
  });
});

describe("wifi provisioning routes", () => {
  test("serves the setup page with scanned networks", async () => {
    const { app } = setup();

    const response = await app.request("/wifi");
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get("Content-Type")).toMatch(/^text\/html/);
    expect(html).toContain(
      '<datalist id="networks"><option value="Atrium"></option><option value="Office"></option></datalist>',
    );
    expect(html).toContain(
      "<p>Device <strong>DIG0123456789A</strong>, setup network <strong>PLAYER-SETUP-56789A</strong></p>",
    );
  });

  test("escapes network names on the page", async () => {
    const { app, wifi } = setup();
    wifi.networks = ['<b>"Cafe"</b>'];

    const html = await (await app.request("/wifi")).text();

    expect(html).toContain(
      '<option value="&lt;b&gt;&quot;Cafe&quot;&lt;/b&gt;"></option>',
    );
  });

  test("lists networks", async () => {
    const { app } = setup();

    const response = await app.request("/wifi/networks");

    expect(await response.json()).toEqual({ data: { ssids: ["Atrium", "Office"] } });
  });

  test("accepts credentials and applies them in the background", async () => {
    const { app, wifi, provisioner, networkConfigured } = setup();

    const response = await app.request(
      "/wifi/connect",
      jsonRequest("POST", { ssid: " Office ", password: "test-secret" }),
    );

    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({
      data: { status: "accepted", message: "Connecting to Office" },
    });
    await provisioner.whenIdle();
    expect(wifi.applied).toEqual([{ ssid: "Office", password: "test-secret" }]);
    expect(networkConfigured()).toBe(1);
  });

  test("defaults to an open network", async () => {
    const { app, wifi, provisioner } = setup();

    await app.request("/wifi/connect", jsonRequest("POST", { ssid: "Lobby" }));
    await provisioner.whenIdle();

    expect(wifi.applied).toEqual([{ ssid: "Lobby", password: "" }]);
  });

  test("refuses a second submission while one is applied", async () => {
    const { app, wifi, provisioner } = setup();
    let release = () => {};
    wifi.gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });

    const first = await app.request(
      "/wifi/connect",
      jsonRequest("POST", { ssid: "Office", password: "test-secret" }),
    );
    const second = await app.request(
      "/wifi/connect",
      jsonRequest("POST", { ssid: "Atrium", password: "test-secret" }),
    );
    release();
    await provisioner.whenIdle();

    expect(first.status).toBe(202);
    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({
      error: {
        code: "BUSY",
        message: "Another network configuration is being applied",
      },
    });
    expect(wifi.applied).toEqual([{ ssid: "Office", password: "test-secret" }]);
  });

  test("rejects a passphrase of the wrong length", async () => {
    const { app, wifi } = setup();

    const response = await app.request(
      "/wifi/connect",
      jsonRequest("POST", { ssid: "Office", password: "short" }),
    );

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Password must be empty or 8-63 characters",
      },
    });
    expect(wifi.applied).toEqual([]);
  });
});
