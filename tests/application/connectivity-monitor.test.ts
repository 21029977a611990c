import { describe, expect, test } from "vitest";
import { TransportError } from "#/application/errors";
import { ConnectivityMonitor } from "#/application/use-cases/connectivity/connectivity-monitor";
import {
  DEFAULT_CONNECTIVITY_POLICY,
  initialConnectivityState,
} from "#/domain/connectivity/connectivity";
import { FakeControlServer, makeRecordingLogger } from "../helpers/fakes";

const ENDPOINT = { serverUrl: "https://signage.test", apiPrefix: "/api/v1" };

const setup = (networkUp: () => Promise<boolean>) => {
  const controlServer = new FakeControlServer();
  const probedHosts: string[] = [];
  const { logger, entries } = makeRecordingLogger();
  const monitor = new ConnectivityMonitor({
    networkProbe: {
      isLocalNetworkReachable: (host) => {
        probedHosts.push(host);
        return networkUp();
      },
    },
    controlServer,
    policy: DEFAULT_CONNECTIVITY_POLICY,
    logger,
  });
  return { monitor, controlServer, probedHosts, entries };
};

describe("ConnectivityMonitor", () => {
  test("probes the server host and then its health endpoint", async () => {
    const { monitor, probedHosts } = setup(async () => true);

    expect(await monitor.probe(ENDPOINT)).toEqual({
      networkReachable: true,
      serverReachable: true,
    });
    expect(probedHosts).toEqual(["signage.test"]);
  });

  test("a failing health check means network without server", async () => {
    const { monitor, controlServer } = setup(async () => true);
    controlServer.checkHealth = async () => {
      throw new TransportError("Request timed out after 10000ms", "timeout");
    };

    expect(await monitor.probe(ENDPOINT)).toEqual({
      networkReachable: true,
      serverReachable: false,
    });
  });

  test("a rejecting network probe counts as unreachable", async () => {
    const { monitor } = setup(async () => {
      throw new Error("ENETUNREACH");
    });

    expect(await monitor.probe(ENDPOINT)).toEqual({
      networkReachable: false,
      serverReachable: false,
    });
  });

  test("a server url without host is never probed", async () => {
    const { monitor, probedHosts } = setup(async () => true);

    await monitor.probe({ serverUrl: "not a url", apiPrefix: "" });

    expect(probedHosts).toEqual([]);
  });

  test("requests fallback after three offline cycles", async () => {
    const { monitor, entries } = setup(async () => false);

    let state = initialConnectivityState();
    for (let cycle = 0; cycle < 3; cycle += 1) {
      state = await monitor.observe(state, ENDPOINT);
    }

    expect(state.fallbackActive).toBe(true);
    expect(entries.map((entry) => entry.message)).toContain(
      "no network past grace period; access-point fallback requested",
    );
  });

  test("three heartbeat timeouts degrade the server signal", async () => {
    const { monitor } = setup(async () => true);

    let state = await monitor.observe(initialConnectivityState(), ENDPOINT);
    expect(state.mode).toBe("SERVER_ONLINE");
    for (let failure = 0; failure < 3; failure += 1) {
      state = monitor.recordHeartbeat(state, "failure");
    }

    expect(state.serverSignal).toBe("degraded");
    expect(state.mode).toBe("NETWORK_NO_SERVER");
  });
});
