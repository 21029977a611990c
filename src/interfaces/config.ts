import { type AgentEnv } from "#/env";
import { type Logger } from "#/application/ports/observability";
import { type AgentContainerConfig } from "#/interfaces/container";
import packageJSON from "../../package.json" with { type: "json" };

export const containerConfigFromEnv = (
  env: AgentEnv,
  logger: Logger,
): AgentContainerConfig => ({
  configDir: env.AGENT_CONFIG_DIR,
  dataDir: env.AGENT_DATA_DIR,
  defaults: {
    serverUrl: env.DEFAULT_SERVER_URL,
    apiPrefix: env.DEFAULT_API_PREFIX,
    heartbeatIntervalSeconds: env.DEFAULT_HEARTBEAT_INTERVAL_SECONDS,
  },
  policy: {
    fallbackGraceCycles: env.FALLBACK_GRACE_CYCLES,
    degradedAfterHeartbeatFailures: env.HEARTBEAT_DEGRADED_AFTER_FAILURES,
  },
  probeIntervalMs: env.PROBE_INTERVAL_MS,
  requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
  downloadTimeoutMs: env.DOWNLOAD_TIMEOUT_MS,
  downloadConcurrency: env.DOWNLOAD_CONCURRENCY,
  wifiInterface: env.WIFI_INTERFACE,
  accessPointPassword: env.ACCESS_POINT_PASSWORD ?? null,
  agentVersion: packageJSON.version,
  logger,
});
