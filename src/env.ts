import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const trimTrailingSlashes = (value: string): string =>
  value.trim().replace(/\/+$/, "");

export const env = createEnv({
  server: {
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    AGENT_CONFIG_DIR: z.string().default("/etc/player-agent"),
    AGENT_DATA_DIR: z.string().default("/var/lib/player-agent"),
    DEFAULT_SERVER_URL: z
      .string()
      .url()
      .default("https://signage.example.com")
      .transform(trimTrailingSlashes),
    DEFAULT_API_PREFIX: z.string().default("/api/v1"),
    DEFAULT_HEARTBEAT_INTERVAL_SECONDS: z.coerce.number().int().default(30),
    LOCAL_API_HOST: z.string().default("0.0.0.0"),
    LOCAL_API_PORT: z.coerce.number().int().default(8080),
    PROBE_INTERVAL_MS: z.coerce.number().int().default(10_000),
    FALLBACK_GRACE_CYCLES: z.coerce.number().int().default(3),
    HEARTBEAT_DEGRADED_AFTER_FAILURES: z.coerce.number().int().default(3),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().default(10_000),
    DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().default(120_000),
    DOWNLOAD_CONCURRENCY: z.coerce.number().int().default(3),
    WIFI_INTERFACE: z.string().default("wlan0"),
    ACCESS_POINT_PASSWORD: z.string().min(8).optional(),
    LOG_LEVEL: z.string().default("info"),
    LOG_PRETTY: z.string().default("false").pipe(z.stringbool()),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type AgentEnv = typeof env;
