import { env } from "#/env";
import { logger } from "#/infrastructure/observability/logger";
import { startAgent, type RunningAgent } from "#/interfaces/agent";
import { containerConfigFromEnv } from "#/interfaces/config";

let isShuttingDown = false;
let agent: RunningAgent | null = null;

const handleShutdown = async () => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  try {
    if (agent) {
      await agent.stop();
    }
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, "shutdown failed");
    process.exit(1);
  }
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    void handleShutdown();
  });
}

try {
  agent = await startAgent(
    containerConfigFromEnv(env, logger),
    { hostname: env.LOCAL_API_HOST, port: env.LOCAL_API_PORT },
    logger,
  );
} catch (error) {
  logger.fatal({ err: error }, "agent failed to start");
  process.exit(1);
}
