import { serve } from "@hono/node-server";
import { type Logger } from "#/application/ports/observability";
import {
  type AgentContainerConfig,
  createAgentContainer,
  createAgentRuntime,
} from "#/interfaces/container";
import { createLocalApp } from "#/interfaces/http";

export interface AgentServerOptions {
  hostname: string;
  port: number;
}

export interface RunningAgent {
  stop(): Promise<void>;
}

/**
 * Boots the long-running agent: identity first (fatal when storage is
 * unusable), then the control loop and the local API.
 */
export const startAgent = async (
  config: AgentContainerConfig,
  server: AgentServerOptions,
  logger: Logger,
): Promise<RunningAgent> => {
  const container = createAgentContainer(config);
  const deviceId = await container.identity.getOrCreateDeviceId();
  const { provisioner, loop } = createAgentRuntime(container, config, deviceId);

  const app = createLocalApp({
    identity: container.identity,
    executor: container.executor,
    provisioner,
    loop,
  });

  loop.start();
  const httpServer = serve({
    fetch: app.fetch,
    hostname: server.hostname,
    port: server.port,
  });
  logger.info(
    { deviceId, hostname: server.hostname, port: server.port },
    "local API started",
  );

  return {
    async stop() {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
      await loop.stop();
      await provisioner.whenIdle();
    },
  };
};
