import pino from "pino";
import { env } from "#/env";

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "player-agent" },
  ...(env.LOG_PRETTY
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard" },
        },
      }
    : {}),
});
