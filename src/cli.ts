import { env } from "#/env";
import { logger } from "#/infrastructure/observability/logger";
import { startAgent } from "#/interfaces/agent";
import { parseCliArgs } from "#/interfaces/cli/args";
import {
  consoleOutput,
  exitCodeFor,
  runCliCommand,
  usage,
} from "#/interfaces/cli/commands";
import { containerConfigFromEnv } from "#/interfaces/config";
import { createAgentContainer } from "#/interfaces/container";

let exitCode = 0;

try {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(usage);
    process.exit(0);
  }

  const config = containerConfigFromEnv(env, logger);
  if (args.command.name === "run") {
    const agent = await startAgent(
      config,
      { hostname: env.LOCAL_API_HOST, port: env.LOCAL_API_PORT },
      logger,
    );
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        agent.stop().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error({ err: error }, "shutdown failed");
            process.exit(1);
          },
        );
      });
    }
  } else {
    exitCode = await runCliCommand({
      command: args.command,
      container: createAgentContainer(config),
      json: args.json,
      output: consoleOutput,
    });
    process.exit(exitCode);
  }
} catch (error) {
  exitCode = exitCodeFor(error);
  console.error(error instanceof Error ? error.message : error);
  console.error(`\n${usage}`);
  process.exit(exitCode);
}
