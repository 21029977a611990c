import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { type AgentControlLoop } from "#/application/use-cases/agent/agent-control-loop";
import { type CommandExecutor } from "#/application/use-cases/commands/command-executor";
import { type IdentityStore } from "#/application/use-cases/identity/identity-store";
import { type AccessPointProvisioner } from "#/application/use-cases/provisioning/access-point-provisioner";
import { logger } from "#/infrastructure/observability/logger";
import {
  type ObservabilityVariables,
  requestId,
  requestLogger,
} from "#/interfaces/http/middleware/observability";
import {
  internalServerError,
  notFound,
} from "#/interfaces/http/responses";
import { createControlRouter } from "#/interfaces/http/routes/control.route";
import { healthRouter } from "#/interfaces/http/routes/health.route";
import { mapApplicationError } from "#/interfaces/http/routes/shared/error-handling";
import { createStatusRouter } from "#/interfaces/http/routes/status.route";
import { createWifiRouter } from "#/interfaces/http/routes/wifi.route";

export interface LocalAppDeps {
  identity: IdentityStore;
  executor: CommandExecutor;
  provisioner: AccessPointProvisioner;
  loop: AgentControlLoop;
}

/** Local operator API and captive Wi-Fi form, served on the device itself. */
export const createLocalApp = (deps: LocalAppDeps) => {
  const app = new Hono<{ Variables: ObservabilityVariables }>();

  app.use("*", requestId());
  app.use("*", requestLogger);

  app.route("/", healthRouter);
  app.route(
    "/",
    createStatusRouter({ identity: deps.identity, loop: deps.loop }),
  );
  app.route(
    "/control",
    createControlRouter({
      identity: deps.identity,
      executor: deps.executor,
      loop: deps.loop,
    }),
  );
  app.route(
    "/wifi",
    createWifiRouter({
      identity: deps.identity,
      provisioner: deps.provisioner,
    }),
  );

  app.notFound((c) => notFound(c, `No route for ${c.req.method} ${c.req.path}`));

  app.onError((err, c) => {
    const mapped = mapApplicationError(c, err);
    const status =
      mapped?.status ?? (err instanceof HTTPException ? err.status : 500);
    const logPayload = {
      err,
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
      status,
    };

    if (status >= 500) {
      logger.error(logPayload, "request error");
    } else {
      logger.warn(logPayload, "request error");
    }

    if (mapped) {
      return mapped;
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    return internalServerError(c, "Unexpected error");
  });

  return app;
};
