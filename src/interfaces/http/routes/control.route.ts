import { Hono } from "hono";
import { type AgentControlLoop } from "#/application/use-cases/agent/agent-control-loop";
import { type CommandExecutor } from "#/application/use-cases/commands/command-executor";
import { type IdentityStore } from "#/application/use-cases/identity/identity-store";
import { toRegistrationView } from "#/interfaces/registration-view";
import { setAction } from "#/interfaces/http/middleware/observability";
import { ok } from "#/interfaces/http/responses";
import {
  setPlayerIdSchema,
  setServerUrlSchema,
} from "#/interfaces/http/validators/control.schema";
import { validateJson } from "#/interfaces/http/validators/standard-validator";

export interface ControlRouterDeps {
  identity: IdentityStore;
  executor: CommandExecutor;
  loop: AgentControlLoop;
}

export const createControlRouter = (deps: ControlRouterDeps) => {
  const router = new Hono();

  router.post(
    "/heartbeat",
    setAction("control.heartbeat.force", { route: "/control/heartbeat" }),
    async (c) => {
      await deps.loop.forceHeartbeat();
      return ok(c, await deps.loop.status());
    },
  );

  router.put(
    "/player-id",
    setAction("control.playerId.set", { route: "/control/player-id" }),
    validateJson(setPlayerIdSchema),
    async (c) => {
      const { player_id } = c.req.valid("json");
      const config = await deps.identity.setPlayerId(player_id);
      deps.loop.requestImmediateCycle();
      return ok(c, toRegistrationView(config));
    },
  );

  router.delete(
    "/player-id",
    setAction("control.playerId.clear", { route: "/control/player-id" }),
    async (c) => {
      const config = await deps.identity.clearPlayerId();
      return ok(c, toRegistrationView(config));
    },
  );

  router.put(
    "/server-url",
    setAction("control.serverUrl.set", { route: "/control/server-url" }),
    validateJson(setServerUrlSchema),
    async (c) => {
      const { server_url } = c.req.valid("json");
      const config = await deps.identity.setServerUrl(server_url);
      deps.loop.requestImmediateCycle();
      return ok(c, toRegistrationView(config));
    },
  );

  router.post(
    "/reset-registration",
    setAction("control.registration.reset", {
      route: "/control/reset-registration",
    }),
    async (c) => {
      const config = await deps.identity.resetRegistration();
      await deps.executor.resetWatermark();
      return ok(c, toRegistrationView(config));
    },
  );

  return router;
};
