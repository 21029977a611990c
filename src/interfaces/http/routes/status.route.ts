import { Hono } from "hono";
import { type AgentControlLoop } from "#/application/use-cases/agent/agent-control-loop";
import { type IdentityStore } from "#/application/use-cases/identity/identity-store";
import { setAction } from "#/interfaces/http/middleware/observability";
import { ok } from "#/interfaces/http/responses";
import { renderPlayerScreen } from "#/interfaces/http/views/player-screen";
import { toRegistrationView } from "#/interfaces/registration-view";

export const createStatusRouter = (deps: {
  identity: IdentityStore;
  loop: AgentControlLoop;
}) => {
  const router = new Hono();

  router.get("/", setAction("agent.screen.read", { route: "/" }), async (c) => {
    const status = await deps.loop.status();
    return c.html(
      renderPlayerScreen({
        registration: toRegistrationView(deps.identity.snapshot()),
        status,
      }),
    );
  });

  router.get("/status", setAction("agent.status.read"), async (c) =>
    ok(c, await deps.loop.status()),
  );

  return router;
};
