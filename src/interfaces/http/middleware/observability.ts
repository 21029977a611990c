import { type MiddlewareHandler } from "hono";
import { type RequestIdVariables, requestId } from "hono/request-id";
import { logger } from "#/infrastructure/observability/logger";

export { requestId };

export type ObservabilityVariables = RequestIdVariables & {
  action?: string;
  route?: string;
};

export const setAction =
  (
    action: string,
    meta?: {
      route?: string;
    },
  ): MiddlewareHandler =>
  async (c, next) => {
    c.set("action", action);
    if (meta?.route) c.set("route", meta.route);
    await next();
  };

export const requestLogger: MiddlewareHandler<{
  Variables: ObservabilityVariables;
}> = async (c, next) => {
  const start = Date.now();
  await next();
  const action = c.get("action");
  const route = c.get("route") ?? c.req.routePath;
  const status = c.res.status;

  const logPayload: Record<string, unknown> = {
    requestId: c.get("requestId"),
    method: c.req.method,
    path: c.req.path,
    status,
    durationMs: Date.now() - start,
  };

  if (action) logPayload.action = action;
  if (route) logPayload.route = route;

  if (status >= 500) {
    logger.error(logPayload, "request completed");
  } else {
    logger.info(logPayload, "request completed");
  }
};
