import { Hono } from "hono";
import { type IdentityStore } from "#/application/use-cases/identity/identity-store";
import { type AccessPointProvisioner } from "#/application/use-cases/provisioning/access-point-provisioner";
import { setAction } from "#/interfaces/http/middleware/observability";
import { busy, ok, validationError } from "#/interfaces/http/responses";
import { validateJson } from "#/interfaces/http/validators/standard-validator";
import { wifiConnectSchema } from "#/interfaces/http/validators/wifi.schema";
import { renderWifiPage } from "#/interfaces/http/views/wifi-page";

export const createWifiRouter = (deps: {
  identity: IdentityStore;
  provisioner: AccessPointProvisioner;
}) => {
  const router = new Hono();

  router.get("/", setAction("wifi.page.read", { route: "/wifi" }), async (c) => {
    const [config, networks] = await Promise.all([
      deps.identity.refresh(),
      deps.provisioner.scanNetworks(),
    ]);
    return c.html(
      renderWifiPage({
        deviceId: config.deviceId,
        accessPointSsid: deps.provisioner.ssid,
        networks,
      }),
    );
  });

  router.get(
    "/networks",
    setAction("wifi.networks.list", { route: "/wifi/networks" }),
    async (c) => ok(c, { ssids: await deps.provisioner.scanNetworks() }),
  );

  router.post(
    "/connect",
    setAction("wifi.connect", { route: "/wifi/connect" }),
    validateJson(wifiConnectSchema),
    (c) => {
      const credentials = c.req.valid("json");
      const submission = deps.provisioner.submitCredentials(credentials);
      switch (submission.status) {
        case "accepted":
          return ok(c, submission, 202);
        case "busy":
          return busy(c, submission.message);
        case "invalid":
          return validationError(c, submission.message);
      }
    },
  );

  return router;
};
