import { type DeviceConfig } from "#/domain/identity/registration";

/** Registration as shown to operators, on the CLI and the local API alike. */
export const toRegistrationView = (config: DeviceConfig) => ({
  deviceId: config.deviceId,
  playerId: config.playerId,
  serverUrl: config.serverUrl,
  apiPrefix: config.apiPrefix,
  heartbeatIntervalSeconds: config.heartbeatIntervalSeconds,
});

export type RegistrationView = ReturnType<typeof toRegistrationView>;
