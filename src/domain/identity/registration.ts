import { type DeviceId } from "./device-identity";

export interface ServerEndpoint {
  serverUrl: string;
  apiPrefix: string;
}

export interface RegistrationState extends ServerEndpoint {
  deviceId: DeviceId;
  playerId: string | null;
}

/** The persisted configuration document, rebuilt into memory at every start. */
export interface DeviceConfig extends RegistrationState {
  heartbeatIntervalSeconds: number;
}

/**
 * What is actually on disk. Every field may be missing; defaults fill the gaps
 * when the document is loaded.
 */
export interface PersistedDeviceConfig {
  deviceId?: DeviceId;
  playerId?: string | null;
  serverUrl?: string;
  apiPrefix?: string;
  heartbeatIntervalSeconds?: number;
}

export class RegistrationValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistrationValidationError";
  }
}

export const apiBaseUrl = (endpoint: ServerEndpoint): string =>
  `${endpoint.serverUrl}${endpoint.apiPrefix}`;

export const normalizePlayerId = (value: string | number): string => {
  const normalized = String(value).trim();
  if (!normalized) {
    throw new RegistrationValidationError("Player id is required");
  }
  if (!/^[A-Za-z0-9_-]{1,64}$/.test(normalized)) {
    throw new RegistrationValidationError(
      "Player id may only contain letters, digits, '-' and '_'",
    );
  }
  return normalized;
};

export const normalizeServerUrl = (value: string): string => {
  const trimmed = value.trim().replace(/\/+$/, "");
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new RegistrationValidationError(`Invalid server URL: ${value}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new RegistrationValidationError(
      "Server URL must use http or https",
    );
  }
  return trimmed;
};

export const normalizeApiPrefix = (value: string): string => {
  const trimmed = value.trim().replace(/\/+$/, "");
  if (!trimmed) return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
};
