import { createHash } from "node:crypto";

export const DEVICE_ID_PREFIX = "DIG";
export const DEVICE_ID_HEX_LENGTH = 11;
export const FALLBACK_CPU_SERIAL = "0000000000000000";

const DEVICE_ID_PATTERN = new RegExp(
  `^${DEVICE_ID_PREFIX}[0-9A-F]{${DEVICE_ID_HEX_LENGTH}}$`,
);

export type DeviceId = string;

export interface HardwareFingerprint {
  cpuSerial: string;
  macAddress: string;
}

export class DeviceIdentityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeviceIdentityError";
  }
}

export const isDeviceId = (value: string): value is DeviceId =>
  DEVICE_ID_PATTERN.test(value);

const normalizeMac = (value: string) =>
  value.trim().toLowerCase().replaceAll(":", "").replaceAll("-", "");

/**
 * Same physical unit, same id: the fingerprint is normalized so that
 * `aa:bb:..` and `AABB..` hash identically.
 */
export const deriveDeviceId = (fingerprint: HardwareFingerprint): DeviceId => {
  const cpuSerial = fingerprint.cpuSerial.trim() || FALLBACK_CPU_SERIAL;
  const macAddress = normalizeMac(fingerprint.macAddress);
  if (!macAddress) {
    throw new DeviceIdentityError("Hardware fingerprint has no MAC address");
  }

  const digest = createHash("md5")
    .update(`${cpuSerial}-${macAddress}`)
    .digest("hex");
  return `${DEVICE_ID_PREFIX}${digest.slice(0, DEVICE_ID_HEX_LENGTH).toUpperCase()}`;
};

export const accessPointSsid = (deviceId: DeviceId): string =>
  `PLAYER-SETUP-${deviceId.slice(-6)}`;
