import { type HardwareFingerprint } from "#/domain/identity/device-identity";

export interface HardwareFingerprintSource {
  read(): Promise<HardwareFingerprint>;
}

export interface SystemInfo {
  ipAddress: string | null;
  macAddress: string | null;
  storageUsedBytes: number;
  storageTotalBytes: number;
  screenResolution: string;
  uptimeSeconds: number;
  agentVersion: string;
}

export interface SystemInfoProvider {
  collect(): Promise<SystemInfo>;
}
