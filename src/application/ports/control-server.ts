import { type Command } from "#/domain/commands/command";
import { type ContentAssignment } from "#/domain/content/assignment";
import { type ServerEndpoint } from "#/domain/identity/registration";
import { type DisplayPowerState } from "./device-control";
import { type SystemInfo } from "./hardware";

export interface HeartbeatRecord {
  deviceId: string;
  playerId: string;
  ipAddress: string | null;
  macAddress: string | null;
  /** Omitted when unchanged since the last acknowledged heartbeat. */
  currentContentRef?: string | null;
  systemInfo: SystemInfo & { displayPower: DisplayPowerState };
  timestamp: string;
  lastError: string | null;
}

export interface HeartbeatResponse {
  pendingCommand: Command | null;
  contentAssignment: ContentAssignment | null;
  playerId: string | null;
  /** Parts of the body that were present but rejected by strict parsing. */
  rejected: string[];
}

export interface RegistrationLookup {
  registered: boolean;
  playerId: string | null;
}

/** All methods reject with `TransportError` on network, timeout or non-2xx. */
export interface ControlServerClient {
  checkHealth(endpoint: ServerEndpoint): Promise<boolean>;
  lookupRegistration(
    endpoint: ServerEndpoint,
    deviceId: string,
  ): Promise<RegistrationLookup>;
  sendHeartbeat(
    endpoint: ServerEndpoint,
    record: HeartbeatRecord,
  ): Promise<HeartbeatResponse>;
  uploadScreenshot(
    endpoint: ServerEndpoint,
    input: {
      playerId: string;
      deviceId: string;
      image: Uint8Array;
      capturedAt: Date;
    },
  ): Promise<void>;
}
