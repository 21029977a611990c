import { TransportError } from "#/application/errors";
import {
  type ControlServerClient,
  type HeartbeatRecord,
  type HeartbeatResponse,
  type RegistrationLookup,
} from "#/application/ports/control-server";
import { type Logger } from "#/application/ports/observability";
import { type Command, isCommandKind } from "#/domain/commands/command";
import { type ContentAssignment } from "#/domain/content/assignment";
import {
  apiBaseUrl,
  type ServerEndpoint,
} from "#/domain/identity/registration";
import {
  contentAssignmentSchema,
  heartbeatResponseSchema,
  pendingCommandSchema,
  registrationLookupSchema,
  stringIdSchema,
} from "./control-server.schema";

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

const isTimeout = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === "TimeoutError" || error.name === "AbortError");

const toHeartbeatBody = (record: HeartbeatRecord) => ({
  unique_id: record.deviceId,
  status: "online",
  ip_address: record.ipAddress,
  mac_address: record.macAddress,
  storage_used: record.systemInfo.storageUsedBytes,
  storage_total: record.systemInfo.storageTotalBytes,
  screen_resolution: record.systemInfo.screenResolution,
  ...(record.currentContentRef !== undefined
    ? { current_content_ref: record.currentContentRef }
    : {}),
  system_info: {
    storage_used: record.systemInfo.storageUsedBytes,
    storage_total: record.systemInfo.storageTotalBytes,
    screen_resolution: record.systemInfo.screenResolution,
    uptime_seconds: record.systemInfo.uptimeSeconds,
    agent_version: record.systemInfo.agentVersion,
    display_power: record.systemInfo.displayPower,
  },
  timestamp: record.timestamp,
  last_error: record.lastError,
});

/**
 * JSON-over-HTTP client for the control server. Every request carries a
 * timeout; transport problems and non-2xx answers reject with
 * `TransportError`.
 */
export class HttpControlServerClient implements ControlServerClient {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly deps: {
      requestTimeoutMs: number;
      logger: Logger;
      fetch?: FetchFn;
    },
  ) {
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
  }

  async checkHealth(endpoint: ServerEndpoint): Promise<boolean> {
    const response = await this.request(`${apiBaseUrl(endpoint)}/health`, {
      method: "GET",
    });
    return response.ok;
  }

  async lookupRegistration(
    endpoint: ServerEndpoint,
    deviceId: string,
  ): Promise<RegistrationLookup> {
    const url = `${apiBaseUrl(endpoint)}/players/lookup?unique_id=${encodeURIComponent(deviceId)}`;
    const response = await this.request(url, {
      method: "GET",
      headers: { "X-Device-Id": deviceId },
    });
    if (response.status === 404) {
      return { registered: false, playerId: null };
    }
    this.ensureOk(response, "Registration lookup");

    const parsed = registrationLookupSchema.safeParse(
      await this.readJson(response),
    );
    if (!parsed.success) {
      throw new TransportError(
        "Registration lookup returned an unexpected body",
        "payload",
        response.status,
        { cause: parsed.error },
      );
    }
    return {
      registered: parsed.data.registered,
      playerId: parsed.data.player_id ?? null,
    };
  }

  async sendHeartbeat(
    endpoint: ServerEndpoint,
    record: HeartbeatRecord,
  ): Promise<HeartbeatResponse> {
    const url = `${apiBaseUrl(endpoint)}/players/${encodeURIComponent(record.playerId)}/heartbeat`;
    const response = await this.request(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "X-Device-Id": record.deviceId,
      },
      body: JSON.stringify(toHeartbeatBody(record)),
    });
    if (response.status === 404) {
      throw new TransportError("Player not found", "http", 404);
    }
    this.ensureOk(response, "Heartbeat");
    return this.parseHeartbeatResponse(await this.readJson(response));
  }

  async uploadScreenshot(
    endpoint: ServerEndpoint,
    input: {
      playerId: string;
      deviceId: string;
      image: Uint8Array;
      capturedAt: Date;
    },
  ): Promise<void> {
    const form = new FormData();
    form.set(
      "file",
      new Blob([input.image], { type: "image/png" }),
      `screenshot-${input.capturedAt.getTime()}.png`,
    );
    form.set("captured_at", input.capturedAt.toISOString());

    const url = `${apiBaseUrl(endpoint)}/players/${encodeURIComponent(input.playerId)}/screenshot`;
    const response = await this.request(url, {
      method: "POST",
      headers: { "X-Device-Id": input.deviceId },
      body: form,
    });
    this.ensureOk(response, "Screenshot upload");
  }

  parseHeartbeatResponse(body: unknown): HeartbeatResponse {
    const result: HeartbeatResponse = {
      pendingCommand: null,
      contentAssignment: null,
      playerId: null,
      rejected: [],
    };
    if (body === null) {
      return result;
    }

    const envelope = heartbeatResponseSchema.safeParse(body);
    if (!envelope.success) {
      result.rejected.push("body");
      return result;
    }
    const { pending_command, content_assignment, player_id } = envelope.data;

    if (pending_command !== undefined && pending_command !== null) {
      result.pendingCommand = this.parseCommand(pending_command, result.rejected);
    }
    if (content_assignment !== undefined && content_assignment !== null) {
      result.contentAssignment = this.parseAssignment(
        content_assignment,
        result.rejected,
      );
    }
    if (player_id !== undefined && player_id !== null) {
      const parsed = stringIdSchema.safeParse(player_id);
      if (parsed.success) {
        result.playerId = parsed.data;
      } else {
        result.rejected.push("player_id");
      }
    }
    return result;
  }

  private parseCommand(value: unknown, rejected: string[]): Command | null {
    const parsed = pendingCommandSchema.safeParse(value);
    if (!parsed.success || !isCommandKind(parsed.data.kind)) {
      rejected.push("pending_command");
      return null;
    }
    return {
      commandId: parsed.data.id,
      kind: parsed.data.kind,
      issuedAt: parsed.data.issued_at ?? null,
    };
  }

  private parseAssignment(
    value: unknown,
    rejected: string[],
  ): ContentAssignment | null {
    const parsed = contentAssignmentSchema.safeParse(value);
    if (!parsed.success) {
      rejected.push("content_assignment");
      return null;
    }
    return parsed.data;
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchFn(url, {
        ...init,
        signal: AbortSignal.timeout(this.deps.requestTimeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new TransportError(
          `Request timed out after ${this.deps.requestTimeoutMs}ms`,
          "timeout",
          undefined,
          { cause: error },
        );
      }
      throw new TransportError("Connection error", "network", undefined, {
        cause: error,
      });
    }
  }

  private ensureOk(response: Response, action: string): void {
    if (!response.ok) {
      throw new TransportError(
        `${action} failed: HTTP ${response.status}`,
        "http",
        response.status,
      );
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (isTimeout(error)) {
        throw new TransportError("Response body timed out", "timeout", response.status, {
          cause: error,
        });
      }
      throw new TransportError("Response body could not be read", "network", response.status, {
        cause: error,
      });
    }
    if (!text.trim()) {
      return null;
    }
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      this.deps.logger.warn(
        { status: response.status, url: response.url },
        "control server answered with invalid JSON",
      );
      throw new TransportError("Response is not valid JSON", "payload", response.status, {
        cause: error,
      });
    }
  }
}
