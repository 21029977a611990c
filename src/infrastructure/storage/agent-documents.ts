import { join } from "node:path";
import { z } from "zod";
import { type CommandWatermark } from "#/domain/commands/command";
import {
  type ActivePlaylist,
  type ContentAssignment,
} from "#/domain/content/assignment";
import { type PersistedDeviceConfig } from "#/domain/identity/registration";
import {
  contentAssignmentSchema,
  contentItemWireSchema,
  stringIdSchema,
  toContentAssignmentWire,
} from "#/infrastructure/http/control-server.schema";
import { JsonDocumentStore } from "./json-document.store";

export const deviceConfigDocumentSchema = z
  .object({
    device_id: z.string().trim().min(1).max(64).optional(),
    player_id: stringIdSchema.nullish(),
    server_url: z.string().url().optional(),
    api_prefix: z.string().optional(),
    heartbeat_interval: z.number().int().positive().optional(),
  })
  .transform(
    (doc): PersistedDeviceConfig => ({
      deviceId: doc.device_id,
      playerId: doc.player_id ?? null,
      serverUrl: doc.server_url,
      apiPrefix: doc.api_prefix,
      heartbeatIntervalSeconds: doc.heartbeat_interval,
    }),
  );

const toDeviceConfigDocument = (config: PersistedDeviceConfig) => ({
  server_url: config.serverUrl,
  api_prefix: config.apiPrefix,
  device_id: config.deviceId,
  player_id: config.playerId ?? null,
  heartbeat_interval: config.heartbeatIntervalSeconds,
});

export const commandWatermarkDocumentSchema = z
  .object({
    command_id: z.string().min(1),
    issued_at: z.string().nullish(),
    executed_at: z.string(),
  })
  .transform(
    (doc): CommandWatermark => ({
      commandId: doc.command_id,
      issuedAt: doc.issued_at ?? null,
      executedAt: doc.executed_at,
    }),
  );

export const activePlaylistDocumentSchema = z
  .object({
    playlist_version: z.string(),
    items: z.array(
      contentItemWireSchema.extend({ local_path: z.string().min(1) }),
    ),
    activated_at: z.string(),
    refresh_nonce: z.number().int().nonnegative(),
  })
  .transform(
    (doc): ActivePlaylist => ({
      playlistVersion: doc.playlist_version,
      items: doc.items.map((item) => ({
        mediaRef: item.media_ref,
        duration: item.duration,
        checksum: item.checksum,
        localPath: item.local_path,
      })),
      activatedAt: doc.activated_at,
      refreshNonce: doc.refresh_nonce,
    }),
  );

const toActivePlaylistDocument = (playlist: ActivePlaylist) => ({
  playlist_version: playlist.playlistVersion,
  items: playlist.items.map((item) => ({
    media_ref: item.mediaRef,
    duration: item.duration,
    checksum: item.checksum,
    local_path: item.localPath,
  })),
  activated_at: playlist.activatedAt,
  refresh_nonce: playlist.refreshNonce,
});

export const createDeviceConfigStore = (configDir: string) =>
  new JsonDocumentStore<PersistedDeviceConfig>({
    path: join(configDir, "config.json"),
    label: "device configuration",
    schema: deviceConfigDocumentSchema,
    toDocument: toDeviceConfigDocument,
  });

export const createAgentDocumentStores = (dataDir: string) => ({
  watermarkStore: new JsonDocumentStore<CommandWatermark>({
    path: join(dataDir, "command-watermark.json"),
    label: "command watermark",
    schema: commandWatermarkDocumentSchema,
    toDocument: (watermark) => ({
      command_id: watermark.commandId,
      issued_at: watermark.issuedAt,
      executed_at: watermark.executedAt,
    }),
  }),
  assignmentStore: new JsonDocumentStore<ContentAssignment>({
    path: join(dataDir, "assignment.json"),
    label: "content assignment",
    schema: contentAssignmentSchema,
    toDocument: toContentAssignmentWire,
  }),
  activePlaylistStore: new JsonDocumentStore<ActivePlaylist>({
    path: join(dataDir, "active-playlist.json"),
    label: "active playlist",
    schema: activePlaylistDocumentSchema,
    toDocument: toActivePlaylistDocument,
  }),
});
