import { type CommandWatermark } from "#/domain/commands/command";
import {
  type ActivePlaylist,
  type ContentAssignment,
} from "#/domain/content/assignment";
import { type PersistedDeviceConfig } from "#/domain/identity/registration";

/**
 * A single persisted document. `read` resolves `null` when nothing was
 * persisted yet, rejects with `ConfigError` when the stored document is
 * corrupt and with `StorageError` when the medium itself fails.
 */
export interface DocumentStore<T> {
  read(): Promise<T | null>;
  write(value: T): Promise<void>;
  remove(): Promise<void>;
}

export type DeviceConfigStore = DocumentStore<PersistedDeviceConfig>;
export type CommandWatermarkStore = DocumentStore<CommandWatermark>;
export type AssignmentCacheStore = DocumentStore<ContentAssignment>;
export type ActivePlaylistStore = DocumentStore<ActivePlaylist>;
