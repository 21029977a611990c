import { ConfigError, StorageError, ValidationError } from "#/application/errors";
import {
  type CommandWatermarkStore,
  type DeviceConfigStore,
} from "#/application/ports/documents";
import { type HardwareFingerprintSource } from "#/application/ports/hardware";
import { type Logger } from "#/application/ports/observability";
import { SerialQueue } from "#/application/use-cases/shared/concurrency";
import {
  type DeviceId,
  deriveDeviceId,
} from "#/domain/identity/device-identity";
import {
  type DeviceConfig,
  normalizeApiPrefix,
  normalizePlayerId,
  normalizeServerUrl,
  type PersistedDeviceConfig,
  type RegistrationState,
  RegistrationValidationError,
} from "#/domain/identity/registration";

export interface RegistrationDefaults {
  serverUrl: string;
  apiPrefix: string;
  heartbeatIntervalSeconds: number;
}

const MIN_HEARTBEAT_INTERVAL_SECONDS = 5;

const toPersisted = (config: DeviceConfig): PersistedDeviceConfig => ({
  deviceId: config.deviceId,
  playerId: config.playerId,
  serverUrl: config.serverUrl,
  apiPrefix: config.apiPrefix,
  heartbeatIntervalSeconds: config.heartbeatIntervalSeconds,
});

const withValidation = <T>(run: () => T): T => {
  try {
    return run();
  } catch (error) {
    if (error instanceof RegistrationValidationError) {
      throw new ValidationError(error.message);
    }
    throw error;
  }
};

/**
 * Owns the device identity and registration document. Disk is the source of
 * truth: `refresh` rebuilds the in-memory copy from it, and operator actions
 * read-modify-write it one at a time.
 */
export class IdentityStore {
  private current: DeviceConfig | null = null;
  private hasUnpersistedChanges = false;
  private readonly writes = new SerialQueue();

  constructor(
    private readonly deps: {
      configStore: DeviceConfigStore;
      watermarkStore: CommandWatermarkStore;
      fingerprintSource: HardwareFingerprintSource;
      defaults: RegistrationDefaults;
      logger: Logger;
    },
  ) {}

  async getOrCreateDeviceId(): Promise<DeviceId> {
    const config = await this.refresh();
    return config.deviceId;
  }

  /** Last loaded configuration; only valid after `refresh` resolved once. */
  snapshot(): DeviceConfig {
    if (!this.current) {
      throw new StorageError("Device configuration has not been loaded yet");
    }
    return this.current;
  }

  async getRegistration(): Promise<RegistrationState> {
    const config = await this.refresh();
    return {
      deviceId: config.deviceId,
      playerId: config.playerId,
      serverUrl: config.serverUrl,
      apiPrefix: config.apiPrefix,
    };
  }

  /**
   * Re-reads the document from disk. A read failure after the first load keeps
   * the in-memory copy; on the very first load it is fatal.
   */
  async refresh(): Promise<DeviceConfig> {
    return this.writes.run(async () => {
      if (this.hasUnpersistedChanges && this.current) {
        const pending = this.current;
        try {
          await this.deps.configStore.write(toPersisted(pending));
          this.hasUnpersistedChanges = false;
          this.deps.logger.info(
            { deviceId: pending.deviceId },
            "pending device configuration persisted",
          );
        } catch (error) {
          this.deps.logger.warn(
            { err: error },
            "device configuration still not writable; keeping in-memory copy",
          );
          return pending;
        }
      }

      let persisted: PersistedDeviceConfig | null;
      try {
        persisted = await this.readPersisted();
      } catch (error) {
        if (this.current) {
          this.deps.logger.warn(
            { err: error },
            "device configuration unreadable; keeping in-memory copy",
          );
          return this.current;
        }
        throw error;
      }

      if (persisted?.deviceId) {
        this.current = this.withDefaults(persisted, persisted.deviceId);
        return this.current;
      }

      return this.bootstrap(persisted);
    });
  }

  async setPlayerId(value: string | number): Promise<DeviceConfig> {
    const playerId = withValidation(() => normalizePlayerId(value));
    return this.update((config) => ({ ...config, playerId }));
  }

  async clearPlayerId(): Promise<DeviceConfig> {
    return this.update((config) => ({ ...config, playerId: null }));
  }

  async setServerUrl(value: string): Promise<DeviceConfig> {
    const serverUrl = withValidation(() => normalizeServerUrl(value));
    return this.update((config) => ({ ...config, serverUrl }));
  }

  /**
   * Forgets the player association and the executed-command watermark. The
   * device id is kept.
   */
  async resetRegistration(): Promise<DeviceConfig> {
    const config = await this.update((current) => ({
      ...current,
      playerId: null,
    }));
    await this.deps.watermarkStore.remove();
    this.deps.logger.info(
      { deviceId: config.deviceId },
      "registration reset",
    );
    return config;
  }

  /**
   * Player id learned from the control server. Storage failures degrade to an
   * in-memory value that is written again on the next `refresh`.
   */
  async adoptPlayerId(
    value: string,
  ): Promise<{ previous: string | null; current: string }> {
    const playerId = withValidation(() => normalizePlayerId(value));
    const before = await this.refresh();
    if (before.playerId === playerId) {
      return { previous: before.playerId, current: playerId };
    }

    try {
      await this.update((config) => ({ ...config, playerId }));
    } catch (error) {
      if (!(error instanceof StorageError)) throw error;
      this.current = { ...before, playerId };
      this.hasUnpersistedChanges = true;
      this.deps.logger.warn(
        { err: error, playerId },
        "player id kept in memory until storage recovers",
      );
    }

    this.deps.logger.info(
      { deviceId: before.deviceId, previous: before.playerId, playerId },
      "player id assigned",
    );
    return { previous: before.playerId, current: playerId };
  }

  private async update(
    mutate: (config: DeviceConfig) => DeviceConfig,
  ): Promise<DeviceConfig> {
    const base = await this.refresh();
    return this.writes.run(async () => {
      const next = mutate(this.current ?? base);
      await this.deps.configStore.write(toPersisted(next));
      this.current = next;
      this.hasUnpersistedChanges = false;
      return next;
    });
  }

  private async readPersisted(): Promise<PersistedDeviceConfig | null> {
    try {
      return await this.deps.configStore.read();
    } catch (error) {
      if (error instanceof ConfigError) {
        this.deps.logger.warn(
          { err: error, path: error.path },
          "device configuration is corrupt; starting from a fresh bootstrap",
        );
        return null;
      }
      throw error;
    }
  }

  private async bootstrap(
    persisted: PersistedDeviceConfig | null,
  ): Promise<DeviceConfig> {
    const fingerprint = await this.deps.fingerprintSource.read();
    const deviceId = deriveDeviceId(fingerprint);
    const config = this.withDefaults(persisted ?? {}, deviceId);

    try {
      await this.deps.configStore.write(toPersisted(config));
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError("Device identity could not be persisted", undefined, {
        cause: error,
      });
    }

    this.deps.logger.info({ deviceId }, "device identity created");
    this.current = config;
    return config;
  }

  private withDefaults(
    persisted: PersistedDeviceConfig,
    deviceId: DeviceId,
  ): DeviceConfig {
    const { defaults } = this.deps;
    const interval =
      persisted.heartbeatIntervalSeconds ?? defaults.heartbeatIntervalSeconds;

    return {
      deviceId,
      playerId: persisted.playerId ?? null,
      serverUrl: persisted.serverUrl ?? defaults.serverUrl,
      apiPrefix: normalizeApiPrefix(persisted.apiPrefix ?? defaults.apiPrefix),
      heartbeatIntervalSeconds: Math.max(
        MIN_HEARTBEAT_INTERVAL_SECONDS,
        Math.trunc(interval),
      ),
    };
  }
}
