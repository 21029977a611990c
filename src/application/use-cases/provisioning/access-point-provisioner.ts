import {
  type AccessPointControl,
  type WifiConfigurator,
  type WifiCredentials,
} from "#/application/ports/network";
import { type Logger } from "#/application/ports/observability";

export type ProvisioningStatus = "accepted" | "busy" | "invalid";

export interface ProvisioningSubmission {
  status: ProvisioningStatus;
  message: string;
}

const MAX_SSID_LENGTH = 32;
const MIN_PASSPHRASE_LENGTH = 8;
const MAX_PASSPHRASE_LENGTH = 63;

export const validateWifiCredentials = (
  credentials: WifiCredentials,
): string | null => {
  const ssid = credentials.ssid.trim();
  if (ssid.length === 0 || ssid.length > MAX_SSID_LENGTH) {
    return `SSID must be 1-${MAX_SSID_LENGTH} characters`;
  }
  const password = credentials.password;
  if (
    password.length > 0 &&
    (password.length < MIN_PASSPHRASE_LENGTH ||
      password.length > MAX_PASSPHRASE_LENGTH)
  ) {
    return `Password must be empty or ${MIN_PASSPHRASE_LENGTH}-${MAX_PASSPHRASE_LENGTH} characters`;
  }
  return null;
};

/**
 * Local access point plus credential intake. Only one credential application
 * runs at a time; a submission arriving meanwhile is answered `busy`.
 */
export class AccessPointProvisioner {
  private active = false;
  private applying: Promise<void> | null = null;

  constructor(
    private readonly deps: {
      accessPoint: AccessPointControl;
      wifi: WifiConfigurator;
      ssid: string;
      password: string | null;
      onNetworkConfigured: () => void;
      logger: Logger;
    },
  ) {}

  isActive(): boolean {
    return this.active;
  }

  isApplying(): boolean {
    return this.applying !== null;
  }

  get ssid(): string {
    return this.deps.ssid;
  }

  async activate(): Promise<void> {
    if (this.active || this.applying) return;
    await this.deps.accessPoint.start({
      ssid: this.deps.ssid,
      password: this.deps.password,
    });
    this.active = true;
    this.deps.logger.warn(
      { ssid: this.deps.ssid },
      "access point started for network provisioning",
    );
  }

  async deactivate(): Promise<void> {
    if (!this.active || this.applying) return;
    await this.deps.accessPoint.stop();
    this.active = false;
    this.deps.logger.info({ ssid: this.deps.ssid }, "access point stopped");
  }

  submitCredentials(credentials: WifiCredentials): ProvisioningSubmission {
    if (this.applying) {
      return {
        status: "busy",
        message: "Another network configuration is being applied",
      };
    }

    const problem = validateWifiCredentials(credentials);
    if (problem) {
      return { status: "invalid", message: problem };
    }

    const normalized = {
      ssid: credentials.ssid.trim(),
      password: credentials.password,
    };
    this.applying = this.apply(normalized).finally(() => {
      this.applying = null;
    });

    return {
      status: "accepted",
      message: `Connecting to ${normalized.ssid}`,
    };
  }

  async scanNetworks(): Promise<string[]> {
    try {
      return await this.deps.wifi.scan();
    } catch (error) {
      this.deps.logger.warn({ err: error }, "wifi scan failed");
      return [];
    }
  }

  /** Resolves once no credential application is in flight. */
  async whenIdle(): Promise<void> {
    if (this.applying) {
      await this.applying;
    }
  }

  private async apply(credentials: WifiCredentials): Promise<void> {
    const wasActive = this.active;
    try {
      if (this.active) {
        await this.deps.accessPoint.stop();
        this.active = false;
      }
      await this.deps.wifi.apply(credentials);
      this.deps.logger.info(
        { ssid: credentials.ssid },
        "wifi credentials applied",
      );
      this.deps.onNetworkConfigured();
    } catch (error) {
      this.deps.logger.warn(
        { err: error, ssid: credentials.ssid },
        "applying wifi credentials failed",
      );
      if (wasActive) {
        await this.rearm();
      }
    }
  }

  private async rearm(): Promise<void> {
    try {
      await this.deps.accessPoint.start({
        ssid: this.deps.ssid,
        password: this.deps.password,
      });
      this.active = true;
      this.deps.logger.warn(
        { ssid: this.deps.ssid },
        "access point re-armed after failed provisioning",
      );
    } catch (error) {
      this.active = false;
      // The control loop retries activation while fallback stays requested.
      this.deps.logger.error(
        { err: error, ssid: this.deps.ssid },
        "access point could not be re-armed",
      );
    }
  }
}
