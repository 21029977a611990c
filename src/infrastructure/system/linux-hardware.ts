import { readFile, statfs } from "node:fs/promises";
import { networkInterfaces, uptime } from "node:os";
import {
  type HardwareFingerprintSource,
  type SystemInfo,
  type SystemInfoProvider,
} from "#/application/ports/hardware";
import {
  FALLBACK_CPU_SERIAL,
  type HardwareFingerprint,
} from "#/domain/identity/device-identity";
import { type CommandRunner } from "./run-command";

const MAC_INTERFACES = ["eth0", "wlan0", "en0", "enp0s3"] as const;
const EMPTY_MAC = "00:00:00:00:00:00";

type FileReader = (path: string) => Promise<string>;

const readText: FileReader = (path) => readFile(path, "utf8");

export const parseCpuSerial = (cpuinfo: string): string => {
  for (const line of cpuinfo.split("\n")) {
    const match = /^Serial\s*:\s*(\S+)/.exec(line);
    if (match?.[1]) return match[1];
  }
  return FALLBACK_CPU_SERIAL;
};

const firstExternalInterface = (
  family: "IPv4" | "any",
): { address: string; mac: string } | null => {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.internal) continue;
      if (family === "IPv4" && address.family !== "IPv4") continue;
      return { address: address.address, mac: address.mac };
    }
  }
  return null;
};

export const parseFbsetGeometry = (output: string): string | null => {
  const match = /geometry (\d+) (\d+)/.exec(output);
  return match ? `${match[1]}x${match[2]}` : null;
};

export const parseXrandrCurrent = (output: string): string | null => {
  const match = /current (\d+) x (\d+)/.exec(output);
  return match ? `${match[1]}x${match[2]}` : null;
};

/** Reads the identity inputs and the status figures of a Linux player. */
export class LinuxHardware implements HardwareFingerprintSource, SystemInfoProvider {
  private readonly readText: FileReader;

  constructor(
    private readonly deps: {
      run: CommandRunner;
      agentVersion: string;
      storagePath: string;
      readText?: FileReader;
    },
  ) {
    this.readText = deps.readText ?? readText;
  }

  async read(): Promise<HardwareFingerprint> {
    const cpuinfo = await this.readText("/proc/cpuinfo").catch(() => "");
    return {
      cpuSerial: parseCpuSerial(cpuinfo),
      macAddress: await this.macAddress(),
    };
  }

  async collect(): Promise<SystemInfo> {
    const [storage, screenResolution, macAddress] = await Promise.all([
      this.storage(),
      this.screenResolution(),
      this.macAddress(),
    ]);
    return {
      ipAddress: firstExternalInterface("IPv4")?.address ?? null,
      macAddress,
      storageUsedBytes: storage.used,
      storageTotalBytes: storage.total,
      screenResolution,
      uptimeSeconds: Math.trunc(uptime()),
      agentVersion: this.deps.agentVersion,
    };
  }

  private async macAddress(): Promise<string> {
    for (const name of MAC_INTERFACES) {
      const value = await this.readText(`/sys/class/net/${name}/address`)
        .then((text) => text.trim())
        .catch(() => "");
      if (value && value !== EMPTY_MAC) return value;
    }
    return firstExternalInterface("any")?.mac ?? "";
  }

  private async storage(): Promise<{ used: number; total: number }> {
    try {
      const stats = await statfs(this.deps.storagePath);
      const total = stats.bsize * stats.blocks;
      const free = stats.bsize * stats.bavail;
      return { used: total - free, total };
    } catch {
      return { used: 0, total: 0 };
    }
  }

  private async screenResolution(): Promise<string> {
    const fbset = await this.deps
      .run("fbset", ["-s"], { timeoutMs: 5_000 })
      .catch(() => null);
    if (fbset?.code === 0) {
      const geometry = parseFbsetGeometry(fbset.stdout.toString("utf8"));
      if (geometry) return geometry;
    }

    const xrandr = await this.deps
      .run("xrandr", ["--current"], {
        timeoutMs: 5_000,
        env: { ...process.env, DISPLAY: ":0" },
      })
      .catch(() => null);
    if (xrandr?.code === 0) {
      const current = parseXrandrCurrent(xrandr.stdout.toString("utf8"));
      if (current) return current;
    }
    return "unknown";
  }
}
