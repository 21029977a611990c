import {
  type WifiConfigurator,
  type WifiCredentials,
} from "#/application/ports/network";
import {
  type CommandRunner,
  runChecked,
} from "#/infrastructure/system/run-command";

const CONNECT_TIMEOUT_MS = 45_000;

/** Splits `nmcli -t` output, where `:` separates fields and `\:` escapes it. */
export const parseTerseSsids = (output: string): string[] => {
  const seen = new Set<string>();
  for (const line of output.split("\n")) {
    const ssid = line.replace(/\\:/g, ":").trim();
    if (ssid) seen.add(ssid);
  }
  return Array.from(seen).sort((a, b) => a.localeCompare(b));
};

export class NmcliWifiConfigurator implements WifiConfigurator {
  constructor(
    private readonly deps: {
      interfaceName: string;
      run: CommandRunner;
    },
  ) {}

  async apply(credentials: WifiCredentials): Promise<void> {
    const args = [
      "device",
      "wifi",
      "connect",
      credentials.ssid,
      "ifname",
      this.deps.interfaceName,
    ];
    if (credentials.password) {
      args.push("password", credentials.password);
    }
    await runChecked(this.deps.run, "nmcli", args, {
      timeoutMs: CONNECT_TIMEOUT_MS,
    });
  }

  async scan(): Promise<string[]> {
    const output = await runChecked(this.deps.run, "nmcli", [
      "-t",
      "-f",
      "SSID",
      "device",
      "wifi",
      "list",
      "ifname",
      this.deps.interfaceName,
      "--rescan",
      "auto",
    ]);
    return parseTerseSsids(output.stdout.toString("utf8"));
  }
}
