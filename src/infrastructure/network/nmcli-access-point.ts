import { type AccessPointControl } from "#/application/ports/network";
import { type Logger } from "#/application/ports/observability";
import {
  CommandFailedError,
  type CommandRunner,
  runChecked,
} from "#/infrastructure/system/run-command";

export const HOTSPOT_CONNECTION_NAME = "player-setup-hotspot";

/** NetworkManager hotspot on the wireless interface. */
export class NmcliAccessPoint implements AccessPointControl {
  constructor(
    private readonly deps: {
      interfaceName: string;
      run: CommandRunner;
      logger: Logger;
    },
  ) {}

  async start(input: { ssid: string; password: string | null }): Promise<void> {
    const args = [
      "device",
      "wifi",
      "hotspot",
      "ifname",
      this.deps.interfaceName,
      "con-name",
      HOTSPOT_CONNECTION_NAME,
      "ssid",
      input.ssid,
    ];
    if (input.password) {
      args.push("password", input.password);
    }
    await runChecked(this.deps.run, "nmcli", args);
    this.deps.logger.debug(
      { ssid: input.ssid, interfaceName: this.deps.interfaceName },
      "hotspot connection up",
    );
  }

  async stop(): Promise<void> {
    const output = await this.deps.run("nmcli", [
      "connection",
      "down",
      HOTSPOT_CONNECTION_NAME,
    ]);
    // nmcli exits 10 when the connection is not active.
    if (output.code !== 0 && output.code !== 10) {
      throw new CommandFailedError("nmcli", output.code, output.stderr);
    }
  }
}
