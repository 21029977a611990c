import {
  type DisplayPowerControl,
  type DisplayPowerState,
} from "#/application/ports/device-control";
import {
  type CommandRunner,
  firstSuccessful,
  runChecked,
} from "./run-command";

export const parseVcgencmdPower = (output: string): DisplayPowerState => {
  const match = /display_power=(\d)/.exec(output);
  if (!match) return "unknown";
  return match[1] === "1" ? "on" : "off";
};

export const parseTvserviceStatus = (output: string): DisplayPowerState => {
  if (/TV is off/i.test(output)) return "off";
  if (/state 0x[0-9a-f]+/i.test(output)) return "on";
  return "unknown";
};

/** HDMI power through `vcgencmd`, falling back to `tvservice`. */
export class VcgencmdDisplayPower implements DisplayPowerControl {
  constructor(private readonly run: CommandRunner) {}

  async getState(): Promise<DisplayPowerState> {
    return firstSuccessful([
      async () => {
        const output = await runChecked(this.run, "vcgencmd", ["display_power"]);
        return parseVcgencmdPower(output.stdout.toString("utf8"));
      },
      async () => {
        const output = await runChecked(this.run, "tvservice", ["-s"]);
        return parseTvserviceStatus(output.stdout.toString("utf8"));
      },
    ]);
  }

  async setState(state: "on" | "off"): Promise<void> {
    await firstSuccessful([
      () =>
        runChecked(this.run, "vcgencmd", [
          "display_power",
          state === "on" ? "1" : "0",
        ]),
      () => runChecked(this.run, "tvservice", [state === "on" ? "-p" : "-o"]),
    ]);
  }
}
