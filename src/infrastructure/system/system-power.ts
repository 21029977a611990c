import { type SystemPowerControl } from "#/application/ports/device-control";
import { type CommandRunner, runChecked } from "./run-command";

export class SudoSystemPower implements SystemPowerControl {
  constructor(private readonly run: CommandRunner) {}

  async reboot(): Promise<void> {
    await runChecked(this.run, "sudo", ["reboot"]);
  }
}
