import { randomUUID } from "node:crypto";
import { readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type ScreenCapture } from "#/application/ports/device-control";
import { type CommandRunner, firstSuccessful, runChecked } from "./run-command";

type FileReader = (path: string) => Promise<Uint8Array>;

/** PNG of the current screen via `raspi2png`, falling back to `scrot`. */
export class CommandScreenCapture implements ScreenCapture {
  private readonly readBytes: FileReader;

  constructor(
    private readonly run: CommandRunner,
    readBytes?: FileReader,
  ) {
    this.readBytes = readBytes ?? ((path) => readFile(path));
  }

  async capture(): Promise<Uint8Array> {
    const path = join(tmpdir(), `player-screenshot-${randomUUID()}.png`);
    try {
      await firstSuccessful([
        () => runChecked(this.run, "raspi2png", ["-p", path]),
        () =>
          runChecked(this.run, "scrot", [path], {
            env: { ...process.env, DISPLAY: ":0" },
          }),
      ]);
      return await this.readBytes(path);
    } finally {
      await rm(path, { force: true });
    }
  }
}
