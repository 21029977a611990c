import { createHash, randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import { mkdir, readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { type MediaStore } from "#/application/ports/content";
import { isSha256Hex } from "#/domain/content/checksum";
import { renameDurably } from "#/infrastructure/storage/durable-file";

const STAGING_DIR = ".staging";

const digestFile = (path: string): Promise<string> =>
  new Promise<string>((resolve, reject) => {
    const hash = createHash("sha256");
    const stream = createReadStream(path);
    stream.on("data", (chunk) => hash.update(chunk));
    stream.once("error", reject);
    stream.once("end", () => resolve(hash.digest("hex")));
  });

/**
 * Content-addressed media directory: `<root>/<sha256>`. Downloads are staged
 * under `<root>/.staging` and only renamed into place after their digest
 * matched the expected checksum.
 */
export class MediaFileStore implements MediaStore {
  constructor(private readonly root: string) {}

  pathFor(checksum: string): string {
    return join(this.root, checksum);
  }

  stagingPath(checksum: string): string {
    return join(this.root, STAGING_DIR, `${checksum}.${randomUUID()}.part`);
  }

  async has(checksum: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(checksum));
      return info.isFile();
    } catch {
      return false;
    }
  }

  async verify(checksum: string): Promise<boolean> {
    if (!(await this.has(checksum))) return false;
    return (await digestFile(this.pathFor(checksum))) === checksum;
  }

  async commit(checksum: string, stagingPath: string): Promise<boolean> {
    const digest = await digestFile(stagingPath);
    if (digest !== checksum) {
      await this.discard(stagingPath);
      return false;
    }
    await mkdir(this.root, { recursive: true });
    await renameDurably(stagingPath, this.pathFor(checksum));
    return true;
  }

  async discard(stagingPath: string): Promise<void> {
    await rm(stagingPath, { force: true });
  }

  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && isSha256Hex(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === "ENOENT"
      ) {
        return [];
      }
      throw error;
    }
  }

  async remove(checksum: string): Promise<void> {
    await rm(this.pathFor(checksum), { force: true });
  }
}
