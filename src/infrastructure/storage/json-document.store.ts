import { mkdir, readFile, rm } from "node:fs/promises";
import { dirname } from "node:path";
import lockfile from "proper-lockfile";
import { type z } from "zod";
import { ConfigError, StorageError } from "#/application/errors";
import { type DocumentStore } from "#/application/ports/documents";
import { writeFileDurably } from "#/infrastructure/storage/durable-file";

const LOCK_OPTIONS = {
  realpath: false,
  stale: 10_000,
  retries: { retries: 10, minTimeout: 20, maxTimeout: 250 },
} as const;

const hasErrorCode = (error: unknown, code: string): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === code;

/**
 * One JSON document on disk. Writes go to a synced temp file that is renamed
 * over the target while holding a lock, so readers see either the old or the
 * new document and never a torn one, even after a power cut.
 */
export class JsonDocumentStore<T> implements DocumentStore<T> {
  constructor(
    private readonly options: {
      path: string;
      label: string;
      schema: z.ZodType<T>;
      toDocument: (value: T) => unknown;
    },
  ) {}

  get path(): string {
    return this.options.path;
  }

  async read(): Promise<T | null> {
    const { path, label, schema } = this.options;
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return null;
      throw new StorageError(`Failed to read ${label}`, path, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`${label} is not valid JSON`, path, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError(
        `${label} is invalid: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
          .join("; ")}`,
        path,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  async write(value: T): Promise<void> {
    const { path } = this.options;
    const content = `${JSON.stringify(this.options.toDocument(value), null, 2)}\n`;
    await this.withLock(() => writeFileDurably(path, content));
  }

  async remove(): Promise<void> {
    await this.withLock(() => rm(this.options.path, { force: true }));
  }

  private async withLock(task: () => Promise<void>): Promise<void> {
    const { path, label } = this.options;
    try {
      await mkdir(dirname(path), { recursive: true });
      const release = await lockfile.lock(path, LOCK_OPTIONS);
      try {
        await task();
      } finally {
        await release();
      }
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to write ${label}`, path, { cause: error });
    }
  }
}
