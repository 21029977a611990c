import { mkdir, open } from "node:fs/promises";
import { dirname } from "node:path";
import { StorageError, TransportError } from "#/application/errors";
import { type MediaDownloader } from "#/application/ports/content";

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export class HttpMediaDownloader implements MediaDownloader {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly deps: {
      downloadTimeoutMs: number;
      fetch?: FetchFn;
    },
  ) {
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
  }

  async download(url: string, destinationPath: string): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.deps.downloadTimeoutMs),
      });
    } catch (error) {
      throw new TransportError(`Download of ${url} failed`, "network", undefined, {
        cause: error,
      });
    }
    if (!response.ok || !response.body) {
      throw new TransportError(
        `Download of ${url} failed: HTTP ${response.status}`,
        "http",
        response.status,
      );
    }

    await mkdir(dirname(destinationPath), { recursive: true });
    const file = await open(destinationPath, "w");
    const reader = response.body.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        await file.write(value).catch(async (error: unknown) => {
          await reader.cancel(error);
          throw new StorageError(
            `Failed to write ${destinationPath}`,
            destinationPath,
            { cause: error },
          );
        });
      }
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new TransportError(`Download of ${url} was interrupted`, "network", response.status, {
        cause: error,
      });
    } finally {
      await file.close();
    }
  }
}
