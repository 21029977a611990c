import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { StorageError, TransportError } from "#/application/errors";
import { HttpMediaDownloader } from "#/infrastructure/http/http-media.downloader";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "download-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("HttpMediaDownloader", () => {
  test("streams the body into the destination, creating directories", async () => {
    const requested: string[] = [];
    const downloader = new HttpMediaDownloader({
      downloadTimeoutMs: 1_000,
      fetch: async (input) => {
        requested.push(input);
        return new Response("frame-data");
      },
    });
    const destination = join(root, "staging", "abc.part");

    await downloader.download("http://signage.test/media/abc", destination);

    expect(requested).toEqual(["http://signage.test/media/abc"]);
    expect(await readFile(destination, "utf8")).toBe("frame-data");
  });

  test("reports HTTP failures with their status", async () => {
    const downloader = new HttpMediaDownloader({
      downloadTimeoutMs: 1_000,
      fetch: async () => new Response("gone", { status: 404 }),
    });

    const error = await downloader
      .download("http://signage.test/media/abc", join(root, "abc.part"))
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: "Download of http://signage.test/media/abc failed: HTTP 404",
      reason: "http",
      status: 404,
    });
  });

  test("wraps connection errors", async () => {
    const downloader = new HttpMediaDownloader({
      downloadTimeoutMs: 1_000,
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });

    await expect(
      downloader.download("http://signage.test/media/abc", join(root, "abc.part")),
    ).rejects.toMatchObject({
      message: "Download of http://signage.test/media/abc failed",
      reason: "network",
    });
  });

  test("a body that breaks off mid-stream is reported as interrupted", async () => {
    const downloader = new HttpMediaDownloader({
      downloadTimeoutMs: 1_000,
      fetch: async () =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.enqueue(new TextEncoder().encode("partial"));
            },
            pull(controller) {
              controller.error(new Error("connection reset"));
            },
          }),
        ),
    });

    await expect(
      downloader.download("http://signage.test/media/abc", join(root, "abc.part")),
    ).rejects.toMatchObject({
      message: "Download of http://signage.test/media/abc was interrupted",
      reason: "network",
    });
  });

  test.skipIf(!existsSync("/dev/full"))(
    "stops reading the body when the destination cannot be written",
    async () => {
      const cancelled: unknown[] = [];
      const downloader = new HttpMediaDownloader({
        downloadTimeoutMs: 1_000,
        fetch: async () =>
          new Response(
            new ReadableStream<Uint8Array>({
              pull(controller) {
                controller.enqueue(new TextEncoder().encode("frame"));
              },
              cancel(reason) {
                cancelled.push(reason);
              },
            }),
          ),
      });

      const error = await downloader
        .download("http://signage.test/media/abc", "/dev/full")
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({
        message: "Failed to write /dev/full",
        path: "/dev/full",
      });
      expect(cancelled).toHaveLength(1);
    },
  );
});
