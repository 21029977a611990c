import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { sha256Hex } from "#/domain/content/checksum";
import { MediaFileStore } from "#/infrastructure/storage/media-file.store";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "media-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

const stage = async (store: MediaFileStore, checksum: string, body: string) => {
  const path = store.stagingPath(checksum);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, body);
  return path;
};

const exists = (path: string) =>
  stat(path).then(
    () => true,
    () => false,
  );

describe("MediaFileStore", () => {
  test("commits a staged file whose digest matches", async () => {
    const store = new MediaFileStore(join(root, "media"));
    const checksum = sha256Hex("alpha");
    const staged = await stage(store, checksum, "alpha");

    expect(await store.commit(checksum, staged)).toBe(true);

    expect(await readFile(store.pathFor(checksum), "utf8")).toBe("alpha");
    expect(await store.has(checksum)).toBe(true);
    expect(await store.verify(checksum)).toBe(true);
    expect(await exists(staged)).toBe(false);
  });

  test("discards a staged file with the wrong digest", async () => {
    const store = new MediaFileStore(join(root, "media"));
    const checksum = sha256Hex("alpha");
    const staged = await stage(store, checksum, "tampered");

    expect(await store.commit(checksum, staged)).toBe(false);

    expect(await store.has(checksum)).toBe(false);
    expect(await exists(staged)).toBe(false);
  });

  test("lists only content-addressed files", async () => {
    const store = new MediaFileStore(root);
    const a = sha256Hex("a");
    const b = sha256Hex("b");
    await writeFile(join(root, b), "b");
    await writeFile(join(root, a), "a");
    await writeFile(join(root, "notes.txt"), "x");

    expect(await store.list()).toEqual([a, b].sort());

    await store.remove(a);
    expect(await store.list()).toEqual([b]);
  });

  test("an absent root lists nothing", async () => {
    expect(await new MediaFileStore(join(root, "missing")).list()).toEqual([]);
  });

  test("detects a stored file that no longer matches", async () => {
    const store = new MediaFileStore(root);
    const checksum = sha256Hex("alpha");
    await writeFile(join(root, checksum), "bit rot");

    expect(await store.verify(checksum)).toBe(false);
  });
});
