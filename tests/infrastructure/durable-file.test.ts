import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  renameDurably,
  syncPath,
  writeFileDurably,
} from "#/infrastructure/storage/durable-file";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "durable-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("writeFileDurably", () => {
  test("replaces the target and leaves no temp file behind", async () => {
    const path = join(dir, "state.json");
    await writeFile(path, "old");

    await writeFileDurably(path, "new");

    expect(await readFile(path, "utf8")).toBe("new");
    expect(await readdir(dir)).toEqual(["state.json"]);
  });

  test("rejects without touching anything when the directory is missing", async () => {
    const path = join(dir, "missing", "state.json");

    await expect(writeFileDurably(path, "new")).rejects.toMatchObject({
      code: "ENOENT",
    });
    expect(await readdir(dir)).toEqual([]);
  });
});

describe("renameDurably", () => {
  test("moves a synced file into place", async () => {
    const from = join(dir, "staged.part");
    const to = join(dir, "final");
    await writeFile(from, "payload");

    await renameDurably(from, to);

    expect(await readFile(to, "utf8")).toBe("payload");
    expect(await readdir(dir)).toEqual(["final"]);
  });

  test("a missing source leaves the target alone", async () => {
    const to = join(dir, "final");
    await writeFile(to, "kept");

    await expect(renameDurably(join(dir, "gone.part"), to)).rejects.toMatchObject({
      code: "ENOENT",
    });
    expect(await readFile(to, "utf8")).toBe("kept");
  });
});

describe("syncPath", () => {
  test("flushes files and directories", async () => {
    const path = join(dir, "a");
    await writeFile(path, "a");

    await expect(syncPath(path)).resolves.toBeUndefined();
    await expect(syncPath(dir)).resolves.toBeUndefined();
  });
});
