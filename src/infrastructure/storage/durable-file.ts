import { randomUUID } from "node:crypto";
import { open, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";

/** Flushes a file, or a directory entry list, to the storage device. */
export const syncPath = async (path: string): Promise<void> => {
  const handle = await open(path, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
};

/**
 * Renames `from` over `to` once its contents are on disk, then flushes the
 * directory so the new entry survives a power cut.
 */
export const renameDurably = async (from: string, to: string): Promise<void> => {
  await syncPath(from);
  await rename(from, to);
  await syncPath(dirname(to));
};

/** Replaces `path` with `content`; a reader sees the old or the new file, never a torn one. */
export const writeFileDurably = async (
  path: string,
  content: string,
): Promise<void> => {
  const tempPath = `${path}.${randomUUID()}.tmp`;
  try {
    const handle = await open(tempPath, "w");
    try {
      await handle.writeFile(content, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
    await syncPath(dirname(path));
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
};
