import { describe, expect, test } from "vitest";
import {
  buildActivePlaylist,
  type ContentAssignment,
  isSameAssignment,
  resolveMediaUrl,
  uniqueChecksums,
} from "#/domain/content/assignment";
import { isSha256Hex, normalizeChecksum, sha256Hex } from "#/domain/content/checksum";

const A = "a".repeat(64);
const B = "b".repeat(64);

const assignment: ContentAssignment = {
  playlistVersion: "v1",
  items: [
    { mediaRef: "/media/a.mp4", duration: 10, checksum: A },
    { mediaRef: "/media/b.png", duration: 5, checksum: B },
    { mediaRef: "/media/a.mp4", duration: 10, checksum: A },
  ],
};

describe("content assignment", () => {
  test("deduplicates checksums in order", () => {
    expect(uniqueChecksums(assignment)).toEqual([A, B]);
  });

  test("compares version and items", () => {
    expect(isSameAssignment(assignment, { ...assignment })).toBe(true);
    expect(isSameAssignment(assignment, { ...assignment, playlistVersion: "v2" })).toBe(
      false,
    );
    expect(
      isSameAssignment(assignment, {
        ...assignment,
        items: assignment.items.slice(0, 2),
      }),
    ).toBe(false);
  });

  test("resolves relative refs against the server url", () => {
    expect(resolveMediaUrl("/media/a.mp4", "https://signage.test")).toBe(
      "https://signage.test/media/a.mp4",
    );
    expect(resolveMediaUrl("media/a.mp4", "https://signage.test/base")).toBe(
      "https://signage.test/base/media/a.mp4",
    );
    expect(resolveMediaUrl("https://cdn.test/a.mp4", "https://signage.test")).toBe(
      "https://cdn.test/a.mp4",
    );
  });

  test("builds the active playlist with local paths", () => {
    const playlist = buildActivePlaylist({
      assignment,
      localPathFor: (checksum) => `/data/media/${checksum}`,
      activatedAt: new Date("2025-01-01T00:00:00.000Z"),
      refreshNonce: 2,
    });

    expect(playlist.playlistVersion).toBe("v1");
    expect(playlist.activatedAt).toBe("2025-01-01T00:00:00.000Z");
    expect(playlist.refreshNonce).toBe(2);
    expect(playlist.items[1]).toEqual({
      mediaRef: "/media/b.png",
      duration: 5,
      checksum: B,
      localPath: `/data/media/${B}`,
    });
  });
});

describe("checksums", () => {
  test("hashes and validates sha-256 hex", () => {
    expect(sha256Hex("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
    expect(isSha256Hex(normalizeChecksum(` ${A.toUpperCase()} `))).toBe(true);
    expect(isSha256Hex("abc")).toBe(false);
  });
});
