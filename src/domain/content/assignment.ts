export interface ContentItem {
  mediaRef: string;
  duration: number;
  checksum: string;
}

export interface ContentAssignment {
  playlistVersion: string;
  items: ContentItem[];
}

export interface ActivePlaylistItem extends ContentItem {
  localPath: string;
}

/** The playlist the kiosk renders; only ever a fully verified assignment. */
export interface ActivePlaylist {
  playlistVersion: string;
  items: ActivePlaylistItem[];
  activatedAt: string;
  refreshNonce: number;
}

export const uniqueChecksums = (assignment: ContentAssignment): string[] =>
  Array.from(new Set(assignment.items.map((item) => item.checksum)));

export const isSameAssignment = (
  a: ContentAssignment,
  b: ContentAssignment,
): boolean => {
  if (a.playlistVersion !== b.playlistVersion) return false;
  if (a.items.length !== b.items.length) return false;
  return a.items.every((item, index) => {
    const other = b.items[index];
    return (
      other !== undefined &&
      other.checksum === item.checksum &&
      other.mediaRef === item.mediaRef &&
      other.duration === item.duration
    );
  });
};

/**
 * Relative media refs are served by the control server itself.
 */
export const resolveMediaUrl = (mediaRef: string, serverUrl: string): string => {
  if (/^https?:\/\//i.test(mediaRef)) {
    return mediaRef;
  }
  const base = serverUrl.endsWith("/") ? serverUrl : `${serverUrl}/`;
  return new URL(mediaRef.replace(/^\/+/, ""), base).toString();
};

export const buildActivePlaylist = (input: {
  assignment: ContentAssignment;
  localPathFor: (checksum: string) => string;
  activatedAt: Date;
  refreshNonce: number;
}): ActivePlaylist => ({
  playlistVersion: input.assignment.playlistVersion,
  items: input.assignment.items.map((item) => ({
    ...item,
    localPath: input.localPathFor(item.checksum),
  })),
  activatedAt: input.activatedAt.toISOString(),
  refreshNonce: input.refreshNonce,
});
