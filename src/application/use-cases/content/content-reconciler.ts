import { ConfigError, describeError, StorageError } from "#/application/errors";
import { type Clock } from "#/application/ports/clock";
import { type MediaDownloader, type MediaStore } from "#/application/ports/content";
import {
  type ActivePlaylistStore,
  type AssignmentCacheStore,
} from "#/application/ports/documents";
import { type Logger } from "#/application/ports/observability";
import { mapWithConcurrency } from "#/application/use-cases/shared/concurrency";
import {
  type ActivePlaylist,
  buildActivePlaylist,
  type ContentAssignment,
  isSameAssignment,
  resolveMediaUrl,
} from "#/domain/content/assignment";

export type ReconcileResult =
  | { status: "idle" }
  | { status: "unchanged"; playlistVersion: string }
  | { status: "activated"; playlistVersion: string; removedMedia: number }
  | { status: "refreshed"; playlistVersion: string; refreshNonce: number }
  | {
      status: "incomplete";
      playlistVersion: string;
      activeVersion: string | null;
      missing: string[];
    }
  | { status: "failed"; playlistVersion: string; error: string };

export interface ReconcileOptions {
  serverUrl: string;
  force?: boolean;
}

const sameItems = (active: ActivePlaylist, assignment: ContentAssignment) =>
  isSameAssignment(
    { playlistVersion: active.playlistVersion, items: active.items },
    assignment,
  );

/**
 * Turns the assigned playlist into the active one. Media land in the store
 * only after their digest matched, and the active playlist document is
 * replaced only once every item is present.
 */
export class ContentReconciler {
  private cached: ContentAssignment | null = null;
  private cacheLoaded = false;

  constructor(
    private readonly deps: {
      mediaStore: MediaStore;
      downloader: MediaDownloader;
      assignmentStore: AssignmentCacheStore;
      activePlaylistStore: ActivePlaylistStore;
      clock: Clock;
      downloadConcurrency: number;
      logger: Logger;
    },
  ) {}

  /** Caches a server assignment; resolves `true` when it differs from the cached one. */
  async accept(assignment: ContentAssignment): Promise<boolean> {
    const previous = await this.cachedAssignment();
    if (previous && isSameAssignment(previous, assignment)) {
      return false;
    }

    this.cached = assignment;
    try {
      await this.deps.assignmentStore.write(assignment);
    } catch (error) {
      this.deps.logger.warn(
        { err: error, playlistVersion: assignment.playlistVersion },
        "content assignment cached in memory only",
      );
    }
    this.deps.logger.info(
      {
        playlistVersion: assignment.playlistVersion,
        items: assignment.items.length,
      },
      "content assignment received",
    );
    return true;
  }

  async discardCachedAssignment(): Promise<void> {
    this.cached = null;
    this.cacheLoaded = true;
    await this.deps.assignmentStore.remove();
  }

  async activePlaylist(): Promise<ActivePlaylist | null> {
    try {
      return await this.deps.activePlaylistStore.read();
    } catch (error) {
      if (error instanceof ConfigError || error instanceof StorageError) {
        this.deps.logger.warn({ err: error }, "active playlist unreadable");
        return null;
      }
      throw error;
    }
  }

  async reconcile(options: ReconcileOptions): Promise<ReconcileResult> {
    const assignment = await this.cachedAssignment();
    if (!assignment) {
      return { status: "idle" };
    }

    const active = await this.activePlaylist();
    const force = options.force ?? false;
    const alreadyActive = active !== null && sameItems(active, assignment);
    if (alreadyActive && !force) {
      return { status: "unchanged", playlistVersion: assignment.playlistVersion };
    }

    const missing = await this.fetchMissing(assignment, options.serverUrl);
    if (missing.length > 0) {
      this.deps.logger.warn(
        {
          playlistVersion: assignment.playlistVersion,
          activeVersion: active?.playlistVersion ?? null,
          missing,
        },
        "content incomplete; keeping the current playlist active",
      );
      return {
        status: "incomplete",
        playlistVersion: assignment.playlistVersion,
        activeVersion: active?.playlistVersion ?? null,
        missing,
      };
    }

    const currentNonce = active?.refreshNonce ?? 0;
    const playlist = buildActivePlaylist({
      assignment,
      localPathFor: (checksum) => this.deps.mediaStore.pathFor(checksum),
      activatedAt: this.deps.clock.now(),
      refreshNonce: force ? currentNonce + 1 : currentNonce,
    });

    try {
      await this.deps.activePlaylistStore.write(playlist);
    } catch (error) {
      this.deps.logger.error(
        { err: error, playlistVersion: assignment.playlistVersion },
        "active playlist could not be written",
      );
      return {
        status: "failed",
        playlistVersion: assignment.playlistVersion,
        error: describeError(error),
      };
    }

    if (alreadyActive) {
      this.deps.logger.info(
        {
          playlistVersion: playlist.playlistVersion,
          refreshNonce: playlist.refreshNonce,
        },
        "playlist refreshed",
      );
      return {
        status: "refreshed",
        playlistVersion: playlist.playlistVersion,
        refreshNonce: playlist.refreshNonce,
      };
    }

    const removedMedia = await this.collectGarbage(assignment);
    this.deps.logger.info(
      {
        playlistVersion: playlist.playlistVersion,
        previousVersion: active?.playlistVersion ?? null,
        removedMedia,
      },
      "playlist activated",
    );
    return {
      status: "activated",
      playlistVersion: playlist.playlistVersion,
      removedMedia,
    };
  }

  private async cachedAssignment(): Promise<ContentAssignment | null> {
    if (this.cacheLoaded) {
      return this.cached;
    }
    try {
      this.cached = await this.deps.assignmentStore.read();
      this.cacheLoaded = true;
    } catch (error) {
      if (!(error instanceof ConfigError || error instanceof StorageError)) {
        throw error;
      }
      this.deps.logger.warn({ err: error }, "cached assignment unreadable");
      this.cacheLoaded = error instanceof ConfigError;
    }
    return this.cached;
  }

  /** Resolves the checksums that are still not verified in the media store. */
  private async fetchMissing(
    assignment: ContentAssignment,
    serverUrl: string,
  ): Promise<string[]> {
    const sources = new Map<string, string>();
    for (const item of assignment.items) {
      if (!sources.has(item.checksum)) {
        sources.set(item.checksum, item.mediaRef);
      }
    }

    const outcomes = await mapWithConcurrency(
      Array.from(sources.entries()),
      this.deps.downloadConcurrency,
      async ([checksum, mediaRef]) => {
        if (await this.deps.mediaStore.verify(checksum)) {
          return null;
        }
        if (await this.deps.mediaStore.has(checksum)) {
          this.deps.logger.warn({ checksum }, "stored media failed verification");
          await this.deps.mediaStore.remove(checksum);
        }
        const fetched = await this.fetchOne(
          checksum,
          resolveMediaUrl(mediaRef, serverUrl),
        );
        return fetched ? null : checksum;
      },
    );

    return outcomes.filter((checksum): checksum is string => checksum !== null);
  }

  private async fetchOne(checksum: string, url: string): Promise<boolean> {
    const stagingPath = this.deps.mediaStore.stagingPath(checksum);
    try {
      await this.deps.downloader.download(url, stagingPath);
      const committed = await this.deps.mediaStore.commit(checksum, stagingPath);
      if (!committed) {
        this.deps.logger.warn({ checksum, url }, "media checksum mismatch");
      }
      return committed;
    } catch (error) {
      this.deps.logger.warn({ err: error, checksum, url }, "media download failed");
      await this.deps.mediaStore.discard(stagingPath).catch((discardError: unknown) => {
        this.deps.logger.debug(
          { err: discardError, stagingPath },
          "staging file cleanup failed",
        );
      });
      return false;
    }
  }

  private async collectGarbage(assignment: ContentAssignment): Promise<number> {
    const keep = new Set(assignment.items.map((item) => item.checksum));
    let removed = 0;
    try {
      const stored = await this.deps.mediaStore.list();
      for (const checksum of stored) {
        if (keep.has(checksum)) continue;
        await this.deps.mediaStore.remove(checksum);
        removed += 1;
      }
    } catch (error) {
      this.deps.logger.warn({ err: error }, "media garbage collection incomplete");
    }
    return removed;
  }
}
