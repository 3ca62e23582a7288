import {
  AuthExpiredError,
  AuthFailedError,
  CorruptLocalStateError,
  RateLimitedError,
  SyncCancelledError,
  classifyCatalogError,
  errorMessage
} from "./errors";
import { GenreCache } from "./genre-cache";
import { emptyLikedSongs } from "./library-model";
import { logger } from "./logger";
import { RateLimitTracker } from "./rate-limit-tracker";
import type { CatalogPage, RemoteCatalog } from "./remote-catalog";
import { ResumeCursor, readResumeInfo, type InterruptionKind } from "./resume-cursor";
import type { SnapshotStore } from "./snapshot-store";
import { sleep as defaultSleep } from "./spotify-client";
import type {
  LibraryFetch,
  LibraryUser,
  LikedSongs,
  Playlist,
  PlaylistRefresh,
  ResumeInfo,
  Snapshot,
  SyncResult,
  Track
} from "./types";

const SERVICE_ACCOUNT_ID = "spotify";
const MAX_ARTISTS_PER_TRACK = 3;

export type SyncPhase =
  | "idle"
  | "enumerating"
  | "fetching-playlist"
  | "fetching-liked"
  | "completed"
  | "interrupted";

export interface SyncOptions {
  /** Keep playlists owned by the service account itself. */
  includeServicePlaylists?: boolean;
  includeCollaborative?: boolean;
  fetchGenres?: boolean;
  /** Reuse stored tracks for playlists whose version token has not changed. */
  skipUnchanged?: boolean;
  signal?: AbortSignal;
}

export interface SyncOrchestratorDeps {
  catalog: RemoteCatalog;
  store: SnapshotStore;
  cursor?: ResumeCursor;
  rateLimit?: RateLimitTracker;
  genreCache?: GenreCache;
  pageDelayMs?: number;
  playlistDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

interface FullRun {
  user: LibraryUser;
  playlists: Playlist[];
  likedSongs: LikedSongs;
  previous: Snapshot | null;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SyncCancelledError();
  }
}

/**
 * Drives full and selective pulls from the remote catalog. One remote call is
 * in flight at a time and playlists are processed strictly in order, so the
 * resume cursor only ever tracks a single in-progress playlist.
 */
export class SyncOrchestrator {
  private readonly catalog: RemoteCatalog;
  private readonly store: SnapshotStore;
  private readonly cursor: ResumeCursor;
  private readonly rateLimit: RateLimitTracker;
  private readonly genreCache: GenreCache;
  private readonly pageDelayMs: number;
  private readonly playlistDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private currentPhase: SyncPhase = "idle";

  constructor(deps: SyncOrchestratorDeps) {
    this.catalog = deps.catalog;
    this.store = deps.store;
    this.cursor = deps.cursor ?? new ResumeCursor(deps.store.cursorFile);
    this.now = deps.now ?? (() => new Date());
    this.rateLimit = deps.rateLimit ?? new RateLimitTracker(() => this.now().getTime());
    this.genreCache = deps.genreCache ?? new GenreCache();
    this.pageDelayMs = deps.pageDelayMs ?? 100;
    this.playlistDelayMs = deps.playlistDelayMs ?? 200;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get phase(): SyncPhase {
    return this.currentPhase;
  }

  async canResume(): Promise<boolean> {
    return (await this.cursor.load()) && this.cursor.hasPendingWork();
  }

  async resumeInfo(): Promise<ResumeInfo> {
    return readResumeInfo(this.cursor);
  }

  async runFullSync(options: SyncOptions = {}, resume = true): Promise<SyncResult<LibraryFetch>> {
    this.setPhase("idle");
    let run: FullRun | null = null;

    try {
      run = await this.prepareFullRun(options, resume);
      await this.fetchPlannedPlaylists(run, options);
      await this.fetchLikedSongs(run, options);
    } catch (error) {
      return this.handleFullRunError(error, run);
    }

    await this.cursor.clear();
    await this.store.clearPartial();
    this.setPhase("completed");

    logger.info(
      `Full sync complete. playlists=${run.playlists.length} likedSongs=${run.likedSongs.tracks.length}`
    );

    return {
      status: "completed",
      data: {
        user: run.user,
        playlists: run.playlists,
        likedSongs: run.likedSongs,
        fetchedAt: this.now().toISOString()
      }
    };
  }

  async runSelectiveSync(playlistIds: string[], options: SyncOptions = {}): Promise<SyncResult<PlaylistRefresh>> {
    this.setPhase("idle");
    const refreshed: Playlist[] = [];
    const missingPlaylistIds: string[] = [];
    let user: LibraryUser;

    logger.info(`Refreshing ${playlistIds.length} selected playlist(s).`);

    try {
      user = await this.callRemote("fetching current user", () => this.catalog.getCurrentUser());

      for (const [index, playlistId] of playlistIds.entries()) {
        throwIfCancelled(options.signal);
        this.setPhase("fetching-playlist");

        const playlist = await this.callRemote(`fetching playlist ${playlistId}`, () =>
          this.catalog.getPlaylist(playlistId)
        );
        if (!playlist) {
          logger.warn(`Playlist ${playlistId} no longer exists. Skipping.`);
          missingPlaylistIds.push(playlistId);
          continue;
        }

        logger.info(`Refreshing playlist ${index + 1}/${playlistIds.length}: ${playlist.name}`);
        await this.fetchPages(
          0,
          `fetching tracks for ${playlist.name}`,
          (offset) => this.catalog.listPlaylistTracks(playlistId, offset),
          options,
          async (tracks) => {
            playlist.tracks.push(...tracks);
          }
        );

        playlist.lastSynced = this.now().toISOString();
        refreshed.push(playlist);
      }
    } catch (error) {
      return this.handleSelectiveError(error, refreshed.length, playlistIds.length);
    }

    this.setPhase("completed");
    return {
      status: "completed",
      data: { user, playlists: refreshed, missingPlaylistIds, refreshedAt: this.now().toISOString() }
    };
  }

  private setPhase(phase: SyncPhase): void {
    if (this.currentPhase !== phase) {
      logger.debug(`Sync phase ${this.currentPhase} -> ${phase}`);
      this.currentPhase = phase;
    }
  }

  /**
   * Gate, classify and record every remote call. An expired credential gets
   * one refresh and one retry before the failure becomes fatal.
   */
  private async callRemote<T>(context: string, call: () => Promise<T>): Promise<T> {
    this.ensureNotLimited(context);

    try {
      return await call();
    } catch (error) {
      const classified = this.recordFailure(error, context);
      if (!(classified instanceof AuthExpiredError)) {
        throw classified;
      }
    }

    logger.warn(`Credentials expired while ${context}. Refreshing once.`);
    try {
      await this.catalog.refreshCredentials();
    } catch (error) {
      const classified = this.recordFailure(error, "refreshing credentials");
      if (classified instanceof AuthExpiredError || classified instanceof AuthFailedError) {
        throw new AuthFailedError(`Credential refresh failed: ${classified.message}`, { cause: error });
      }

      throw classified;
    }

    this.ensureNotLimited(context);
    try {
      return await call();
    } catch (error) {
      const classified = this.recordFailure(error, context);
      if (classified instanceof AuthExpiredError) {
        throw new AuthFailedError(`Still unauthorized after refreshing credentials: ${classified.message}`, {
          cause: classified
        });
      }

      throw classified;
    }
  }

  private ensureNotLimited(context: string): void {
    const availableAt = this.rateLimit.statusAvailableAt();
    if (availableAt) {
      const seconds = Math.ceil((availableAt.getTime() - this.now().getTime()) / 1000);
      throw new RateLimitedError(seconds, `Rate limited until ${availableAt.toISOString()}; skipped ${context}`);
    }
  }

  private recordFailure(error: unknown, context: string): Error {
    const classified = classifyCatalogError(error, context);
    if (classified instanceof RateLimitedError) {
      this.rateLimit.recordLimit(classified.retryAfterSeconds, context);
    }

    return classified;
  }

  /**
   * Fetches pages from `startOffset` until the catalog reports no next page.
   * `onPage` runs after each page with the offset the next page starts at.
   */
  private async fetchPages(
    startOffset: number,
    context: string,
    fetchPage: (offset: number) => Promise<CatalogPage<Track>>,
    options: SyncOptions,
    onPage: (tracks: Track[], nextOffset: number, total: number) => Promise<void>
  ): Promise<void> {
    let offset = startOffset;

    while (true) {
      throwIfCancelled(options.signal);

      const page = await this.callRemote(context, () => fetchPage(offset));
      if (options.fetchGenres) {
        await this.enrichGenres(page.items);
      }

      const nextOffset = page.nextOffset ?? offset + page.items.length;
      await onPage(page.items, nextOffset, page.total);
      logger.debug(`${context}: offset=${offset} items=${page.items.length} total=${page.total}`);

      if (page.nextOffset === null) {
        return;
      }

      offset = page.nextOffset;
      await this.sleep(this.pageDelayMs);
    }
  }

  private async enrichGenres(tracks: Track[]): Promise<void> {
    const artistIdsByTrack = tracks.map((track) => track.artistIds.slice(0, MAX_ARTISTS_PER_TRACK));
    const missing = this.genreCache.missing(artistIdsByTrack.flat());

    if (missing.length > 0) {
      const genres = await this.callRemote("fetching artist genres", () => this.catalog.getArtistGenres(missing));
      for (const artistId of missing) {
        this.genreCache.set(artistId, genres.get(artistId) ?? []);
      }
    }

    for (const [index, track] of tracks.entries()) {
      track.genres = this.genreCache.genresFor(artistIdsByTrack[index] ?? []);
    }
  }

  private async prepareFullRun(options: SyncOptions, resume: boolean): Promise<FullRun> {
    const previous = await this.store.load();

    if (resume && (await this.cursor.load()) && this.cursor.hasPendingWork()) {
      const resumed = await this.resumeRun(previous);
      if (resumed) {
        return resumed;
      }
    }

    await this.cursor.clear();
    await this.store.clearPartial();

    const user = await this.callRemote("fetching current user", () => this.catalog.getCurrentUser());
    logger.info(`Starting full sync for user ${user.displayName ?? user.id}.`);

    this.setPhase("enumerating");
    const playlists = await this.enumeratePlaylists(user, options);
    this.cursor.plan(playlists.map((playlist) => ({ id: playlist.playlistId, name: playlist.name })));
    await this.cursor.save();

    return { user, playlists, likedSongs: emptyLikedSongs(), previous };
  }

  private async resumeRun(previous: Snapshot | null): Promise<FullRun | null> {
    const partial = await this.store.loadPartial();
    if (!partial) {
      logger.warn("Partial snapshot is missing. Starting a fresh sync.");
      return null;
    }

    const byId = new Map(partial.playlists.map((playlist): [string, Playlist] => [playlist.playlistId, playlist]));
    const playlists: Playlist[] = [];

    for (const planned of this.cursor.plannedPlaylists) {
      const playlist = byId.get(planned.id);
      if (!playlist) {
        logger.warn("Partial snapshot does not cover the resume plan. Starting a fresh sync.");
        return null;
      }

      playlists.push(playlist);
    }

    const rateLimit = this.cursor.rateLimit;
    if (rateLimit) {
      this.rateLimit.restore(rateLimit);
    }

    logger.info(
      `Resuming interrupted sync: ${this.cursor.completedCount}/${this.cursor.plannedCount} playlists already done.`
    );

    this.cursor.markRunning();
    await this.cursor.save();
    return { user: partial.user, playlists, likedSongs: partial.likedSongs, previous };
  }

  private async enumeratePlaylists(user: LibraryUser, options: SyncOptions): Promise<Playlist[]> {
    const includeService = options.includeServicePlaylists ?? true;
    const includeCollaborative = options.includeCollaborative ?? true;
    const seen = new Set<string>();
    const playlists: Playlist[] = [];
    let offset: number | null = 0;

    while (offset !== null) {
      throwIfCancelled(options.signal);
      const current: number = offset;
      const page = await this.callRemote("fetching playlists", () => this.catalog.listPlaylists(current));

      for (const playlist of page.items) {
        if (!playlist.playlistId || seen.has(playlist.playlistId)) {
          continue;
        }

        seen.add(playlist.playlistId);

        if (!includeService && playlist.ownerId.toLowerCase() === SERVICE_ACCOUNT_ID) {
          logger.debug(`Skipping service playlist: ${playlist.name}`);
          continue;
        }

        if (!includeCollaborative && playlist.isCollaborative) {
          logger.debug(`Skipping collaborative playlist: ${playlist.name}`);
          continue;
        }

        playlists.push(playlist);
      }

      offset = page.nextOffset;
      if (offset !== null) {
        await this.sleep(this.pageDelayMs);
      }
    }

    logger.info(`Found ${playlists.length} playlists to back up for ${user.id}.`);
    return playlists;
  }

  private async fetchPlannedPlaylists(run: FullRun, options: SyncOptions): Promise<void> {
    const skipUnchanged = options.skipUnchanged ?? true;
    const total = run.playlists.length;

    for (const [index, playlist] of run.playlists.entries()) {
      if (this.cursor.isCompleted(playlist.playlistId)) {
        continue;
      }

      throwIfCancelled(options.signal);
      this.setPhase("fetching-playlist");

      const stored = run.previous?.playlists.find((candidate) => candidate.playlistId === playlist.playlistId);
      if (skipUnchanged && stored && stored.snapshotId !== "" && stored.snapshotId === playlist.snapshotId) {
        playlist.tracks = [...stored.tracks];
        playlist.lastSynced = stored.lastSynced;
        this.cursor.completePlaylist(playlist.playlistId);
        await this.cursor.save();
        logger.info(`Playlist ${index + 1}/${total} '${playlist.name}' unchanged. Reusing stored tracks.`);
        continue;
      }

      const startOffset = this.cursor.offsetFor(playlist.playlistId);
      if (startOffset === 0) {
        playlist.tracks = [];
      }

      logger.info(`Fetching tracks for playlist ${index + 1}/${total}: ${playlist.name} (offset=${startOffset})`);

      await this.fetchPages(
        startOffset,
        `fetching tracks for ${playlist.name}`,
        (offset) => this.catalog.listPlaylistTracks(playlist.playlistId, offset),
        options,
        async (tracks, nextOffset) => {
          playlist.tracks.push(...tracks);
          this.cursor.advancePlaylist(playlist.playlistId, nextOffset);
          await this.cursor.save();
        }
      );

      playlist.lastSynced = this.now().toISOString();
      this.cursor.completePlaylist(playlist.playlistId);
      await this.cursor.save();
      logger.info(`Playlist '${playlist.name}': ${playlist.tracks.length} tracks fetched.`);

      await this.sleep(this.playlistDelayMs);
    }
  }

  private async fetchLikedSongs(run: FullRun, options: SyncOptions): Promise<void> {
    if (this.cursor.likedSongsCompleted) {
      return;
    }

    this.setPhase("fetching-liked");
    const startOffset = this.cursor.likedSongsOffset;
    if (startOffset === 0) {
      run.likedSongs = emptyLikedSongs();
    }

    logger.info(`Fetching liked songs (offset=${startOffset}).`);

    await this.fetchPages(
      startOffset,
      "fetching liked songs",
      (offset) => this.catalog.listLikedTracks(offset),
      options,
      async (tracks, nextOffset, total) => {
        run.likedSongs.tracks.push(...tracks);
        run.likedSongs.totalTracks = total;
        this.cursor.advanceLikedSongs(nextOffset);
        await this.cursor.save();
      }
    );

    run.likedSongs.lastSynced = this.now().toISOString();
    this.cursor.completeLikedSongs();
    await this.cursor.save();
    logger.info(`Fetched ${run.likedSongs.tracks.length} liked songs.`);
  }

  private async persistInterruption(run: FullRun, kind: InterruptionKind): Promise<void> {
    await this.store.savePartial({
      user: run.user,
      playlists: run.playlists,
      likedSongs: run.likedSongs,
      savedAt: this.now().toISOString()
    });

    this.cursor.markInterrupted(kind, kind === "rate-limit" ? this.rateLimit.snapshot() : null);
    await this.cursor.save();
    this.setPhase("interrupted");
  }

  private async handleFullRunError(error: unknown, run: FullRun | null): Promise<SyncResult<LibraryFetch>> {
    if (error instanceof SyncCancelledError) {
      if (run) {
        await this.persistInterruption(run, "cancelled");
      }

      logger.info(
        `Full sync cancelled after ${this.cursor.completedCount}/${this.cursor.plannedCount} playlists. Progress saved.`
      );
      this.setPhase("idle");
      return { status: "cancelled", completedCount: this.cursor.completedCount, plannedCount: this.cursor.plannedCount };
    }

    if (error instanceof AuthFailedError) {
      if (run) {
        await this.persistInterruption(run, "auth-failed");
      }

      this.setPhase("idle");
      throw error;
    }

    if (error instanceof CorruptLocalStateError) {
      this.setPhase("idle");
      throw error;
    }

    if (error instanceof RateLimitedError) {
      if (run) {
        await this.persistInterruption(run, "rate-limit");
      } else {
        this.setPhase("interrupted");
      }

      const availableAt =
        this.rateLimit.statusAvailableAt() ?? new Date(this.now().getTime() + error.retryAfterSeconds * 1000);
      logger.warn(
        `Sync interrupted by rate limit. Progress saved. Available at ${availableAt.toISOString()} ` +
          `(${this.cursor.completedCount}/${this.cursor.plannedCount} playlists done).`
      );

      return {
        status: "interrupted",
        availableAt,
        completedCount: this.cursor.completedCount,
        plannedCount: this.cursor.plannedCount,
        canResume: this.cursor.hasPendingWork()
      };
    }

    const reason = errorMessage(error);
    if (run) {
      await this.persistInterruption(run, "fetch-error");
    }

    logger.error(`Sync aborted: ${reason}`);
    return { status: "failed", reason, canResume: this.cursor.hasPendingWork() };
  }

  private handleSelectiveError(
    error: unknown,
    completedCount: number,
    plannedCount: number
  ): SyncResult<PlaylistRefresh> {
    this.setPhase("idle");

    if (error instanceof SyncCancelledError) {
      return { status: "cancelled", completedCount, plannedCount };
    }

    if (error instanceof AuthFailedError || error instanceof CorruptLocalStateError) {
      throw error;
    }

    if (error instanceof RateLimitedError) {
      this.setPhase("interrupted");
      const availableAt =
        this.rateLimit.statusAvailableAt() ?? new Date(this.now().getTime() + error.retryAfterSeconds * 1000);
      logger.warn(`Refresh interrupted by rate limit after ${completedCount}/${plannedCount} playlists.`);
      return { status: "interrupted", availableAt, completedCount, plannedCount, canResume: false };
    }

    const reason = errorMessage(error);
    logger.error(`Refresh aborted: ${reason}`);
    return { status: "failed", reason, canResume: false };
  }
}
