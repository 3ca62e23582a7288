import { Command, Option } from "commander";
import { loadConfig, resolveBackupDir, type AppConfig } from "./config";
import { SEARCH_SCOPES, isSearchScope, searchPlaylists, searchTracks } from "./library-search";
import { computeLibraryStatistics } from "./library-stats";
import { logger } from "./logger";
import { ResumeCursor, readResumeInfo } from "./resume-cursor";
import { SnapshotStore } from "./snapshot-store";
import { SpotifyCatalog } from "./spotify-catalog";
import { SpotifyClient } from "./spotify-client";
import { SyncOrchestrator, type SyncOptions } from "./sync-orchestrator";
import type { SyncResult } from "./types";

export const EXIT_FAILED = 1;
export const EXIT_INTERRUPTED = 2;
export const EXIT_CANCELLED = 130;

interface BackupFlags {
  fresh?: boolean;
  servicePlaylists: boolean;
  collaborative: boolean;
  genres?: boolean;
  refetchUnchanged?: boolean;
}

interface SearchFlags {
  in: string;
  playlists?: boolean;
}

export function exitCodeFor(result: SyncResult<unknown>): number {
  switch (result.status) {
    case "completed":
      return 0;
    case "interrupted":
      return EXIT_INTERRUPTED;
    case "cancelled":
      return EXIT_CANCELLED;
    case "failed":
      return EXIT_FAILED;
  }
}

/** Command-line flags can only narrow what the environment enables. */
export function syncOptionsFrom(config: AppConfig, flags: BackupFlags, signal?: AbortSignal): SyncOptions {
  return {
    includeServicePlaylists: config.includeServicePlaylists && flags.servicePlaylists,
    includeCollaborative: config.includeCollaborativePlaylists && flags.collaborative,
    fetchGenres: config.fetchGenres || flags.genres === true,
    skipUnchanged: config.skipUnchangedPlaylists && flags.refetchUnchanged !== true,
    signal
  };
}

function createOrchestrator(config: AppConfig, store: SnapshotStore): SyncOrchestrator {
  const client = new SpotifyClient(config.spotifyClientId, config.spotifyClientSecret, config.spotifyRefreshToken);

  return new SyncOrchestrator({
    catalog: new SpotifyCatalog(client),
    store,
    pageDelayMs: config.pageDelayMs,
    playlistDelayMs: config.playlistDelayMs
  });
}

async function withInterruptSignal<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn("Interrupt received. Stopping after the current request.");
    controller.abort();
  };

  process.once("SIGINT", onInterrupt);
  try {
    return await run(controller.signal);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

function reportUnfinished(result: SyncResult<unknown>): void {
  if (result.status === "interrupted") {
    logger.warn(
      `Progress saved (${result.completedCount}/${result.plannedCount} playlists). ` +
        `Run again after ${result.availableAt.toISOString()}${result.canResume ? " to resume" : ""}.`
    );
  } else if (result.status === "failed") {
    logger.error(`Sync failed: ${result.reason}${result.canResume ? " (resumable)" : ""}`);
  } else if (result.status === "cancelled") {
    logger.warn(`Cancelled after ${result.completedCount}/${result.plannedCount} playlists.`);
  }
}

async function runBackup(flags: BackupFlags): Promise<void> {
  const config = loadConfig();
  const store = new SnapshotStore(config.backupDir);
  const orchestrator = createOrchestrator(config, store);

  const result = await withInterruptSignal((signal) =>
    orchestrator.runFullSync(syncOptionsFrom(config, flags, signal), flags.fresh !== true)
  );

  if (result.status === "completed") {
    const stats = await store.mergeFull(result.data);
    logger.info(
      [
        "Backup complete.",
        `firstSave=${stats.firstSave}`,
        `playlistsAdded=${stats.playlistsAdded}`,
        `playlistsUpdated=${stats.playlistsUpdated}`,
        `playlistsRemoved=${stats.playlistsRemoved}`,
        `tracksAdded=${stats.tracksAdded}`,
        `tracksRemoved=${stats.tracksRemoved}`
      ].join(" ")
    );
  } else {
    reportUnfinished(result);
  }

  process.exitCode = exitCodeFor(result);
}

async function runRefresh(playlistIds: string[], flags: Pick<BackupFlags, "genres">): Promise<void> {
  const config = loadConfig();
  const store = new SnapshotStore(config.backupDir);
  const orchestrator = createOrchestrator(config, store);

  const result = await withInterruptSignal((signal) =>
    orchestrator.runSelectiveSync(playlistIds, {
      fetchGenres: config.fetchGenres || flags.genres === true,
      signal
    })
  );

  if (result.status === "completed") {
    const stats = await store.mergeSelective(result.data.playlists);
    if (result.data.missingPlaylistIds.length > 0) {
      logger.warn(`Not found remotely: ${result.data.missingPlaylistIds.join(", ")}`);
    }

    logger.info(
      [
        "Refresh complete.",
        `playlistsUpdated=${stats.playlistsUpdated}`,
        `tracksAdded=${stats.tracksAdded}`,
        `tracksRemoved=${stats.tracksRemoved}`,
        `tracksUpdated=${stats.tracksUpdated}`
      ].join(" ")
    );
  } else {
    reportUnfinished(result);
  }

  process.exitCode = exitCodeFor(result);
}

async function runStatus(): Promise<void> {
  const store = new SnapshotStore(resolveBackupDir());
  const statistics = computeLibraryStatistics(await store.load());
  const updates = await store.readUpdateLog();
  const lastUpdate = updates.at(-1);

  logger.info(
    [
      `playlists=${statistics.playlistCount}`,
      `likedSongs=${statistics.likedSongsCount}`,
      `uniqueTracks=${statistics.uniqueTracks}`,
      `uniqueArtists=${statistics.uniqueArtists}`,
      `uniqueAlbums=${statistics.uniqueAlbums}`,
      `uniqueGenres=${statistics.uniqueGenres}`,
      `hours=${statistics.totalDurationHours}`,
      `lastExport=${statistics.lastExportedAt ?? "never"}`
    ].join(" ")
  );

  if (lastUpdate) {
    logger.info(`Last ${lastUpdate.type} update at ${lastUpdate.timestamp}: ${JSON.stringify(lastUpdate.stats)}`);
  }

  const info = await readResumeInfo(new ResumeCursor(store.cursorFile));
  if (info.canResume) {
    logger.info(
      `Interrupted backup pending: ${info.completed}/${info.planned} playlists done, likedSongs=${info.likedDone ? "done" : "pending"}` +
        (info.availableAt ? `, available at ${info.availableAt}` : "")
    );
  }
}

async function runFolder(playlistId: string, folderPath: string | undefined): Promise<void> {
  const store = new SnapshotStore(resolveBackupDir());
  const assigned = await store.assignFolder(playlistId, folderPath ?? null);

  if (!assigned) {
    logger.error(`Playlist ${playlistId} is not in the stored library.`);
    process.exitCode = EXIT_FAILED;
    return;
  }

  logger.info(folderPath ? `Playlist ${playlistId} filed under ${folderPath}.` : `Cleared folder for ${playlistId}.`);
}

async function runSearch(query: string, flags: SearchFlags): Promise<void> {
  const scope = flags.in;
  if (!isSearchScope(scope)) {
    logger.error(`Unknown search scope "${scope}". Use one of: ${SEARCH_SCOPES.join(", ")}.`);
    process.exitCode = EXIT_FAILED;
    return;
  }

  const snapshot = await new SnapshotStore(resolveBackupDir()).load();

  if (flags.playlists) {
    const playlists = searchPlaylists(snapshot, query);
    logger.info(`${playlists.length} playlist(s) match "${query}".`);
    for (const playlist of playlists) {
      logger.info(`${playlist.playlistId} ${playlist.name} (${playlist.tracks.length} tracks)`);
    }
    return;
  }

  const matches = searchTracks(snapshot, query, scope);
  logger.info(`${matches.length} track(s) match "${query}".`);
  for (const { source, track } of matches) {
    logger.info(`[${source}] ${track.name} - ${track.artists.join(", ")} (${track.albumName})`);
  }
}

export function createProgram(): Command {
  const program = new Command()
    .name("library-backup")
    .description("Back up playlists and liked songs, resuming across rate limits");

  program
    .command("backup")
    .description("Fetch the whole library and merge it into the local backup")
    .option("--fresh", "Ignore any interrupted run and start over")
    .option("--no-service-playlists", "Skip playlists owned by the service account")
    .option("--no-collaborative", "Skip collaborative playlists")
    .option("--genres", "Look up artist genres for every track")
    .option("--refetch-unchanged", "Fetch tracks even when a playlist's version token is unchanged")
    .action(async (flags: BackupFlags) => {
      await runBackup(flags);
    });

  program
    .command("refresh")
    .description("Re-fetch selected playlists and replace them in the local backup")
    .argument("<playlistIds...>", "Playlist IDs to refresh")
    .option("--genres", "Look up artist genres for every track")
    .action(async (playlistIds: string[], flags: Pick<BackupFlags, "genres">) => {
      await runRefresh(playlistIds, flags);
    });

  program
    .command("status")
    .description("Show library statistics and any pending resume")
    .action(async () => {
      await runStatus();
    });

  program
    .command("folder")
    .description("Set or clear the local folder of a stored playlist")
    .argument("<playlistId>", "Playlist ID")
    .argument("[path]", "Folder path; omit to clear")
    .action(async (playlistId: string, folderPath: string | undefined) => {
      await runFolder(playlistId, folderPath);
    });

  program
    .command("search")
    .description("Search the stored library by track, artist, album or genre")
    .argument("<query>", "Text to look for, case-insensitive")
    .addOption(new Option("--in <scope>", "Where to look").choices([...SEARCH_SCOPES]).default("all"))
    .option("--playlists", "Match playlist names and descriptions instead of tracks")
    .action(async (query: string, flags: SearchFlags) => {
      await runSearch(query, flags);
    });

  return program;
}
