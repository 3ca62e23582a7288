import { buildSnapshot, trackKeySet } from "./library-model";
import type {
  FullMergeStats,
  LibraryFetch,
  LikedSongs,
  Playlist,
  SelectiveMergeStats,
  Snapshot,
  Track
} from "./types";

export interface FullMergeResult {
  snapshot: Snapshot;
  stats: FullMergeStats;
}

export interface SelectiveMergeResult {
  snapshot: Snapshot | null;
  stats: SelectiveMergeStats;
}

interface TrackDelta {
  added: number;
  removed: number;
  kept: number;
}

/**
 * Set difference over track identities. Order is ignored, so a reordered
 * playlist with the same content has no delta.
 */
export function diffTracks(oldTracks: Track[], newTracks: Track[]): TrackDelta {
  const oldKeys = trackKeySet(oldTracks);
  const newKeys = trackKeySet(newTracks);

  let added = 0;
  let kept = 0;
  for (const key of newKeys) {
    if (oldKeys.has(key)) {
      kept += 1;
    } else {
      added += 1;
    }
  }

  return { added, removed: oldKeys.size - kept, kept };
}

function emptyFullStats(firstSave: boolean): FullMergeStats {
  return {
    firstSave,
    playlistsAdded: 0,
    playlistsUpdated: 0,
    playlistsRemoved: 0,
    tracksAdded: 0,
    tracksRemoved: 0
  };
}

function withLocalMetadata(fresh: Playlist, stored: Playlist): Playlist {
  return { ...fresh, folderPath: stored.folderPath };
}

/**
 * Reconciles a complete fetch with the stored snapshot. Playlists whose
 * version token did not change are kept exactly as stored.
 */
export function mergeFullLibrary(previous: Snapshot | null, fetched: LibraryFetch, exportedAt: string): FullMergeResult {
  if (!previous) {
    return {
      snapshot: buildSnapshot(fetched.user, fetched.playlists, fetched.likedSongs, exportedAt),
      stats: emptyFullStats(true)
    };
  }

  const stats = emptyFullStats(false);
  const stored = new Map(previous.playlists.map((playlist): [string, Playlist] => [playlist.playlistId, playlist]));
  const merged: Playlist[] = [];
  const fetchedIds = new Set<string>();

  for (const playlist of fetched.playlists) {
    fetchedIds.add(playlist.playlistId);
    const old = stored.get(playlist.playlistId);

    if (!old) {
      stats.playlistsAdded += 1;
      stats.tracksAdded += playlist.tracks.length;
      merged.push(playlist);
      continue;
    }

    if (old.snapshotId === playlist.snapshotId) {
      merged.push(old);
      continue;
    }

    const delta = diffTracks(old.tracks, playlist.tracks);
    stats.playlistsUpdated += 1;
    stats.tracksAdded += delta.added;
    stats.tracksRemoved += delta.removed;
    merged.push(withLocalMetadata(playlist, old));
  }

  for (const old of previous.playlists) {
    if (!fetchedIds.has(old.playlistId)) {
      stats.playlistsRemoved += 1;
      stats.tracksRemoved += old.tracks.length;
    }
  }

  let likedSongs: LikedSongs | null = previous.likedSongs;
  if (fetched.likedSongs) {
    const delta = diffTracks(previous.likedSongs?.tracks ?? [], fetched.likedSongs.tracks);
    stats.tracksAdded += delta.added;
    stats.tracksRemoved += delta.removed;
    likedSongs = fetched.likedSongs;
  }

  return {
    snapshot: buildSnapshot(fetched.user.id ? fetched.user : previous.user, merged, likedSongs, exportedAt),
    stats
  };
}

/**
 * Replaces the supplied playlists in place. IDs that are not in the stored
 * snapshot are ignored; nothing is invented.
 */
export function mergeSelectedPlaylists(
  previous: Snapshot | null,
  playlists: Playlist[],
  exportedAt: string
): SelectiveMergeResult {
  const stats: SelectiveMergeStats = { playlistsUpdated: 0, tracksAdded: 0, tracksRemoved: 0, tracksUpdated: 0 };
  if (!previous) {
    return { snapshot: null, stats };
  }

  const replacements = new Map<string, Playlist>();
  const storedIds = new Set(previous.playlists.map((playlist) => playlist.playlistId));

  for (const playlist of playlists) {
    if (!storedIds.has(playlist.playlistId)) {
      continue;
    }

    replacements.set(playlist.playlistId, playlist);
  }

  const merged = previous.playlists.map((old) => {
    const fresh = replacements.get(old.playlistId);
    if (!fresh) {
      return old;
    }

    const delta = diffTracks(old.tracks, fresh.tracks);
    stats.playlistsUpdated += 1;
    stats.tracksAdded += delta.added;
    stats.tracksRemoved += delta.removed;
    stats.tracksUpdated += delta.kept;
    return withLocalMetadata(fresh, old);
  });

  return {
    snapshot: buildSnapshot(previous.user, merged, previous.likedSongs, exportedAt),
    stats
  };
}
