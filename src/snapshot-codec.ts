import { CorruptLocalStateError } from "./errors";
import { buildSnapshot, emptyLikedSongs } from "./library-model";
import type { LibraryUser, LikedSongs, PartialSnapshot, Playlist, Snapshot, Track } from "./types";

type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringOr<T extends string | null>(value: unknown, fallback: T): string | T {
  return typeof value === "string" ? value : fallback;
}

export function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function stringMap(value: unknown): Record<string, string> {
  if (!isRecord(value)) {
    return {};
  }

  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      result[key] = entry;
    }
  }

  return result;
}

function decodeTrack(value: unknown): Track | null {
  if (!isRecord(value)) {
    return null;
  }

  return {
    trackId: stringOr(value.trackId, ""),
    uri: stringOr(value.uri, ""),
    name: stringOr(value.name, "Unknown Track"),
    artists: stringList(value.artists),
    artistIds: stringList(value.artistIds),
    albumName: stringOr(value.albumName, "Unknown Album"),
    albumId: stringOr(value.albumId, ""),
    durationMs: numberOr(value.durationMs, 0),
    addedAt: stringOr(value.addedAt, null),
    addedBy: stringOr(value.addedBy, null),
    trackNumber: numberOr(value.trackNumber, 0),
    discNumber: numberOr(value.discNumber, 1),
    explicit: booleanOr(value.explicit, false),
    popularity: numberOr(value.popularity, 0),
    genres: stringList(value.genres),
    releaseDate: stringOr(value.releaseDate, null),
    externalUrls: stringMap(value.externalUrls),
    previewUrl: stringOr(value.previewUrl, null),
    isLocal: booleanOr(value.isLocal, false)
  };
}

function decodeTracks(value: unknown): Track[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.map(decodeTrack).filter((track): track is Track => track !== null);
}

function decodePlaylist(value: unknown, filePath: string): Playlist {
  if (!isRecord(value) || typeof value.playlistId !== "string" || value.playlistId === "") {
    throw new CorruptLocalStateError(filePath, `Playlist entry without an ID in ${filePath}`);
  }

  return {
    playlistId: value.playlistId,
    uri: stringOr(value.uri, ""),
    name: stringOr(value.name, "Unknown Playlist"),
    description: stringOr(value.description, null),
    ownerId: stringOr(value.ownerId, ""),
    ownerName: stringOr(value.ownerName, ""),
    isPublic: booleanOr(value.isPublic, true),
    isCollaborative: booleanOr(value.isCollaborative, false),
    folderPath: stringOr(value.folderPath, null),
    totalTracks: numberOr(value.totalTracks, 0),
    snapshotId: stringOr(value.snapshotId, ""),
    lastSynced: stringOr(value.lastSynced, null),
    externalUrls: stringMap(value.externalUrls),
    tracks: decodeTracks(value.tracks)
  };
}

function decodePlaylists(value: unknown, filePath: string): Playlist[] {
  if (!Array.isArray(value)) {
    throw new CorruptLocalStateError(filePath, `Missing playlist list in ${filePath}`);
  }

  return value.map((entry) => decodePlaylist(entry, filePath));
}

function decodeLikedSongs(value: unknown): LikedSongs | null {
  if (!isRecord(value)) {
    return null;
  }

  return {
    tracks: decodeTracks(value.tracks),
    totalTracks: numberOr(value.totalTracks, 0),
    lastSynced: stringOr(value.lastSynced, null)
  };
}

function decodeUser(value: unknown): LibraryUser {
  const user: JsonRecord = isRecord(value) ? value : {};
  return {
    id: stringOr(user.id, ""),
    displayName: stringOr(user.displayName, null),
    email: stringOr(user.email, null)
  };
}

/** Validates a parsed library file. Aggregate counts are recomputed rather than trusted. */
export function decodeSnapshot(raw: unknown, filePath: string): Snapshot {
  if (!isRecord(raw)) {
    throw new CorruptLocalStateError(filePath, `Snapshot in ${filePath} is not an object`);
  }

  const snapshot = buildSnapshot(
    decodeUser(raw.user),
    decodePlaylists(raw.playlists, filePath),
    decodeLikedSongs(raw.likedSongs),
    stringOr(raw.exportedAt, "")
  );

  return { ...snapshot, version: stringOr(raw.version, snapshot.version) };
}

export function decodePartialSnapshot(raw: unknown, filePath: string): PartialSnapshot {
  if (!isRecord(raw)) {
    throw new CorruptLocalStateError(filePath, `Partial snapshot in ${filePath} is not an object`);
  }

  return {
    user: decodeUser(raw.user),
    playlists: decodePlaylists(raw.playlists, filePath),
    likedSongs: decodeLikedSongs(raw.likedSongs) ?? emptyLikedSongs(),
    savedAt: stringOr(raw.savedAt, "")
  };
}
