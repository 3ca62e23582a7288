import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { LibraryUser, Playlist, Track } from "../src/types";

export const testUser: LibraryUser = { id: "user-1", displayName: "Test User", email: null };

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
  return {
    trackId: id,
    uri: `spotify:track:${id}`,
    name: `Track ${id}`,
    artists: ["Test Artist"],
    artistIds: ["artist-1"],
    albumName: "Test Album",
    albumId: "album-1",
    durationMs: 180000,
    addedAt: "2026-01-01T00:00:00.000Z",
    addedBy: null,
    trackNumber: 1,
    discNumber: 1,
    explicit: false,
    popularity: 50,
    genres: [],
    releaseDate: null,
    externalUrls: {},
    previewUrl: null,
    isLocal: false,
    ...overrides
  };
}

export function makeTracks(prefix: string, count: number): Track[] {
  return Array.from({ length: count }, (_, index) => makeTrack(`${prefix}${index}`));
}

export function makePlaylist(
  id: string,
  snapshotId: string,
  tracks: Track[] = [],
  overrides: Partial<Playlist> = {}
): Playlist {
  return {
    playlistId: id,
    uri: `spotify:playlist:${id}`,
    name: `Playlist ${id}`,
    description: null,
    ownerId: "user-1",
    ownerName: "Test User",
    isPublic: true,
    isCollaborative: false,
    folderPath: null,
    totalTracks: tracks.length,
    snapshotId,
    lastSynced: null,
    externalUrls: {},
    tracks,
    ...overrides
  };
}

export function trackIds(tracks: Track[]): string[] {
  return tracks.map((track) => track.trackId);
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
