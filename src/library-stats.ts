import { trackKey } from "./library-model";
import type { Snapshot } from "./types";

export interface LibraryStatistics {
  playlistCount: number;
  likedSongsCount: number;
  uniqueTracks: number;
  uniqueArtists: number;
  uniqueAlbums: number;
  uniqueGenres: number;
  totalDurationHours: number;
  lastExportedAt: string | null;
}

const MS_PER_HOUR = 3_600_000;

/**
 * Summarises a stored snapshot. A track that appears in several playlists and
 * in liked songs counts once, and its duration is added once.
 */
export function computeLibraryStatistics(snapshot: Snapshot | null): LibraryStatistics {
  if (!snapshot) {
    return {
      playlistCount: 0,
      likedSongsCount: 0,
      uniqueTracks: 0,
      uniqueArtists: 0,
      uniqueAlbums: 0,
      uniqueGenres: 0,
      totalDurationHours: 0,
      lastExportedAt: null
    };
  }

  const tracks = new Set<string>();
  const artists = new Set<string>();
  const albums = new Set<string>();
  const genres = new Set<string>();
  let totalDurationMs = 0;

  const allTracks = [
    ...snapshot.playlists.flatMap((playlist) => playlist.tracks),
    ...(snapshot.likedSongs?.tracks ?? [])
  ];

  for (const track of allTracks) {
    const key = trackKey(track);
    if (tracks.has(key)) {
      continue;
    }

    tracks.add(key);
    totalDurationMs += track.durationMs;
    track.artists.forEach((artist) => artists.add(artist));
    track.genres.forEach((genre) => genres.add(genre));
    albums.add(track.albumName);
  }

  return {
    playlistCount: snapshot.playlists.length,
    likedSongsCount: snapshot.likedSongs?.tracks.length ?? 0,
    uniqueTracks: tracks.size,
    uniqueArtists: artists.size,
    uniqueAlbums: albums.size,
    uniqueGenres: genres.size,
    totalDurationHours: Math.round((totalDurationMs / MS_PER_HOUR) * 100) / 100,
    lastExportedAt: snapshot.exportedAt || null
  };
}
