import type { Playlist, Snapshot, Track } from "./types";

export type SearchScope = "all" | "playlists" | "liked";

export const SEARCH_SCOPES: readonly SearchScope[] = ["all", "playlists", "liked"];

export const LIKED_SONGS_SOURCE = "Liked Songs";

export interface TrackMatch {
  /** Playlist name, or "Liked Songs". */
  source: string;
  playlistId: string | null;
  track: Track;
}

export function isSearchScope(value: string): value is SearchScope {
  return SEARCH_SCOPES.some((scope) => scope === value);
}

function normalizeQuery(query: string): string | null {
  const needle = query.trim().toLowerCase();
  return needle === "" ? null : needle;
}

function trackMatches(track: Track, needle: string): boolean {
  return (
    track.name.toLowerCase().includes(needle) ||
    track.artists.join(", ").toLowerCase().includes(needle) ||
    track.albumName.toLowerCase().includes(needle) ||
    track.genres.some((genre) => genre.toLowerCase().includes(needle))
  );
}

/**
 * Case-insensitive substring search over track name, artists, album and
 * genres. A track is reported once per playlist it appears in. Playlist
 * matches come first, in stored order, then liked songs.
 */
export function searchTracks(snapshot: Snapshot | null, query: string, scope: SearchScope = "all"): TrackMatch[] {
  const needle = normalizeQuery(query);
  if (!snapshot || !needle) {
    return [];
  }

  const matches: TrackMatch[] = [];

  if (scope !== "liked") {
    for (const playlist of snapshot.playlists) {
      for (const track of playlist.tracks) {
        if (trackMatches(track, needle)) {
          matches.push({ source: playlist.name, playlistId: playlist.playlistId, track });
        }
      }
    }
  }

  if (scope !== "playlists") {
    for (const track of snapshot.likedSongs?.tracks ?? []) {
      if (trackMatches(track, needle)) {
        matches.push({ source: LIKED_SONGS_SOURCE, playlistId: null, track });
      }
    }
  }

  return matches;
}

export function searchPlaylists(snapshot: Snapshot | null, query: string): Playlist[] {
  const needle = normalizeQuery(query);
  if (!snapshot || !needle) {
    return [];
  }

  return snapshot.playlists.filter(
    (playlist) =>
      playlist.name.toLowerCase().includes(needle) || (playlist.description ?? "").toLowerCase().includes(needle)
  );
}
