import type { LibraryUser, Playlist, Track } from "./types";

/** One page of a paginated listing. `nextOffset` is null on the last page. */
export interface CatalogPage<T> {
  items: T[];
  nextOffset: number | null;
  total: number;
}

/**
 * Read access to the remote library. Any call may throw; the orchestrator
 * classifies what it throws (throttle, expired credentials, anything else).
 */
export interface RemoteCatalog {
  getCurrentUser(): Promise<LibraryUser>;
  /** Playlist metadata only; `tracks` is empty. */
  listPlaylists(offset: number): Promise<CatalogPage<Playlist>>;
  listPlaylistTracks(playlistId: string, offset: number): Promise<CatalogPage<Track>>;
  listLikedTracks(offset: number): Promise<CatalogPage<Track>>;
  /** Playlist metadata, or null when the playlist no longer exists. */
  getPlaylist(playlistId: string): Promise<Playlist | null>;
  getArtistGenres(artistIds: string[]): Promise<Map<string, string[]>>;
  refreshCredentials(): Promise<void>;
}
