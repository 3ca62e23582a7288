export interface SpotifyUser {
  id: string;
  display_name: string | null;
  email?: string | null;
}

export interface SpotifyArtistRef {
  id: string | null;
  name: string | null;
}

export interface SpotifyArtist {
  id: string;
  name: string;
  genres?: string[];
}

export interface SpotifyTrack {
  id: string | null;
  uri: string | null;
  name?: string | null;
  artists?: Array<SpotifyArtistRef | null> | null;
  album?: {
    id?: string | null;
    name?: string | null;
    release_date?: string | null;
  } | null;
  duration_ms?: number | null;
  track_number?: number | null;
  disc_number?: number | null;
  explicit?: boolean | null;
  popularity?: number | null;
  external_urls?: Record<string, string> | null;
  preview_url?: string | null;
  is_local?: boolean;
  is_playable?: boolean | null;
}

export interface SavedTrackItem {
  added_at: string;
  track: SpotifyTrack | null;
}

export interface PlaylistTrackItem {
  added_at: string | null;
  added_by?: { id?: string | null } | null;
  track: SpotifyTrack | null;
}

export interface SpotifyPlaylist {
  id: string;
  uri: string;
  name: string | null;
  description: string | null;
  owner?: { id?: string | null; display_name?: string | null } | null;
  public: boolean | null;
  collaborative: boolean;
  snapshot_id: string | null;
  tracks?: { total?: number } | null;
  external_urls?: Record<string, string> | null;
}

export interface PagingResponse<T> {
  items: Array<T | null>;
  limit: number;
  offset: number;
  total: number;
  next: string | null;
}

export interface Track {
  trackId: string;
  uri: string;
  name: string;
  artists: string[];
  artistIds: string[];
  albumName: string;
  albumId: string;
  durationMs: number;
  addedAt: string | null;
  addedBy: string | null;
  trackNumber: number;
  discNumber: number;
  explicit: boolean;
  popularity: number;
  genres: string[];
  releaseDate: string | null;
  externalUrls: Record<string, string>;
  previewUrl: string | null;
  isLocal: boolean;
}

export interface Playlist {
  playlistId: string;
  uri: string;
  name: string;
  description: string | null;
  ownerId: string;
  ownerName: string;
  isPublic: boolean;
  isCollaborative: boolean;
  /** Local-only organisation path such as "Music/Rock"; never sent upstream. */
  folderPath: string | null;
  /** Count declared by the remote service. Use `tracks.length` for the real size. */
  totalTracks: number;
  snapshotId: string;
  lastSynced: string | null;
  externalUrls: Record<string, string>;
  tracks: Track[];
}

export interface LikedSongs {
  tracks: Track[];
  totalTracks: number;
  lastSynced: string | null;
}

export interface LibraryUser {
  id: string;
  displayName: string | null;
  email: string | null;
}

export interface Snapshot {
  version: string;
  exportedAt: string;
  user: LibraryUser;
  playlists: Playlist[];
  likedSongs: LikedSongs | null;
  playlistCount: number;
  totalTracks: number;
  likedSongsCount: number;
}

/** Output of a completed full pull, before it is reconciled with the stored snapshot. */
export interface LibraryFetch {
  user: LibraryUser;
  playlists: Playlist[];
  likedSongs: LikedSongs | null;
  fetchedAt: string;
}

/** Working data of an interrupted full pull. */
export interface PartialSnapshot {
  user: LibraryUser;
  playlists: Playlist[];
  likedSongs: LikedSongs;
  savedAt: string;
}

export interface PlaylistRefresh {
  user: LibraryUser;
  playlists: Playlist[];
  missingPlaylistIds: string[];
  refreshedAt: string;
}

export interface FullMergeStats {
  firstSave: boolean;
  playlistsAdded: number;
  playlistsUpdated: number;
  playlistsRemoved: number;
  tracksAdded: number;
  tracksRemoved: number;
}

export interface SelectiveMergeStats {
  playlistsUpdated: number;
  tracksAdded: number;
  tracksRemoved: number;
  tracksUpdated: number;
}

export type SyncResult<T> =
  | { status: "completed"; data: T }
  | {
      status: "interrupted";
      availableAt: Date;
      completedCount: number;
      plannedCount: number;
      canResume: boolean;
    }
  | { status: "failed"; reason: string; canResume: boolean }
  | { status: "cancelled"; completedCount: number; plannedCount: number };

export interface ResumeInfo {
  canResume: boolean;
  completed: number;
  planned: number;
  likedDone: boolean;
  availableAt: string | null;
}
