import type {
  LikedSongs,
  Playlist,
  Snapshot,
  SpotifyArtistRef,
  SpotifyPlaylist,
  SpotifyTrack,
  SpotifyUser,
  LibraryUser,
  Track
} from "./types";

export const SNAPSHOT_FORMAT_VERSION = "1.0";

const UNKNOWN_TRACK = "Unknown Track";
const UNKNOWN_ALBUM = "Unknown Album";
const UNKNOWN_ARTIST = "Unknown Artist";
const UNKNOWN_PLAYLIST = "Unknown Playlist";

/** Identity of a track: catalog ID plus URI. Popularity and other fields never take part. */
export function trackKey(track: Pick<Track, "trackId" | "uri">): string {
  return `${track.trackId}\u0000${track.uri}`;
}

export function trackKeySet(tracks: Track[]): Set<string> {
  return new Set(tracks.map(trackKey));
}

export function toLibraryUser(user: SpotifyUser): LibraryUser {
  return {
    id: user.id,
    displayName: user.display_name,
    email: user.email ?? null
  };
}

export function trackFromSpotify(
  data: SpotifyTrack,
  addedAt: string | null,
  addedBy: string | null = null
): Track {
  const artistRefs = (data.artists ?? []).filter((artist): artist is SpotifyArtistRef => artist !== null);
  const artists = artistRefs.map((artist) => artist.name).filter((name): name is string => Boolean(name));
  const artistIds = artistRefs.map((artist) => artist.id).filter((id): id is string => Boolean(id));
  const album: NonNullable<SpotifyTrack["album"]> = data.album ?? {};

  return {
    trackId: data.id ?? "",
    uri: data.uri ?? "",
    name: data.name || UNKNOWN_TRACK,
    artists: artists.length > 0 ? artists : [UNKNOWN_ARTIST],
    artistIds,
    albumName: album.name || UNKNOWN_ALBUM,
    albumId: album.id ?? "",
    durationMs: data.duration_ms ?? 0,
    addedAt,
    addedBy,
    trackNumber: data.track_number ?? 0,
    discNumber: data.disc_number || 1,
    explicit: data.explicit ?? false,
    popularity: data.popularity ?? 0,
    genres: [],
    releaseDate: album.release_date ?? null,
    externalUrls: data.external_urls ?? {},
    previewUrl: data.preview_url ?? null,
    isLocal: data.is_local === true
  };
}

/** Builds playlist metadata. Tracks are fetched separately. */
export function playlistFromSpotify(data: SpotifyPlaylist): Playlist {
  return {
    playlistId: data.id,
    uri: data.uri,
    name: data.name || UNKNOWN_PLAYLIST,
    description: data.description,
    ownerId: data.owner?.id ?? "",
    ownerName: data.owner?.display_name ?? "",
    isPublic: data.public ?? true,
    isCollaborative: data.collaborative,
    folderPath: null,
    totalTracks: data.tracks?.total ?? 0,
    snapshotId: data.snapshot_id ?? "",
    lastSynced: null,
    externalUrls: data.external_urls ?? {},
    tracks: []
  };
}

export function emptyLikedSongs(): LikedSongs {
  return { tracks: [], totalTracks: 0, lastSynced: null };
}

export function buildSnapshot(
  user: LibraryUser,
  playlists: Playlist[],
  likedSongs: LikedSongs | null,
  exportedAt: string
): Snapshot {
  return {
    version: SNAPSHOT_FORMAT_VERSION,
    exportedAt,
    user,
    playlists,
    likedSongs,
    playlistCount: playlists.length,
    totalTracks: playlists.reduce((sum, playlist) => sum + playlist.tracks.length, 0),
    likedSongsCount: likedSongs?.tracks.length ?? 0
  };
}
