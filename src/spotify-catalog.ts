import { playlistFromSpotify, toLibraryUser, trackFromSpotify } from "./library-model";
import type { CatalogPage, RemoteCatalog } from "./remote-catalog";
import type { SpotifyClient } from "./spotify-client";
import type { LibraryUser, PagingResponse, Playlist, PlaylistTrackItem, SavedTrackItem, Track } from "./types";

export const PLAYLIST_PAGE_LIMIT = 50;
export const PLAYLIST_TRACK_PAGE_LIMIT = 100;
export const LIKED_TRACK_PAGE_LIMIT = 50;

function toPage<TWire, TItem>(
  response: PagingResponse<TWire>,
  offset: number,
  limit: number,
  mapItem: (item: TWire) => TItem | null
): CatalogPage<TItem> {
  const items: TItem[] = [];
  for (const wireItem of response.items) {
    if (wireItem === null) {
      continue;
    }

    const item = mapItem(wireItem);
    if (item !== null) {
      items.push(item);
    }
  }

  const exhausted = response.next === null || response.items.length === 0;

  return {
    items,
    nextOffset: exhausted ? null : offset + limit,
    total: response.total
  };
}

function playlistTrack(item: PlaylistTrackItem): Track | null {
  return item.track ? trackFromSpotify(item.track, item.added_at, item.added_by?.id ?? null) : null;
}

function savedTrack(item: SavedTrackItem): Track | null {
  return item.track ? trackFromSpotify(item.track, item.added_at) : null;
}

/** RemoteCatalog backed by the Spotify Web API. Errors pass through untouched. */
export class SpotifyCatalog implements RemoteCatalog {
  constructor(private readonly client: SpotifyClient) {}

  async getCurrentUser(): Promise<LibraryUser> {
    return toLibraryUser(await this.client.getCurrentUser());
  }

  async listPlaylists(offset: number): Promise<CatalogPage<Playlist>> {
    const response = await this.client.getUserPlaylists({ offset, limit: PLAYLIST_PAGE_LIMIT });
    return toPage(response, offset, PLAYLIST_PAGE_LIMIT, playlistFromSpotify);
  }

  async listPlaylistTracks(playlistId: string, offset: number): Promise<CatalogPage<Track>> {
    const response = await this.client.getPlaylistItems(playlistId, { offset, limit: PLAYLIST_TRACK_PAGE_LIMIT });
    return toPage(response, offset, PLAYLIST_TRACK_PAGE_LIMIT, playlistTrack);
  }

  async listLikedTracks(offset: number): Promise<CatalogPage<Track>> {
    const response = await this.client.getSavedTracks({ offset, limit: LIKED_TRACK_PAGE_LIMIT });
    return toPage(response, offset, LIKED_TRACK_PAGE_LIMIT, savedTrack);
  }

  async getPlaylist(playlistId: string): Promise<Playlist | null> {
    const playlist = await this.client.getPlaylist(playlistId);
    return playlist ? playlistFromSpotify(playlist) : null;
  }

  async getArtistGenres(artistIds: string[]): Promise<Map<string, string[]>> {
    const artists = await this.client.getArtists(artistIds);
    return new Map(artists.map((artist): [string, string[]] => [artist.id, artist.genres ?? []]));
  }

  async refreshCredentials(): Promise<void> {
    await this.client.refreshAccessToken();
  }
}
