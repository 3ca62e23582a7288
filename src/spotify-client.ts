import { AuthExpiredError, SpotifyApiError } from "./errors";
import { logger } from "./logger";
import type {
  PagingResponse,
  PlaylistTrackItem,
  SavedTrackItem,
  SpotifyArtist,
  SpotifyPlaylist,
  SpotifyUser
} from "./types";

const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com/api";
const MAX_RETRIES = 4;
const REQUEST_TIMEOUT_MS = 30000;
const ARTIST_BATCH_SIZE = 50;
const CREDENTIAL_REJECTED_STATUSES = new Set([400, 401]);

const PLAYLIST_ITEM_FIELDS =
  "items(added_at,added_by(id),track(id,uri,name,artists(id,name),album(id,name,release_date),duration_ms,track_number,disc_number,explicit,popularity,external_urls,preview_url,is_local)),limit,offset,next,total";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseRetryAfterSeconds(headerValue: string | null): number | null {
  if (!headerValue) {
    return null;
  }

  const seconds = Number(headerValue);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }

  return seconds;
}

function buildErrorMessage(status: number, bodyText: string): string {
  if (!bodyText) {
    return `Spotify API request failed with status ${status}`;
  }

  try {
    const parsed = JSON.parse(bodyText) as { error?: { message?: string } | string; message?: string };

    if (typeof parsed.error === "string") {
      return `Spotify API request failed with status ${status}: ${parsed.error}`;
    }

    const errorMessage = parsed.error?.message || parsed.message;
    if (errorMessage) {
      return `Spotify API request failed with status ${status}: ${errorMessage}`;
    }
  } catch {
    // Not JSON; the plain body text is used below.
  }

  return `Spotify API request failed with status ${status}: ${bodyText}`;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

interface RequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
}

export interface PageRequest {
  offset: number;
  limit: number;
}

/**
 * Thin Spotify Web API client. Timeouts and 5xx responses are retried with
 * exponential backoff; 429 and 401 are thrown to the caller as SpotifyApiError.
 */
export class SpotifyClient {
  private accessToken: string | null = null;

  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    private readonly refreshToken: string
  ) {}

  async refreshAccessToken(): Promise<string> {
    const params = new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: this.refreshToken,
      client_id: this.clientId,
      client_secret: this.clientSecret
    });

    let bodyText: string;
    try {
      bodyText = await this.send(`${SPOTIFY_ACCOUNTS_BASE}/token`, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: params
      });
    } catch (error) {
      // Only a rejected credential is an auth failure; throttles and network errors keep their own class.
      if (error instanceof SpotifyApiError && CREDENTIAL_REJECTED_STATUSES.has(error.status)) {
        throw new AuthExpiredError(`Spotify rejected the refresh token: ${error.message}`, { cause: error });
      }

      throw error;
    }

    const parsed = JSON.parse(bodyText) as { access_token?: string };
    if (!parsed.access_token) {
      throw new Error("Spotify token response did not include access_token");
    }

    this.accessToken = parsed.access_token;
    return parsed.access_token;
  }

  async getCurrentUser(): Promise<SpotifyUser> {
    return this.request<SpotifyUser>(`${SPOTIFY_API_BASE}/me`);
  }

  async getUserPlaylists(page: PageRequest): Promise<PagingResponse<SpotifyPlaylist>> {
    return this.request<PagingResponse<SpotifyPlaylist>>(
      `${SPOTIFY_API_BASE}/me/playlists?limit=${page.limit}&offset=${page.offset}`
    );
  }

  async getPlaylist(playlistId: string): Promise<SpotifyPlaylist | null> {
    logger.debug(`Fetching playlist metadata for playlistId=${playlistId}.`);

    try {
      const fields = "id,uri,name,description,owner(id,display_name),public,collaborative,snapshot_id,tracks(total),external_urls";
      return await this.request<SpotifyPlaylist>(
        `${SPOTIFY_API_BASE}/playlists/${playlistId}?fields=${encodeURIComponent(fields)}`
      );
    } catch (error) {
      if (error instanceof SpotifyApiError && error.status === 404) {
        return null;
      }

      throw error;
    }
  }

  async getPlaylistItems(playlistId: string, page: PageRequest): Promise<PagingResponse<PlaylistTrackItem>> {
    return this.request<PagingResponse<PlaylistTrackItem>>(
      `${SPOTIFY_API_BASE}/playlists/${playlistId}/tracks?limit=${page.limit}&offset=${page.offset}&fields=${encodeURIComponent(PLAYLIST_ITEM_FIELDS)}`
    );
  }

  async getSavedTracks(page: PageRequest): Promise<PagingResponse<SavedTrackItem>> {
    return this.request<PagingResponse<SavedTrackItem>>(
      `${SPOTIFY_API_BASE}/me/tracks?limit=${page.limit}&offset=${page.offset}`
    );
  }

  async getArtists(artistIds: string[]): Promise<SpotifyArtist[]> {
    const artists: SpotifyArtist[] = [];

    for (let i = 0; i < artistIds.length; i += ARTIST_BATCH_SIZE) {
      const batch = artistIds.slice(i, i + ARTIST_BATCH_SIZE);
      const response = await this.request<{ artists: Array<SpotifyArtist | null> }>(
        `${SPOTIFY_API_BASE}/artists?ids=${batch.join(",")}`
      );
      artists.push(...response.artists.filter((artist): artist is SpotifyArtist => artist !== null));
    }

    return artists;
  }

  private async currentAccessToken(): Promise<string> {
    if (this.accessToken) {
      return this.accessToken;
    }

    return this.refreshAccessToken();
  }

  private async request<T>(url: string): Promise<T> {
    const accessToken = await this.currentAccessToken();
    const bodyText = await this.send(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
        Authorization: `Bearer ${accessToken}`
      }
    });

    return JSON.parse(bodyText) as T;
  }

  private async send(url: string, options: RequestOptions): Promise<string> {
    let attempt = 0;

    while (true) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

      logger.debug(`Spotify request attempt ${attempt + 1}: ${options.method || "GET"} ${url}`);

      let response: Response;
      try {
        response = await fetch(url, {
          method: options.method || "GET",
          headers: options.headers,
          body: options.body,
          signal: controller.signal
        });
      } catch (error) {
        if (isAbortError(error) && attempt < MAX_RETRIES) {
          attempt += 1;
          const backoffMs = 500 * 2 ** (attempt - 1);
          logger.warn(`Spotify request timed out after ${REQUEST_TIMEOUT_MS}ms. Retrying attempt ${attempt}.`);
          await sleep(backoffMs);
          continue;
        }

        throw error;
      } finally {
        clearTimeout(timeoutId);
      }

      const bodyText = await response.text();

      if (response.ok) {
        return bodyText;
      }

      if (response.status >= 500 && attempt < MAX_RETRIES) {
        attempt += 1;
        const backoffMs = 500 * 2 ** (attempt - 1);
        logger.warn(`Spotify request failed with status ${response.status}. Retrying attempt ${attempt}.`);
        await sleep(backoffMs);
        continue;
      }

      throw new SpotifyApiError(
        response.status,
        buildErrorMessage(response.status, bodyText),
        response.status === 429 ? parseRetryAfterSeconds(response.headers.get("retry-after")) : null
      );
    }
  }
}
