import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";

const credentials = {
  SPOTIFY_CLIENT_ID: "test-client",
  SPOTIFY_CLIENT_SECRET: "test-secret",
  SPOTIFY_REFRESH_TOKEN: "test-refresh"
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(credentials)).toEqual({
      spotifyClientId: "test-client",
      spotifyClientSecret: "test-secret",
      spotifyRefreshToken: "test-refresh",
      backupDir: path.resolve(process.cwd(), "SpotifyBackup"),
      includeServicePlaylists: true,
      includeCollaborativePlaylists: true,
      fetchGenres: false,
      skipUnchangedPlaylists: true,
      pageDelayMs: 100,
      playlistDelayMs: 200
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...credentials,
      BACKUP_DIR: "/tmp/library-backup",
      INCLUDE_SERVICE_PLAYLISTS: "false",
      FETCH_GENRES: "yes",
      PAGE_DELAY_MS: "0"
    });

    expect(config.backupDir).toBe("/tmp/library-backup");
    expect(config.includeServicePlaylists).toBe(false);
    expect(config.fetchGenres).toBe(true);
    expect(config.pageDelayMs).toBe(0);
  });

  it("requires credentials", () => {
    expect(() => loadConfig({ ...credentials, SPOTIFY_CLIENT_ID: " " })).toThrow(
      "Missing required environment variable: SPOTIFY_CLIENT_ID"
    );
  });

  it("rejects values it cannot parse", () => {
    expect(() => loadConfig({ ...credentials, FETCH_GENRES: "maybe" })).toThrow(
      'Environment variable FETCH_GENRES must be true or false, got "maybe"'
    );
    expect(() => loadConfig({ ...credentials, PLAYLIST_DELAY_MS: "-5" })).toThrow(
      'Environment variable PLAYLIST_DELAY_MS must be a non-negative integer, got "-5"'
    );
  });
});
