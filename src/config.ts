import "dotenv/config";
import path from "node:path";

export interface AppConfig {
  spotifyClientId: string;
  spotifyClientSecret: string;
  spotifyRefreshToken: string;
  backupDir: string;
  includeServicePlaylists: boolean;
  includeCollaborativePlaylists: boolean;
  fetchGenres: boolean;
  skipUnchangedPlaylists: boolean;
  pageDelayMs: number;
  playlistDelayMs: number;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

function booleanEnv(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (!value) {
    return fallback;
  }

  if (["true", "1", "yes"].includes(value)) {
    return true;
  }

  if (["false", "0", "no"].includes(value)) {
    return false;
  }

  throw new Error(`Environment variable ${name} must be true or false, got "${env[name]}"`);
}

function nonNegativeIntegerEnv(env: Env, name: string, fallback: number): number {
  const value = env[name]?.trim();
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Environment variable ${name} must be a non-negative integer, got "${value}"`);
  }

  return parsed;
}

/** Backup location only; commands that never reach the remote library need no credentials. */
export function resolveBackupDir(env: Env = process.env): string {
  return path.resolve(process.cwd(), env.BACKUP_DIR?.trim() || "SpotifyBackup");
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    spotifyClientId: requireEnv(env, "SPOTIFY_CLIENT_ID"),
    spotifyClientSecret: requireEnv(env, "SPOTIFY_CLIENT_SECRET"),
    spotifyRefreshToken: requireEnv(env, "SPOTIFY_REFRESH_TOKEN"),
    backupDir: resolveBackupDir(env),
    includeServicePlaylists: booleanEnv(env, "INCLUDE_SERVICE_PLAYLISTS", true),
    includeCollaborativePlaylists: booleanEnv(env, "INCLUDE_COLLABORATIVE_PLAYLISTS", true),
    fetchGenres: booleanEnv(env, "FETCH_GENRES", false),
    skipUnchangedPlaylists: booleanEnv(env, "SKIP_UNCHANGED_PLAYLISTS", true),
    pageDelayMs: nonNegativeIntegerEnv(env, "PAGE_DELAY_MS", 100),
    playlistDelayMs: nonNegativeIntegerEnv(env, "PLAYLIST_DELAY_MS", 200)
  };
}
