import { CorruptLocalStateError } from "./errors";
import { logger } from "./logger";
import type { RateLimitSnapshot } from "./rate-limit-tracker";
import type { ResumeInfo } from "./types";
import { booleanOr, isRecord, numberOr, stringOr } from "./snapshot-codec";
import { readJsonFile, removeFile, writeJsonAtomic } from "./state-store";

export interface PlannedPlaylist {
  id: string;
  name: string;
}

export type InterruptionKind = "rate-limit" | "fetch-error" | "auth-failed" | "cancelled";

const INTERRUPTION_KINDS: readonly InterruptionKind[] = ["rate-limit", "fetch-error", "auth-failed", "cancelled"];

interface CursorState {
  plannedPlaylists: PlannedPlaylist[];
  completedPlaylistIds: string[];
  currentPlaylistId: string | null;
  currentPlaylistOffset: number;
  likedSongsCompleted: boolean;
  likedSongsOffset: number;
  wasInterrupted: boolean;
  interruption: InterruptionKind | null;
  rateLimit: RateLimitSnapshot | null;
}

function pristineState(): CursorState {
  return {
    plannedPlaylists: [],
    completedPlaylistIds: [],
    currentPlaylistId: null,
    currentPlaylistOffset: 0,
    likedSongsCompleted: false,
    likedSongsOffset: 0,
    wasInterrupted: false,
    interruption: null,
    rateLimit: null
  };
}

function decodePlannedPlaylists(value: unknown): PlannedPlaylist[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const planned: PlannedPlaylist[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.id !== "string") {
      return null;
    }

    planned.push({ id: entry.id, name: stringOr(entry.name, "") });
  }

  return planned;
}

function decodeRateLimit(value: unknown): RateLimitSnapshot | null {
  if (!isRecord(value) || typeof value.availableAt !== "string") {
    return null;
  }

  return {
    retryAfterSeconds: numberOr(value.retryAfterSeconds, 0),
    availableAt: value.availableAt,
    message: stringOr(value.message, "")
  };
}

function decodeInterruption(value: unknown): InterruptionKind | null {
  return INTERRUPTION_KINDS.find((kind) => kind === value) ?? null;
}

function decodeCursor(raw: unknown): CursorState | null {
  if (!isRecord(raw)) {
    return null;
  }

  const plannedPlaylists = decodePlannedPlaylists(raw.plannedPlaylists);
  const completed = raw.completedPlaylistIds;
  if (!plannedPlaylists || !Array.isArray(completed)) {
    return null;
  }

  const completedPlaylistIds = completed.filter((id): id is string => typeof id === "string");
  if (completedPlaylistIds.length !== completed.length) {
    return null;
  }

  return {
    plannedPlaylists,
    completedPlaylistIds,
    currentPlaylistId: stringOr(raw.currentPlaylistId, null),
    currentPlaylistOffset: numberOr(raw.currentPlaylistOffset, 0),
    likedSongsCompleted: booleanOr(raw.likedSongsCompleted, false),
    likedSongsOffset: numberOr(raw.likedSongsOffset, 0),
    wasInterrupted: booleanOr(raw.wasInterrupted, false),
    interruption: decodeInterruption(raw.interruption),
    rateLimit: decodeRateLimit(raw.rateLimit)
  };
}

/**
 * Where a full pull stopped. Playlists are fetched one at a time, so a single
 * in-progress playlist ID and offset are enough to resume exactly.
 */
export class ResumeCursor {
  private state: CursorState = pristineState();

  constructor(private readonly filePath: string) {}

  get plannedPlaylists(): readonly PlannedPlaylist[] {
    return this.state.plannedPlaylists;
  }

  get completedCount(): number {
    return this.state.completedPlaylistIds.length;
  }

  get plannedCount(): number {
    return this.state.plannedPlaylists.length;
  }

  get likedSongsCompleted(): boolean {
    return this.state.likedSongsCompleted;
  }

  get likedSongsOffset(): number {
    return this.state.likedSongsOffset;
  }

  get wasInterrupted(): boolean {
    return this.state.wasInterrupted;
  }

  get interruption(): InterruptionKind | null {
    return this.state.interruption;
  }

  get rateLimit(): RateLimitSnapshot | null {
    return this.state.rateLimit;
  }

  hasPendingWork(): boolean {
    return (
      this.state.wasInterrupted &&
      (this.state.completedPlaylistIds.length < this.state.plannedPlaylists.length || !this.state.likedSongsCompleted)
    );
  }

  isCompleted(playlistId: string): boolean {
    return this.state.completedPlaylistIds.includes(playlistId);
  }

  /** Offset at which the given playlist should continue; 0 unless it is the one in progress. */
  offsetFor(playlistId: string): number {
    return this.state.currentPlaylistId === playlistId ? this.state.currentPlaylistOffset : 0;
  }

  plan(playlists: PlannedPlaylist[]): void {
    this.state = { ...pristineState(), plannedPlaylists: playlists.map((playlist) => ({ ...playlist })) };
  }

  /** Called at the start of every run; only an explicit interruption may set the flag again. */
  markRunning(): void {
    this.state.wasInterrupted = false;
    this.state.interruption = null;
    this.state.rateLimit = null;
  }

  advancePlaylist(playlistId: string, nextOffset: number): void {
    this.state.currentPlaylistId = playlistId;
    this.state.currentPlaylistOffset = nextOffset;
  }

  completePlaylist(playlistId: string): void {
    if (!this.isCompleted(playlistId)) {
      this.state.completedPlaylistIds.push(playlistId);
    }

    this.state.currentPlaylistId = null;
    this.state.currentPlaylistOffset = 0;
  }

  advanceLikedSongs(nextOffset: number): void {
    this.state.likedSongsOffset = nextOffset;
  }

  completeLikedSongs(): void {
    this.state.likedSongsCompleted = true;
    this.state.likedSongsOffset = 0;
  }

  markInterrupted(kind: InterruptionKind, rateLimit: RateLimitSnapshot | null): void {
    this.state.wasInterrupted = true;
    this.state.interruption = kind;
    this.state.rateLimit = rateLimit;
  }

  async save(): Promise<void> {
    await writeJsonAtomic(this.filePath, { ...this.state, savedAt: new Date().toISOString() });
  }

  /** Returns false, leaving a pristine cursor, when no valid cursor file exists. */
  async load(): Promise<boolean> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (error) {
      if (!(error instanceof CorruptLocalStateError)) {
        throw error;
      }

      logger.warn(`Ignoring unreadable resume cursor: ${error.message}`);
      raw = null;
    }

    const decoded = raw === null ? null : decodeCursor(raw);
    if (raw !== null && !decoded) {
      logger.warn(`Ignoring resume cursor with unexpected shape at ${this.filePath}.`);
    }

    this.state = decoded ?? pristineState();
    return decoded !== null;
  }

  async clear(): Promise<void> {
    this.state = pristineState();
    await removeFile(this.filePath);
  }
}

/** Loads the cursor and describes what a resumed run would pick up. */
export async function readResumeInfo(cursor: ResumeCursor): Promise<ResumeInfo> {
  const loaded = await cursor.load();
  return {
    canResume: loaded && cursor.hasPendingWork(),
    completed: cursor.completedCount,
    planned: cursor.plannedCount,
    likedDone: cursor.likedSongsCompleted,
    availableAt: cursor.rateLimit?.availableAt ?? null
  };
}
