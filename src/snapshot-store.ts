import { promises as fs } from "node:fs";
import path from "node:path";
import { CorruptLocalStateError, errorMessage } from "./errors";
import { logger } from "./logger";
import { mergeFullLibrary, mergeSelectedPlaylists } from "./merge-engine";
import { buildSnapshot } from "./library-model";
import { decodePartialSnapshot, decodeSnapshot, isRecord } from "./snapshot-codec";
import { readJsonFile, removeFile, writeJsonAtomic } from "./state-store";
import type { FullMergeStats, LibraryFetch, PartialSnapshot, Playlist, SelectiveMergeStats, Snapshot } from "./types";

const HISTORY_LIMIT = 10;
const UPDATE_LOG_LIMIT = 100;

export interface UpdateLogEntry {
  timestamp: string;
  type: "full" | "selective";
  stats: Record<string, unknown>;
}

function decodeLogEntry(value: unknown): UpdateLogEntry | null {
  if (
    !isRecord(value) ||
    typeof value.timestamp !== "string" ||
    (value.type !== "full" && value.type !== "selective") ||
    !isRecord(value.stats)
  ) {
    return null;
  }

  return { timestamp: value.timestamp, type: value.type, stats: value.stats };
}

function historyStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

/**
 * Owns every file under the backup directory. Only `save` and the merge
 * operations touch the main library file; interrupted runs write the partial
 * snapshot instead.
 */
export class SnapshotStore {
  readonly libraryFile: string;
  readonly partialFile: string;
  readonly cursorFile: string;
  readonly historyDir: string;
  readonly updateLogFile: string;

  constructor(
    readonly backupDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.libraryFile = path.join(backupDir, "library.json");
    this.partialFile = path.join(backupDir, ".partial_backup.json");
    this.cursorFile = path.join(backupDir, ".sync_progress.json");
    this.historyDir = path.join(backupDir, "history");
    this.updateLogFile = path.join(backupDir, "update_log.json");
  }

  /** The stored snapshot, or null when there is none or it cannot be read. */
  async load(): Promise<Snapshot | null> {
    try {
      const raw = await readJsonFile(this.libraryFile);
      return raw === null ? null : decodeSnapshot(raw, this.libraryFile);
    } catch (error) {
      if (error instanceof CorruptLocalStateError) {
        logger.warn(`Treating unreadable library as empty: ${error.message}`);
        return null;
      }

      throw error;
    }
  }

  async save(snapshot: Snapshot): Promise<void> {
    await this.rotateHistory();
    await writeJsonAtomic(this.libraryFile, snapshot);
    logger.info(
      `Saved library playlists=${snapshot.playlistCount} tracks=${snapshot.totalTracks} liked=${snapshot.likedSongsCount}`
    );
  }

  async loadPartial(): Promise<PartialSnapshot | null> {
    try {
      const raw = await readJsonFile(this.partialFile);
      return raw === null ? null : decodePartialSnapshot(raw, this.partialFile);
    } catch (error) {
      if (error instanceof CorruptLocalStateError) {
        logger.warn(`Ignoring unreadable partial snapshot: ${error.message}`);
        return null;
      }

      throw error;
    }
  }

  async savePartial(partial: PartialSnapshot): Promise<void> {
    await writeJsonAtomic(this.partialFile, partial);
  }

  async clearPartial(): Promise<void> {
    await removeFile(this.partialFile);
  }

  async mergeFull(fetched: LibraryFetch): Promise<FullMergeStats> {
    const previous = await this.load();
    const { snapshot, stats } = mergeFullLibrary(previous, fetched, this.now().toISOString());

    await this.save(snapshot);
    await this.appendUpdateLog({ timestamp: snapshot.exportedAt, type: "full", stats: { ...stats } });
    return stats;
  }

  async mergeSelective(playlists: Playlist[]): Promise<SelectiveMergeStats> {
    const previous = await this.load();
    const { snapshot, stats } = mergeSelectedPlaylists(previous, playlists, this.now().toISOString());

    if (!snapshot) {
      logger.warn("No stored library to refresh; selected playlists were not saved.");
      return stats;
    }

    await this.save(snapshot);
    await this.appendUpdateLog({ timestamp: snapshot.exportedAt, type: "selective", stats: { ...stats } });
    return stats;
  }

  /** Sets or clears the local folder of a stored playlist. Returns false for unknown IDs. */
  async assignFolder(playlistId: string, folderPath: string | null): Promise<boolean> {
    const snapshot = await this.load();
    const target = snapshot?.playlists.find((playlist) => playlist.playlistId === playlistId);
    if (!snapshot || !target) {
      return false;
    }

    const playlists = snapshot.playlists.map((playlist) =>
      playlist === target ? { ...playlist, folderPath: folderPath?.trim() || null } : playlist
    );
    await writeJsonAtomic(
      this.libraryFile,
      buildSnapshot(snapshot.user, playlists, snapshot.likedSongs, snapshot.exportedAt)
    );
    return true;
  }

  async readUpdateLog(): Promise<UpdateLogEntry[]> {
    try {
      const raw = await readJsonFile(this.updateLogFile);
      if (!Array.isArray(raw)) {
        return [];
      }

      return raw.map(decodeLogEntry).filter((entry): entry is UpdateLogEntry => entry !== null);
    } catch (error) {
      if (error instanceof CorruptLocalStateError) {
        logger.warn(`Starting a new update log: ${error.message}`);
        return [];
      }

      throw error;
    }
  }

  private async appendUpdateLog(entry: UpdateLogEntry): Promise<void> {
    const entries = await this.readUpdateLog();
    entries.push(entry);
    await writeJsonAtomic(this.updateLogFile, entries.slice(-UPDATE_LOG_LIMIT));
  }

  private async rotateHistory(): Promise<void> {
    try {
      await fs.mkdir(this.historyDir, { recursive: true });
      await fs.copyFile(
        this.libraryFile,
        path.join(this.historyDir, `backup_${historyStamp(this.now())}.json`)
      );
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return;
      }

      throw new CorruptLocalStateError(this.historyDir, `Failed to copy library into history: ${errorMessage(error)}`, {
        cause: error
      });
    }

    const files = (await fs.readdir(this.historyDir))
      .filter((name) => name.startsWith("backup_") && name.endsWith(".json"))
      .sort();

    for (const name of files.slice(0, -HISTORY_LIMIT)) {
      await fs.rm(path.join(this.historyDir, name), { force: true });
    }
  }
}
