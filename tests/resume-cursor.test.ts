import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ResumeCursor, readResumeInfo } from "../src/resume-cursor";
import { makeTempDir } from "./fixtures";

const rateLimit = {
  retryAfterSeconds: 60,
  availableAt: "2026-10-19T12:01:00.000Z",
  message: "Rate limited during fetching tracks for Playlist p2"
};

describe("ResumeCursor", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await makeTempDir("resume-cursor-");
    filePath = path.join(dir, ".sync_progress.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("has pending work only once interrupted with something left to do", () => {
    const cursor = new ResumeCursor(filePath);
    expect(cursor.hasPendingWork()).toBe(false);

    cursor.plan([{ id: "p1", name: "One" }]);
    expect(cursor.hasPendingWork()).toBe(false);

    cursor.markInterrupted("fetch-error", null);
    expect(cursor.hasPendingWork()).toBe(true);

    cursor.completePlaylist("p1");
    expect(cursor.hasPendingWork()).toBe(true);

    cursor.completeLikedSongs();
    expect(cursor.hasPendingWork()).toBe(false);
  });

  it("markRunning clears the interruption", () => {
    const cursor = new ResumeCursor(filePath);
    cursor.plan([{ id: "p1", name: "One" }]);
    cursor.markInterrupted("rate-limit", rateLimit);

    cursor.markRunning();

    expect(cursor.wasInterrupted).toBe(false);
    expect(cursor.interruption).toBeNull();
    expect(cursor.rateLimit).toBeNull();
    expect(cursor.hasPendingWork()).toBe(false);
  });

  it("persists and reloads the exact resume position", async () => {
    const cursor = new ResumeCursor(filePath);
    cursor.plan([
      { id: "p1", name: "One" },
      { id: "p2", name: "Two" }
    ]);
    cursor.completePlaylist("p1");
    cursor.advancePlaylist("p2", 200);
    cursor.markInterrupted("rate-limit", rateLimit);
    await cursor.save();

    const reloaded = new ResumeCursor(filePath);
    expect(await reloaded.load()).toBe(true);
    expect(reloaded.plannedPlaylists).toEqual([
      { id: "p1", name: "One" },
      { id: "p2", name: "Two" }
    ]);
    expect(reloaded.completedCount).toBe(1);
    expect(reloaded.isCompleted("p1")).toBe(true);
    expect(reloaded.offsetFor("p2")).toBe(200);
    expect(reloaded.offsetFor("p1")).toBe(0);
    expect(reloaded.interruption).toBe("rate-limit");
    expect(reloaded.rateLimit).toEqual(rateLimit);
    expect(reloaded.hasPendingWork()).toBe(true);
    expect(await fs.readdir(dir)).toEqual([".sync_progress.json"]);
  });

  it("reloads cancelled and auth-failed interruptions as resumable", async () => {
    for (const kind of ["cancelled", "auth-failed"] as const) {
      const cursor = new ResumeCursor(filePath);
      cursor.plan([{ id: "p1", name: "One" }]);
      cursor.markInterrupted(kind, null);
      await cursor.save();

      const reloaded = new ResumeCursor(filePath);
      expect(await reloaded.load()).toBe(true);
      expect(reloaded.interruption).toBe(kind);
      expect(reloaded.hasPendingWork()).toBe(true);
    }
  });

  it("treats a missing file as nothing to resume", async () => {
    const cursor = new ResumeCursor(filePath);
    expect(await cursor.load()).toBe(false);
    expect(cursor.plannedCount).toBe(0);
  });

  it("treats an unparseable file as nothing to resume", async () => {
    await fs.writeFile(filePath, "{not json", "utf8");

    const cursor = new ResumeCursor(filePath);
    expect(await cursor.load()).toBe(false);
    expect(cursor.hasPendingWork()).toBe(false);
    expect(cursor.plannedCount).toBe(0);
  });

  it("rejects a file with the wrong shape", async () => {
    await fs.writeFile(filePath, JSON.stringify({ plannedPlaylists: "p1", completedPlaylistIds: [] }), "utf8");

    const cursor = new ResumeCursor(filePath);
    expect(await cursor.load()).toBe(false);
  });

  it("clear removes the file and resets state", async () => {
    const cursor = new ResumeCursor(filePath);
    cursor.plan([{ id: "p1", name: "One" }]);
    await cursor.save();

    await cursor.clear();

    expect(cursor.plannedCount).toBe(0);
    await expect(fs.access(filePath)).rejects.toThrow();
  });

  it("describes a pending resume", async () => {
    const cursor = new ResumeCursor(filePath);
    cursor.plan([
      { id: "p1", name: "One" },
      { id: "p2", name: "Two" }
    ]);
    cursor.completePlaylist("p1");
    cursor.markInterrupted("rate-limit", rateLimit);
    await cursor.save();

    expect(await readResumeInfo(new ResumeCursor(filePath))).toEqual({
      canResume: true,
      completed: 1,
      planned: 2,
      likedDone: false,
      availableAt: "2026-10-19T12:01:00.000Z"
    });
  });
});
