import { describe, expect, it } from "vitest";
import { GenreCache } from "../src/genre-cache";

describe("GenreCache", () => {
  it("lists each uncached artist once", () => {
    const cache = new GenreCache();
    cache.set("a1", ["rock"]);

    expect(cache.missing(["a1", "a2", "a2", "a3"])).toEqual(["a2", "a3"]);
  });

  it("merges genres across artists without duplicates", () => {
    const cache = new GenreCache();
    cache.set("a1", ["rock", "indie"]);
    cache.set("a2", ["indie", "folk"]);

    expect(cache.genresFor(["a1", "a2", "unknown"])).toEqual(["rock", "indie", "folk"]);
  });

  it("evicts the oldest entry past its capacity", () => {
    const cache = new GenreCache(2);
    cache.set("a1", ["rock"]);
    cache.set("a2", ["jazz"]);
    cache.set("a3", ["folk"]);

    expect(cache.size).toBe(2);
    expect(cache.get("a1")).toBeUndefined();
    expect(cache.get("a3")).toEqual(["folk"]);
  });
});
