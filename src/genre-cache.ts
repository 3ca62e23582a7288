/**
 * Artist ID to genres lookup, owned by one orchestrator. When `maxEntries` is
 * set the oldest insertions are evicted first.
 */
export class GenreCache {
  private readonly entries = new Map<string, string[]>();

  constructor(private readonly maxEntries: number = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.entries.size;
  }

  get(artistId: string): string[] | undefined {
    return this.entries.get(artistId);
  }

  set(artistId: string, genres: string[]): void {
    this.entries.delete(artistId);
    this.entries.set(artistId, [...genres]);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }

      this.entries.delete(oldest.value);
    }
  }

  missing(artistIds: Iterable<string>): string[] {
    const result = new Set<string>();
    for (const artistId of artistIds) {
      if (!this.entries.has(artistId)) {
        result.add(artistId);
      }
    }

    return [...result];
  }

  genresFor(artistIds: string[]): string[] {
    const genres = new Set<string>();
    for (const artistId of artistIds) {
      for (const genre of this.entries.get(artistId) ?? []) {
        genres.add(genre);
      }
    }

    return [...genres];
  }
}
