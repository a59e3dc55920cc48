import { errorMessage, type Result } from "@/lib/errors";
import type { ContentType, Genre } from "@/lib/types";

export type GenreLoader = (contentType: ContentType) => Promise<Result<Genre[]>>;

export type GenreCache = {
  get(contentType: ContentType): Promise<Genre[]>;
  clear(): void;
};

/**
 * Read-through memo of the genre lists, kept for the process lifetime.
 * Concurrent first calls share one load; failed loads (error results or
 * rejections) yield [] and are retried on the next call. Callers get their
 * own copy of the list.
 */
export function createGenreCache(load: GenreLoader): GenreCache {
  const memo = new Map<ContentType, Promise<readonly Genre[]>>();

  function fail(contentType: ContentType, reason: string): Genre[] {
    memo.delete(contentType);
    console.warn(`[genres] ${contentType} list failed: ${reason}`);
    return [];
  }

  function get(contentType: ContentType): Promise<Genre[]> {
    let pending = memo.get(contentType);
    if (!pending) {
      pending = load(contentType).then(
        (res) => (res.ok ? res.data : fail(contentType, res.error.message)),
        (err: unknown) => fail(contentType, errorMessage(err))
      );
      memo.set(contentType, pending);
    }
    return pending.then((list) => list.map((g) => ({ ...g })));
  }

  return { get, clear: () => memo.clear() };
}
