import type { ContentItem, QueryKind } from "@/lib/types";

export function hasPoster(item: ContentItem): boolean {
  return typeof item.posterPath === "string" && item.posterPath.length > 0;
}

/**
 * Drop items without a poster; in search mode, titles starting with the
 * query come first, then by popularity. Ties keep upstream order.
 */
export function processResults(
  items: readonly ContentItem[],
  mode: QueryKind,
  queryText?: string
): ContentItem[] {
  const usable = items.filter(hasPoster);
  const q = (queryText ?? "").trim().toLowerCase();
  if (mode !== "search" || !q) return usable;

  const prefixed = (it: ContentItem) => (it.title.toLowerCase().startsWith(q) ? 0 : 1);

  // Array#sort is stable
  return usable.sort((a, b) => prefixed(a) - prefixed(b) || b.popularity - a.popularity);
}
