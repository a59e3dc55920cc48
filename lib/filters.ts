import type { ContentType, FilterState, QueryPolicy, SortKey } from "@/lib/types";
import { InvalidFilterError } from "@/lib/errors";
import { isContentType, isSortKey } from "@/lib/discover/query-builder";

/** Numeric query param; NaN when present but unparseable so validation rejects it. */
function numParam(sp: URLSearchParams, name: string, fallback: number): number {
  const raw = sp.get(name);
  if (raw === null || raw.trim() === "") return fallback;
  return Number(raw);
}

function strParam(sp: URLSearchParams, name: string): string | undefined {
  const v = (sp.get(name) || "").trim();
  return v ? v : undefined;
}

export function parseContentType(raw: string): ContentType {
  if (!isContentType(raw)) throw new InvalidFilterError("contentType", `Unknown content type: ${raw}`);
  return raw;
}

export function defaultFilters(policy: QueryPolicy): FilterState {
  return {
    contentType: "movie",
    yearRange: [policy.unrestrictedYears[0], policy.unrestrictedYears[1]],
    minRating: 0,
    sort: "popularity",
    page: 1,
  };
}

/**
 * Browse filters from a query string:
 * `type, query, genreId, yearMin, yearMax, lang, minRating, sort, page`.
 * Numbers are taken as given (no clamping); `buildQuery` rejects the
 * malformed ones. Unknown `type` or `sort` throws InvalidFilterError.
 */
export function parseFilterState(sp: URLSearchParams, policy: QueryPolicy): FilterState {
  const d = defaultFilters(policy);
  const contentType = parseContentType(strParam(sp, "type") ?? d.contentType);

  const sortRaw = strParam(sp, "sort") ?? d.sort;
  if (!isSortKey(sortRaw)) throw new InvalidFilterError("sort", `Unknown sort key: ${sortRaw}`);
  const sort: SortKey = sortRaw;

  return {
    contentType,
    genreId: strParam(sp, "genreId"),
    yearRange: [numParam(sp, "yearMin", d.yearRange[0]), numParam(sp, "yearMax", d.yearRange[1])],
    language: strParam(sp, "lang")?.toLowerCase(),
    minRating: numParam(sp, "minRating", d.minRating),
    sort,
    query: strParam(sp, "query"),
    page: numParam(sp, "page", d.page),
  };
}
