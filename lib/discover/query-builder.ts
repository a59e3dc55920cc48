import { InvalidFilterError } from "@/lib/errors";
import type {
  CatalogQuery,
  ContentType,
  FilterState,
  QueryParams,
  QueryPolicy,
  SortKey,
} from "@/lib/types";

const CONTENT_TYPES: readonly ContentType[] = ["movie", "tv"];
const SORT_KEYS: readonly SortKey[] = ["popularity", "rating", "release_date", "revenue"];

export function isContentType(v: string): v is ContentType {
  return (CONTENT_TYPES as readonly string[]).includes(v);
}

export function isSortKey(v: string): v is SortKey {
  return (SORT_KEYS as readonly string[]).includes(v);
}

function sortToken(sort: SortKey, contentType: ContentType): string {
  switch (sort) {
    case "rating":
      return "vote_average.desc";
    case "release_date":
      return contentType === "movie" ? "primary_release_date.desc" : "first_air_date.desc";
    case "revenue":
      return "revenue.desc";
    case "popularity":
      return "popularity.desc";
  }
}

/** Release date for movies, first air date for TV. */
function dateField(contentType: ContentType): string {
  return contentType === "movie" ? "primary_release_date" : "first_air_date";
}

/** 7 -> "7.0", 7.25 -> "7.25" */
function formatRating(r: number): string {
  return Number.isInteger(r) ? r.toFixed(1) : String(r);
}

export function validateFilters(f: FilterState): void {
  if (!isContentType(f.contentType)) {
    throw new InvalidFilterError("contentType", `Unknown content type: ${f.contentType}`);
  }
  if (!isSortKey(f.sort)) {
    throw new InvalidFilterError("sort", `Unknown sort key: ${f.sort}`);
  }
  const [min, max] = f.yearRange;
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new InvalidFilterError("yearRange", "Year bounds must be whole years");
  }
  if (min > max) {
    throw new InvalidFilterError("yearRange", `Year range is inverted: ${min} > ${max}`);
  }
  if (!Number.isFinite(f.minRating) || f.minRating < 0 || f.minRating > 10) {
    throw new InvalidFilterError("minRating", `Minimum rating must be within 0..10, got ${f.minRating}`);
  }
  if (!Number.isInteger(f.page) || f.page < 1) {
    throw new InvalidFilterError("page", `Page must be a positive integer, got ${f.page}`);
  }
}

/**
 * Translate a filter set into one upstream discover or search request.
 * Pure: the same filters and policy always yield the same params.
 * Throws InvalidFilterError for malformed filters.
 */
export function buildQuery(f: FilterState, policy: QueryPolicy): CatalogQuery {
  validateFilters(f);

  const query = (f.query ?? "").trim();
  const params: QueryParams = {
    language: policy.locale,
    include_adult: "false",
    page: String(f.page),
  };

  if (query) {
    params.query = query;
    params.sort_by = "popularity.desc";
    if (f.minRating > 0) {
      params["vote_average.gte"] = formatRating(f.minRating);
      params["vote_count.gte"] = String(policy.searchVoteCountFloor);
    }
    return { kind: "search", contentType: f.contentType, path: `/search/${f.contentType}`, params };
  }

  params.sort_by = sortToken(f.sort, f.contentType);
  if (f.contentType === "movie") params.include_video = "false";

  // Fewer votes are enough once the rating filter already narrows results
  if (f.minRating > 0) {
    params["vote_average.gte"] = formatRating(f.minRating);
    params["vote_count.gte"] = String(policy.ratedVoteCountFloor);
  } else {
    params["vote_count.gte"] = String(policy.voteCountFloor);
  }

  const [min, max] = f.yearRange;
  const [floor, ceiling] = policy.unrestrictedYears;
  if (min !== floor || max !== ceiling) {
    const field = dateField(f.contentType);
    params[`${field}.gte`] = `${min}-01-01`;
    params[`${field}.lte`] = `${max}-12-31`;
  }

  const lang = f.language?.trim().toLowerCase();
  if (lang) params.with_original_language = lang;

  const genre = f.genreId?.trim();
  if (genre) params.with_genres = genre;

  return { kind: "discover", contentType: f.contentType, path: `/discover/${f.contentType}`, params };
}

export function buildSimilarQuery(
  contentType: ContentType,
  id: number,
  policy: QueryPolicy,
  page = 1
): CatalogQuery {
  if (!isContentType(contentType)) {
    throw new InvalidFilterError("contentType", `Unknown content type: ${contentType}`);
  }
  if (!Number.isInteger(id) || id < 1) {
    throw new InvalidFilterError("id", `Invalid title id: ${id}`);
  }
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidFilterError("page", `Page must be a positive integer, got ${page}`);
  }
  return {
    kind: "similar",
    contentType,
    path: `/${contentType}/${id}/similar`,
    params: { language: policy.locale, page: String(page) },
  };
}
