import type {
  Card,
  CastMember,
  ContentItem,
  Provider,
  TmdbCast,
  TitleDetail,
  TmdbMovie,
  TmdbMovieDetail,
  TmdbProvider,
  TmdbTvDetail,
  TmdbTvShow,
  TmdbVideo,
  VideoRecord,
  WatchProviders,
} from "@/lib/types";
import { backdropUrl, logoUrl, posterUrl, profileUrl } from "@/lib/services/tmdb-service";

export function isNew(release_date?: string, now = Date.now()): boolean {
  if (!release_date) return false;
  const d = new Date(release_date);
  if (Number.isNaN(d.getTime())) return false;
  const diffDays = (now - d.getTime()) / 86_400_000;
  return diffDays >= 0 && diffDays <= 30;
}

export function toYear(release_date?: string): number | undefined {
  return release_date && release_date.length >= 4
    ? Number(release_date.slice(0, 4))
    : undefined;
}

export function toRating1dp(v?: number): number | undefined {
  return typeof v === "number"
    ? Number((Math.round(v * 10) / 10).toFixed(1))
    : undefined;
}

function finite(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

// ---------- TMDB → ContentItem ----------
export function itemFromTmdbMovie(m: TmdbMovie): ContentItem {
  return {
    id: m.id,
    title: m.title ?? "",
    posterPath: m.poster_path || null,
    releaseDate: m.release_date ?? "",
    voteAverage: finite(m.vote_average),
    popularity: finite(m.popularity) ?? 0,
    raw: m,
  };
}

export function itemFromTmdbTv(t: TmdbTvShow): ContentItem {
  return {
    id: t.id,
    title: t.name ?? "",
    posterPath: t.poster_path || null,
    releaseDate: t.first_air_date ?? "",
    voteAverage: finite(t.vote_average),
    popularity: finite(t.popularity) ?? 0,
    raw: t,
  };
}

// ---------- ContentItem → Card ----------
export function cardFromItem(it: ContentItem): Card {
  return {
    id: it.id,
    title: it.title,
    posterPath: posterUrl(it.posterPath, "w500"),
    year: toYear(it.releaseDate),
    rating: toRating1dp(it.voteAverage),
    isNew: isNew(it.releaseDate),
    originalLanguage: it.raw.original_language,
    tmdbRatingPct: it.voteAverage === undefined ? undefined : Math.round(it.voteAverage * 10),
    tmdbPopularity: it.popularity,
  };
}

// ---------- Title details ----------
function genreNames(genres: TmdbMovieDetail["genres"]): string[] {
  return Array.isArray(genres) ? genres.map((g) => g.name) : [];
}

export function detailFromTmdbMovie(d: TmdbMovieDetail): TitleDetail {
  return {
    id: d.id,
    title: d.title ?? "",
    tagline: d.tagline ?? "",
    overview: d.overview ?? "",
    releaseDate: d.release_date ?? "",
    year: toYear(d.release_date),
    rating: toRating1dp(finite(d.vote_average)),
    runtime: finite(d.runtime) ?? null,
    genres: genreNames(d.genres),
    posterUrl: posterUrl(d.poster_path, "w500"),
    backdropUrl: backdropUrl(d.backdrop_path, "w1280"),
    originalLanguage: d.original_language,
    status: d.status,
  };
}

export function detailFromTmdbTv(d: TmdbTvDetail): TitleDetail {
  return {
    id: d.id,
    title: d.name ?? "",
    tagline: d.tagline ?? "",
    overview: d.overview ?? "",
    releaseDate: d.first_air_date ?? "",
    year: toYear(d.first_air_date),
    rating: toRating1dp(finite(d.vote_average)),
    runtime: finite(d.episode_run_time?.[0]) ?? null,
    genres: genreNames(d.genres),
    posterUrl: posterUrl(d.poster_path, "w500"),
    backdropUrl: backdropUrl(d.backdrop_path, "w1280"),
    originalLanguage: d.original_language,
    status: d.status,
    seasons: finite(d.number_of_seasons),
    episodes: finite(d.number_of_episodes),
  };
}

// ---------- Videos / credits / providers ----------
export function videoFromTmdb(v: TmdbVideo): VideoRecord {
  return {
    site: v.site ?? "",
    type: v.type === "Trailer" || v.type === "Teaser" ? v.type : "Other",
    name: v.name ?? "",
    key: v.key ?? "",
  };
}

export function castFromTmdb(c: TmdbCast): CastMember {
  return {
    name: c.name,
    character: c.character ?? "",
    profileUrl: profileUrl(c.profile_path),
  };
}

function providerFromTmdb(p: TmdbProvider): Provider {
  return { id: p.provider_id, name: p.provider_name, logoUrl: logoUrl(p.logo_path) };
}

export function providersFromTmdb(entry: {
  flatrate?: TmdbProvider[];
  rent?: TmdbProvider[];
  buy?: TmdbProvider[];
}): WatchProviders {
  return {
    stream: (entry.flatrate ?? []).map(providerFromTmdb),
    rent: (entry.rent ?? []).map(providerFromTmdb),
    buy: (entry.buy ?? []).map(providerFromTmdb),
  };
}
