import type {
  BrowsePage,
  CastMember,
  ContentItem,
  ContentType,
  FilterState,
  Genre,
  QueryPolicy,
  Ratings,
  TitleDetail,
  TmdbCredits,
  TmdbExternalIds,
  TmdbGenreList,
  TmdbMovie,
  TmdbMovieDetail,
  TmdbPaginated,
  TmdbTvDetail,
  TmdbTvShow,
  TmdbVideos,
  TmdbWatchProviders,
  VideoRecord,
  WatchProviders,
} from "@/lib/types";
import type { CatalogGateway } from "@/lib/services/tmdb-service";
import type { RatingsGateway } from "@/lib/services/omdb-service";
import { buildQuery, buildSimilarQuery } from "@/lib/discover/query-builder";
import { processResults } from "@/lib/discover/post-process";
import { selectTrailer } from "@/lib/discover/trailer";
import { createGenreCache, type GenreCache } from "@/lib/discover/genre-cache";
import {
  castFromTmdb,
  detailFromTmdbMovie,
  detailFromTmdbTv,
  itemFromTmdbMovie,
  itemFromTmdbTv,
  providersFromTmdb,
  videoFromTmdb,
} from "@/lib/adapters/tmdb";

export type CatalogDeps = {
  gateway: CatalogGateway;
  policy: QueryPolicy;
  ratings?: RatingsGateway;
  genres?: GenreCache;
  watchRegion: string;
  castLimit: number;
  similarLimit: number;
};

export type Catalog = {
  browse(filters: FilterState): Promise<BrowsePage>;
  details(contentType: ContentType, id: number): Promise<TitleDetail | null>;
  similar(contentType: ContentType, id: number): Promise<ContentItem[]>;
  trailer(contentType: ContentType, id: number): Promise<VideoRecord | null>;
  genres(contentType: ContentType): Promise<Genre[]>;
  cast(contentType: ContentType, id: number): Promise<CastMember[]>;
  watchProviders(contentType: ContentType, id: number): Promise<WatchProviders | null>;
  imdbId(contentType: ContentType, id: number): Promise<string | null>;
  ratings(contentType: ContentType, id: number): Promise<TitleRatings>;
};

export type TitleRatings = { imdbId: string | null; ratings: Ratings | null };

type TmdbListItem = TmdbMovie | TmdbTvShow;

function toItems(contentType: ContentType, rows: TmdbListItem[] | undefined): ContentItem[] {
  const list = Array.isArray(rows) ? rows : [];
  return contentType === "movie" ? list.map(itemFromTmdbMovie) : list.map(itemFromTmdbTv);
}

/**
 * Discovery operations over the catalog and ratings gateways.
 * Only malformed filters throw; upstream failures degrade to empty results.
 */
export function createCatalog(deps: CatalogDeps): Catalog {
  const { gateway, policy } = deps;

  const genreCache =
    deps.genres ??
    createGenreCache(async (contentType) => {
      const res = await gateway.request<TmdbGenreList>(`/genre/${contentType}/list`, {
        language: policy.locale,
      });
      return res.ok ? { ok: true, data: res.data.genres ?? [] } : res;
    });

  async function browse(filters: FilterState): Promise<BrowsePage> {
    const q = buildQuery(filters, policy);
    const res = await gateway.request<TmdbPaginated<TmdbListItem>>(q.path, q.params);
    if (!res.ok) {
      console.warn(`[catalog] ${q.kind} ${q.path} failed: ${res.error.message}`);
      return { page: filters.page, totalPages: 0, items: [] };
    }
    const items = processResults(toItems(q.contentType, res.data.results), q.kind, q.params.query);
    return {
      page: typeof res.data.page === "number" ? res.data.page : filters.page,
      totalPages: typeof res.data.total_pages === "number" ? res.data.total_pages : 0,
      items,
    };
  }

  async function details(contentType: ContentType, id: number): Promise<TitleDetail | null> {
    const params = { language: policy.locale };
    if (contentType === "movie") {
      const res = await gateway.request<TmdbMovieDetail>(`/movie/${id}`, params);
      if (res.ok) return detailFromTmdbMovie(res.data);
      console.warn(`[catalog] details movie/${id} failed: ${res.error.message}`);
      return null;
    }
    const res = await gateway.request<TmdbTvDetail>(`/tv/${id}`, params);
    if (res.ok) return detailFromTmdbTv(res.data);
    console.warn(`[catalog] details tv/${id} failed: ${res.error.message}`);
    return null;
  }

  async function similar(contentType: ContentType, id: number): Promise<ContentItem[]> {
    const q = buildSimilarQuery(contentType, id, policy);
    const res = await gateway.request<TmdbPaginated<TmdbListItem>>(q.path, q.params);
    if (!res.ok) {
      console.warn(`[catalog] similar ${q.path} failed: ${res.error.message}`);
      return [];
    }
    return processResults(toItems(contentType, res.data.results), q.kind).slice(0, deps.similarLimit);
  }

  async function trailer(contentType: ContentType, id: number): Promise<VideoRecord | null> {
    const res = await gateway.request<TmdbVideos>(`/${contentType}/${id}/videos`, {
      language: policy.locale,
    });
    if (!res.ok) {
      console.warn(`[catalog] videos ${contentType}/${id} failed: ${res.error.message}`);
      return null;
    }
    return selectTrailer((res.data.results ?? []).map(videoFromTmdb));
  }

  async function cast(contentType: ContentType, id: number): Promise<CastMember[]> {
    const res = await gateway.request<TmdbCredits>(`/${contentType}/${id}/credits`, {
      language: policy.locale,
    });
    if (!res.ok) {
      console.warn(`[catalog] credits ${contentType}/${id} failed: ${res.error.message}`);
      return [];
    }
    return (res.data.cast ?? []).slice(0, deps.castLimit).map(castFromTmdb);
  }

  async function watchProviders(contentType: ContentType, id: number): Promise<WatchProviders | null> {
    const res = await gateway.request<TmdbWatchProviders>(`/${contentType}/${id}/watch/providers`);
    if (!res.ok) {
      console.warn(`[catalog] providers ${contentType}/${id} failed: ${res.error.message}`);
      return null;
    }
    const entry = res.data.results?.[deps.watchRegion];
    return entry ? providersFromTmdb(entry) : null;
  }

  async function imdbId(contentType: ContentType, id: number): Promise<string | null> {
    const res = await gateway.request<TmdbExternalIds>(`/${contentType}/${id}/external_ids`);
    if (!res.ok) {
      console.warn(`[catalog] external ids ${contentType}/${id} failed: ${res.error.message}`);
      return null;
    }
    return res.data.imdb_id || null;
  }

  async function ratings(contentType: ContentType, id: number): Promise<TitleRatings> {
    const imdb = await imdbId(contentType, id);
    if (!imdb || !deps.ratings) return { imdbId: imdb, ratings: null };
    return { imdbId: imdb, ratings: await deps.ratings.getRatings(imdb) };
  }

  return {
    browse,
    details,
    similar,
    trailer,
    genres: (contentType) => genreCache.get(contentType),
    cast,
    watchProviders,
    imdbId,
    ratings,
  };
}
