// lib/types.ts

/** ------------------------------
 * RAW TMDB TYPES (as returned by their API)
 * Keep these 1:1 with TMDB responses
 * ------------------------------ */

export type TmdbPaginated<T> = {
  page: number;
  total_pages: number;
  total_results?: number;
  results: T[];
};

export type TmdbGenre = { id: number; name: string };

export type TmdbGenreList = {
  genres: TmdbGenre[];
};

export type TmdbMovie = {
  id: number;
  title?: string;
  poster_path?: string | null;
  backdrop_path?: string | null;
  overview?: string;
  release_date?: string;       // "YYYY-MM-DD"
  vote_average?: number;       // 0-10 float
  vote_count?: number;
  popularity?: number;
  genre_ids?: number[];
  original_language?: string;
};

export type TmdbTvShow = {
  id: number;
  name?: string;
  poster_path?: string | null;
  backdrop_path?: string | null;
  overview?: string;
  first_air_date?: string;
  vote_average?: number;
  vote_count?: number;
  popularity?: number;
  genre_ids?: number[];
  original_language?: string;
};

export type TmdbCast = {
  id: number;
  name: string;
  character?: string;
  order?: number;
  profile_path?: string | null;
};

export type TmdbCredits = {
  cast?: TmdbCast[];
};

export type TmdbVideo = {
  id?: string;
  key: string;     // YouTube key
  name?: string;
  site: "YouTube" | string;
  type: string;    // "Trailer" | "Teaser" | "Clip" | ...
  official?: boolean;
};

export type TmdbVideos = {
  results?: TmdbVideo[];
};

export type TmdbProvider = {
  provider_id: number;
  provider_name: string;
  logo_path?: string | null;
  display_priority?: number;
};

/** `/{kind}/{id}/watch/providers`, keyed by ISO-3166 region */
export type TmdbWatchProviders = {
  results?: Record<
    string,
    {
      link?: string;
      flatrate?: TmdbProvider[];
      rent?: TmdbProvider[];
      buy?: TmdbProvider[];
    }
  >;
};

export type TmdbExternalIds = {
  imdb_id?: string | null;
};

/** `/movie/{id}` */
export type TmdbMovieDetail = TmdbMovie & {
  tagline?: string | null;
  runtime?: number | null;
  genres?: TmdbGenre[];
  status?: string;
  imdb_id?: string | null;
};

/** `/tv/{id}` */
export type TmdbTvDetail = TmdbTvShow & {
  tagline?: string | null;
  episode_run_time?: number[];
  genres?: TmdbGenre[];
  status?: string;
  number_of_seasons?: number;
  number_of_episodes?: number;
};

/** ------------------------------
 * DISCOVERY TYPES
 * ------------------------------ */

export type ContentType = "movie" | "tv";

export type SortKey = "popularity" | "rating" | "release_date" | "revenue";

export type QueryKind = "discover" | "search" | "similar";

/** User-selected browse criteria; one immutable value per request. */
export type FilterState = {
  contentType: ContentType;
  genreId?: string;
  yearRange: [number, number];
  language?: string;           // ISO-639-1, e.g. "en", "ja"
  minRating: number;           // 0..10, 0 = no rating filter
  sort: SortKey;
  query?: string;
  page: number;                // 1-based
};

/** Flat upstream query string, credentials excluded. */
export type QueryParams = Record<string, string>;

export type CatalogQuery = {
  kind: QueryKind;
  contentType: ContentType;
  path: string;
  params: QueryParams;
};

/** Thresholds and locale the query builder applies. */
export type QueryPolicy = {
  locale: string;
  voteCountFloor: number;        // discover, no rating filter
  ratedVoteCountFloor: number;   // discover, rating filter applied
  searchVoteCountFloor: number;  // search, rating filter applied
  unrestrictedYears: [number, number];
};

export type ContentItem = Readonly<{
  id: number;
  title: string;
  posterPath: string | null;
  releaseDate: string;         // "YYYY-MM-DD" or ""
  voteAverage?: number;
  popularity: number;
  raw: TmdbMovie | TmdbTvShow;
}>;

export type VideoType = "Trailer" | "Teaser" | "Other";

export type VideoRecord = Readonly<{
  site: string;
  type: VideoType;
  name: string;
  key: string;
}>;

export type Genre = { id: number; name: string };

export type CastMember = {
  name: string;
  character: string;
  profileUrl: string | null;
};

export type Provider = {
  id: number;
  name: string;
  logoUrl: string | null;
};

export type WatchProviders = {
  stream: Provider[];
  rent: Provider[];
  buy: Provider[];
};

export type Ratings = {
  imdb?: string;
  rottenTomatoes?: string;
  metacritic?: string;
};

export type BrowsePage = {
  page: number;
  totalPages: number;
  items: ContentItem[];
};

/** ------------------------------
 * APP TYPES (UI-friendly view models)
 * ------------------------------ */

export type Card = {
  id: number;
  title: string;
  posterPath: string | null;   // full CDN url or null (mapped)
  year?: number;               // 4-digit year
  rating?: number;             // 0–10, 1 decimal
  isNew?: boolean;             // computed (last 30 days)
  originalLanguage?: string;   // e.g. "en", "ja", etc.
  tmdbRatingPct?: number;      // 0–100, derived from vote_average
  tmdbPopularity?: number;
};

export type TitleDetail = {
  id: number;
  title: string;
  tagline: string;
  overview: string;
  releaseDate: string;         // "YYYY-MM-DD" or ""
  year?: number;
  rating?: number;             // 0–10, 1 decimal
  runtime: number | null;      // minutes; first episode runtime for tv
  genres: string[];
  posterUrl: string | null;
  backdropUrl: string | null;
  originalLanguage?: string;
  status?: string;
  seasons?: number;            // tv only
  episodes?: number;           // tv only
};

export type Paginated<T> = {
  page: number;
  total_pages: number;
  results: T[];
};
