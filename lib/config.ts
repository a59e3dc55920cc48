import type { QueryPolicy } from "@/lib/types";

export type AppConfig = {
  tmdb: {
    baseUrl: string;
    accessToken?: string;   // v4 read access token
    apiKey?: string;        // v3 api key
  };
  omdb: {
    baseUrl: string;
    apiKey?: string;
  };
  policy: QueryPolicy;
  watchRegion: string;
  castLimit: number;
  similarLimit: number;
};

function int(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw && Number.isInteger(n) && n >= 0 ? n : fallback;
}

function opt(raw: string | undefined): string | undefined {
  const v = raw?.trim();
  return v ? v : undefined;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const nowYear = new Date().getFullYear();

  return {
    tmdb: {
      baseUrl: opt(env.TMDB_BASE_URL) ?? "https://api.themoviedb.org/3",
      accessToken: opt(env.TMDB_ACCESS_TOKEN),
      apiKey: opt(env.TMDB_API_KEY),
    },
    omdb: {
      baseUrl: opt(env.OMDB_BASE_URL) ?? "https://www.omdbapi.com",
      apiKey: opt(env.OMDB_API_KEY),
    },
    policy: {
      locale: opt(env.CATALOG_LOCALE) ?? "en-US",
      voteCountFloor: int(env.VOTE_COUNT_FLOOR, 50),
      ratedVoteCountFloor: int(env.RATED_VOTE_COUNT_FLOOR, 20),
      searchVoteCountFloor: int(env.SEARCH_VOTE_COUNT_FLOOR, 20),
      unrestrictedYears: [int(env.YEAR_FLOOR, 1900), int(env.YEAR_CEILING, nowYear)],
    },
    watchRegion: (opt(env.WATCH_REGION) ?? "US").toUpperCase(),
    castLimit: int(env.CAST_LIMIT, 10),
    similarLimit: int(env.SIMILAR_LIMIT, 5),
  };
}
