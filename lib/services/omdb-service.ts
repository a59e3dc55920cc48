import type { Ratings } from "@/lib/types";
import { errorMessage } from "@/lib/errors";

export type OmdbGatewayOptions = {
  baseUrl: string;
  apiKey?: string;
  fetchImpl?: typeof fetch;
};

export type RatingsGateway = {
  getRatings(imdbId: string): Promise<Ratings | null>;
};

type OmdbResponse = {
  Response?: "True" | "False";
  Error?: string;
  Ratings?: Array<{ Source?: string; Value?: string }>;
};

const SOURCES: Record<string, keyof Ratings> = {
  "Internet Movie Database": "imdb",
  "Rotten Tomatoes": "rottenTomatoes",
  Metacritic: "metacritic",
};

export function ratingsFromOmdb(data: OmdbResponse): Ratings {
  const out: Ratings = {};
  for (const r of data.Ratings ?? []) {
    const field = r.Source ? SOURCES[r.Source] : undefined;
    if (field && r.Value) out[field] = r.Value;
  }
  return out;
}

/** OMDb lookup by IMDb id; null when unavailable for any reason. */
export function createOmdbGateway(opts: OmdbGatewayOptions): RatingsGateway {
  const doFetch = opts.fetchImpl ?? fetch;

  async function getRatings(imdbId: string): Promise<Ratings | null> {
    if (!opts.apiKey) return null;
    const u = new URL(`${opts.baseUrl.replace(/\/+$/, "")}/`);
    u.searchParams.set("i", imdbId);
    u.searchParams.set("apikey", opts.apiKey);

    try {
      const res = await doFetch(u.toString(), { headers: { Accept: "application/json" } });
      if (!res.ok) {
        console.warn(`[omdb] ${imdbId} failed: ${res.status}`);
        return null;
      }
      const data = (await res.json()) as OmdbResponse;
      if (data.Response === "False") {
        console.warn(`[omdb] ${imdbId}: ${data.Error ?? "no result"}`);
        return null;
      }
      return ratingsFromOmdb(data);
    } catch (err) {
      console.warn(`[omdb] ${imdbId} network failure: ${errorMessage(err)}`);
      return null;
    }
  }

  return { getRatings };
}
