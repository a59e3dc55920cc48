// lib/services/tmdb-service.ts
import { UpstreamUnavailableError, errorMessage, type Result } from "@/lib/errors";
import type { QueryParams } from "@/lib/types";

const IMG_BASE = "https://image.tmdb.org/t/p";

export type TmdbGatewayOptions = {
  baseUrl: string;
  accessToken?: string;
  apiKey?: string;
  fetchImpl?: typeof fetch;
};

export type CatalogGateway = {
  request<T>(path: string, params?: QueryParams): Promise<Result<T>>;
};

/**
 * Minimal TMDB client.
 * - No retries, no custom caches.
 * - Never throws for upstream trouble; failures come back as `{ ok: false }`.
 */
export function createTmdbGateway(opts: TmdbGatewayOptions): CatalogGateway {
  const doFetch = opts.fetchImpl ?? fetch;
  const base = opts.baseUrl.replace(/\/+$/, "");

  // Auth: prefer Bearer; otherwise use API key on the URL
  function authHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (opts.accessToken) headers.Authorization = `Bearer ${opts.accessToken}`;
    return headers;
  }

  function buildUrl(path: string, params: QueryParams): URL {
    const normalized = path.startsWith("/") ? path : `/${path}`;
    const u = new URL(`${base}${normalized}`);
    for (const [k, v] of Object.entries(params)) u.searchParams.set(k, v);
    if (!opts.accessToken && opts.apiKey) u.searchParams.set("api_key", opts.apiKey);
    return u;
  }

  async function request<T>(path: string, params: QueryParams = {}): Promise<Result<T>> {
    if (!opts.accessToken && !opts.apiKey) {
      return {
        ok: false,
        error: new UpstreamUnavailableError(
          "TMDB credentials missing. Set TMDB_ACCESS_TOKEN or TMDB_API_KEY in .env.local"
        ),
      };
    }

    let res: Response;
    try {
      res = await doFetch(buildUrl(path, params).toString(), { headers: authHeaders() });
    } catch (err) {
      return { ok: false, error: new UpstreamUnavailableError(`TMDB network failure: ${errorMessage(err)}`) };
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      return {
        ok: false,
        error: new UpstreamUnavailableError(`TMDB ${res.status} ${res.statusText}: ${text}`.trim(), res.status),
      };
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      return {
        ok: false,
        error: new UpstreamUnavailableError(`TMDB invalid JSON: ${errorMessage(err)}`, res.status),
      };
    }

    // Every TMDB v3 payload is a JSON object
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      return { ok: false, error: new UpstreamUnavailableError("TMDB invalid body", res.status) };
    }
    return { ok: true, data: body as T };
  }

  return { request };
}

/* ---------- Convenience helpers ---------- */

export function posterUrl(path: string | null | undefined, size: "w342" | "w500" = "w500") {
  return path ? `${IMG_BASE}/${size}${path}` : null;
}

export function backdropUrl(path: string | null | undefined, size: "w780" | "w1280" = "w1280") {
  return path ? `${IMG_BASE}/${size}${path}` : null;
}

export function profileUrl(path: string | null | undefined) {
  return path ? `${IMG_BASE}/w185${path}` : null;
}

export function logoUrl(path: string | null | undefined) {
  return path ? `${IMG_BASE}/w92${path}` : null;
}
