import { NextRequest } from "next/server";
import { GET } from "@/app/api/tmdb/browse/route";
import { resetServer } from "@/lib/server/catalog";
import type { Card, Paginated } from "@/lib/types";

const ENV = { ...process.env };

let fetchSpy: jest.SpyInstance;
let warn: jest.SpyInstance;

beforeEach(() => {
  process.env = { ...ENV, TMDB_API_KEY: "test-key", TMDB_BASE_URL: "https://tmdb.test/3" };
  delete process.env.TMDB_ACCESS_TOKEN;
  resetServer();
  warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  fetchSpy = jest.spyOn(global, "fetch");
});

afterEach(() => {
  fetchSpy.mockRestore();
  warn.mockRestore();
  process.env = ENV;
});

function upstream(body: unknown, status = 200) {
  fetchSpy.mockImplementation(async () => new Response(JSON.stringify(body), { status }));
}

function requestedUrl(): URL {
  return new URL(String(fetchSpy.mock.calls[0][0]));
}

describe("GET /api/tmdb/browse", () => {
  test("discover with filters", async () => {
    upstream({
      page: 2,
      total_pages: 40,
      results: [
        { id: 1, title: "Mad Max: Fury Road", poster_path: "/m.jpg", vote_average: 7.64, popularity: 50 },
        { id: 2, title: "Poster-less", poster_path: null },
      ],
    });

    const res = await GET(
      new NextRequest(
        "http://localhost/api/tmdb/browse?genreId=28&yearMin=2015&yearMax=2020&minRating=7&sort=rating&page=2"
      )
    );
    const body = (await res.json()) as Paginated<Card>;

    expect(res.status).toBe(200);
    expect(res.headers.get("Cache-Control")).toBe("public, s-maxage=60, stale-while-revalidate=600");
    expect(body.page).toBe(2);
    expect(body.total_pages).toBe(40);
    expect(body.results).toHaveLength(1);
    expect(body.results[0]).toMatchObject({
      id: 1,
      title: "Mad Max: Fury Road",
      posterPath: "https://image.tmdb.org/t/p/w500/m.jpg",
      rating: 7.6,
      tmdbRatingPct: 76,
    });

    const u = requestedUrl();
    expect(u.pathname).toBe("/3/discover/movie");
    expect(u.searchParams.get("with_genres")).toBe("28");
    expect(u.searchParams.get("primary_release_date.gte")).toBe("2015-01-01");
    expect(u.searchParams.get("primary_release_date.lte")).toBe("2020-12-31");
    expect(u.searchParams.get("vote_average.gte")).toBe("7.0");
    expect(u.searchParams.get("vote_count.gte")).toBe("20");
    expect(u.searchParams.get("sort_by")).toBe("vote_average.desc");
    expect(u.searchParams.get("page")).toBe("2");
    expect(u.searchParams.get("api_key")).toBe("test-key");
  });

  test("search is not cached", async () => {
    upstream({ page: 1, total_pages: 1, results: [] });

    const res = await GET(new NextRequest("http://localhost/api/tmdb/browse?type=tv&query=office"));

    expect(res.headers.get("Cache-Control")).toBe("no-store");
    expect(requestedUrl().pathname).toBe("/3/search/tv");
    expect(requestedUrl().searchParams.get("query")).toBe("office");
  });

  test("invalid filters are a 400 without an upstream call", async () => {
    const res = await GET(new NextRequest("http://localhost/api/tmdb/browse?yearMin=2020&yearMax=2010"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Year range is inverted: 2020 > 2010", field: "yearRange" });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  test("unknown sort is a 400", async () => {
    const res = await GET(new NextRequest("http://localhost/api/tmdb/browse?sort=trending"));
    expect(res.status).toBe(400);
  });

  test("upstream failure is an empty page", async () => {
    upstream({ status_message: "Invalid API key" }, 401);

    const res = await GET(new NextRequest("http://localhost/api/tmdb/browse?page=3"));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ page: 3, total_pages: 0, results: [] });
  });
});
