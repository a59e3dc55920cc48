import { defaultFilters, parseFilterState } from "@/lib/filters";
import { InvalidFilterError } from "@/lib/errors";
import type { QueryPolicy } from "@/lib/types";

const policy: QueryPolicy = {
  locale: "en-US",
  voteCountFloor: 50,
  ratedVoteCountFloor: 20,
  searchVoteCountFloor: 20,
  unrestrictedYears: [1900, 2025],
};

const parse = (qs: string) => parseFilterState(new URLSearchParams(qs), policy);

describe("parseFilterState", () => {
  test("empty query string gives the defaults", () => {
    expect(parse("")).toEqual(defaultFilters(policy));
    expect(defaultFilters(policy)).toEqual({
      contentType: "movie",
      yearRange: [1900, 2025],
      minRating: 0,
      sort: "popularity",
      page: 1,
    });
  });

  test("reads every field", () => {
    expect(
      parse("type=tv&query=%20office%20&genreId=35&yearMin=2005&yearMax=2013&lang=EN&minRating=8.5&sort=release_date&page=3")
    ).toEqual({
      contentType: "tv",
      query: "office",
      genreId: "35",
      yearRange: [2005, 2013],
      language: "en",
      minRating: 8.5,
      sort: "release_date",
      page: 3,
    });
  });

  test("numbers are not clamped", () => {
    const f = parse("yearMin=2020&yearMax=2010&minRating=11&page=0");
    expect(f.yearRange).toEqual([2020, 2010]);
    expect(f.minRating).toBe(11);
    expect(f.page).toBe(0);
  });

  test("garbage numbers become NaN", () => {
    expect(Number.isNaN(parse("page=abc").page)).toBe(true);
  });

  test("unknown type or sort throws", () => {
    expect(() => parse("type=anime")).toThrow(InvalidFilterError);
    expect(() => parse("sort=trending")).toThrow(InvalidFilterError);
  });
});
