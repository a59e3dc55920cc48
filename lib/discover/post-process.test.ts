import { processResults } from "@/lib/discover/post-process";
import type { ContentItem } from "@/lib/types";

function item(id: number, title: string, posterPath: string | null, popularity = 0): ContentItem {
  return {
    id,
    title,
    posterPath,
    releaseDate: "",
    voteAverage: 0,
    popularity,
    raw: { id, title },
  };
}

describe("processResults", () => {
  test("drops items without a poster and boosts prefix matches", () => {
    const out = processResults(
      [item(1, "Man of Steel", "/y.jpg", 90), item(2, "Iron Man", "/x.jpg", 10), item(3, "NoPoster", null, 500)],
      "search",
      "Iron"
    );
    expect(out.map((i) => i.title)).toEqual(["Iron Man", "Man of Steel"]);
  });

  test("prefix match is case-insensitive, popularity orders each group", () => {
    const out = processResults(
      [
        item(1, "The Iron Giant", "/a", 50),
        item(2, "iron sky", "/b", 5),
        item(3, "Iron Man 2", "/c", 40),
        item(4, "Steel", "/d", 80),
      ],
      "search",
      "IRON"
    );
    expect(out.map((i) => i.id)).toEqual([3, 2, 4, 1]);
  });

  test("ties keep upstream order", () => {
    const out = processResults(
      [item(1, "Alien", "/a", 10), item(2, "Aliens", "/b", 10), item(3, "Alien 3", "/c", 10)],
      "search",
      "alien"
    );
    expect(out.map((i) => i.id)).toEqual([1, 2, 3]);
  });

  test("discover keeps upstream order", () => {
    const out = processResults(
      [item(1, "B", "/b", 1), item(2, "A", "", 99), item(3, "C", "/c", 50)],
      "discover",
      "C"
    );
    expect(out.map((i) => i.id)).toEqual([1, 3]);
  });

  test("search with an empty query only filters", () => {
    const out = processResults([item(1, "B", "/b", 1), item(2, "A", "/a", 99)], "search", "  ");
    expect(out.map((i) => i.id)).toEqual([1, 2]);
  });

  test("does not mutate the input", () => {
    const input = [item(1, "Zed", "/z", 1), item(2, "Zeta", "/a", 99)];
    processResults(input, "search", "zeta");
    expect(input.map((i) => i.id)).toEqual([1, 2]);
  });
});
