import { selectTrailer, youtubeUrl } from "@/lib/discover/trailer";
import type { VideoRecord } from "@/lib/types";

const yt = (type: VideoRecord["type"], name: string, key: string): VideoRecord => ({
  site: "YouTube",
  type,
  name,
  key,
});

describe("selectTrailer", () => {
  test("official trailer beats an earlier teaser", () => {
    const picked = selectTrailer([yt("Teaser", "Teaser", "t1"), yt("Trailer", "Official Trailer", "o1")]);
    expect(picked?.key).toBe("o1");
  });

  test("official trailer beats an earlier plain trailer", () => {
    const picked = selectTrailer([
      yt("Trailer", "Trailer 2", "p1"),
      yt("Trailer", "Final OFFICIAL trailer", "o1"),
    ]);
    expect(picked?.key).toBe("o1");
  });

  test("first plain trailer when none is official", () => {
    const picked = selectTrailer([yt("Trailer", "Teaser #1", "a"), yt("Trailer", "Teaser #2", "b")]);
    expect(picked?.key).toBe("a");
  });

  test("falls back to a teaser", () => {
    const picked = selectTrailer([yt("Other", "Official Clip", "c"), yt("Teaser", "Teaser", "t")]);
    expect(picked?.key).toBe("t");
  });

  test("ignores other sites", () => {
    expect(selectTrailer([{ site: "Vimeo", type: "Trailer", name: "Official", key: "v" }])).toBeNull();
  });

  test("empty list gives null", () => {
    expect(selectTrailer([])).toBeNull();
  });
});

test("youtubeUrl", () => {
  expect(youtubeUrl("abc123")).toBe("https://www.youtube.com/watch?v=abc123");
});
