import type { VideoRecord } from "@/lib/types";

type Tier = (v: VideoRecord) => boolean;

const TIERS: readonly Tier[] = [
  (v) => v.site === "YouTube" && v.type === "Trailer" && v.name.toLowerCase().includes("official"),
  (v) => v.site === "YouTube" && v.type === "Trailer",
  (v) => v.site === "YouTube" && v.type === "Teaser",
];

/**
 * Best trailer for a title: official YouTube trailer, then any YouTube
 * trailer, then a YouTube teaser. First match in list order wins within a
 * tier. null means no trailer, not a failure.
 */
export function selectTrailer(videos: readonly VideoRecord[]): VideoRecord | null {
  for (const tier of TIERS) {
    const hit = videos.find(tier);
    if (hit) return hit;
  }
  return null;
}

export function youtubeUrl(key: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(key)}`;
}
