import { NextRequest, NextResponse } from "next/server";
import { getCatalog, getConfig } from "@/lib/server/catalog";
import { parseFilterState } from "@/lib/filters";
import { cardFromItem } from "@/lib/adapters/tmdb";
import { errorResponse } from "@/lib/server/http";
import type { Card, Paginated } from "@/lib/types";

export const runtime = "nodejs";

export async function GET(req: NextRequest) {
  try {
    const { searchParams } = new URL(req.url);
    const filters = parseFilterState(searchParams, getConfig().policy);
    const data = await getCatalog().browse(filters);

    return NextResponse.json(
      {
        page: data.page,
        total_pages: data.totalPages,
        results: data.items.map(cardFromItem),
      } satisfies Paginated<Card>,
      {
        headers: {
          "Cache-Control": filters.query
            ? "no-store"
            : "public, s-maxage=60, stale-while-revalidate=600",
        },
      }
    );
  } catch (e: unknown) {
    return errorResponse(e, "browse");
  }
}
