import { NextRequest, NextResponse } from "next/server";
import { getCatalog } from "@/lib/server/catalog";
import { parseContentType } from "@/lib/filters";
import { errorResponse } from "@/lib/server/http";

export const runtime = "nodejs";

export async function GET(req: NextRequest) {
  try {
    const { searchParams } = new URL(req.url);
    const contentType = parseContentType((searchParams.get("type") || "movie").trim());
    const genres = await getCatalog().genres(contentType);
    return NextResponse.json(genres, {
      headers: { "Cache-Control": "public, s-maxage=86400" }, // 24h
    });
  } catch (e: unknown) {
    return errorResponse(e, "genres");
  }
}
