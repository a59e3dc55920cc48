import { NextResponse } from "next/server";
import { InvalidFilterError, errorMessage } from "@/lib/errors";
import { parseContentType } from "@/lib/filters";
import type { ContentType } from "@/lib/types";

export type TitleParams = { kind: string; id: string };
export type TitleContext = { params: Promise<TitleParams> };

export function parseTitle(p: TitleParams): { contentType: ContentType; id: number } {
  const contentType = parseContentType(p.kind);
  const id = Number(p.id);
  if (!Number.isInteger(id) || id < 1) {
    throw new InvalidFilterError("id", `Invalid title id: ${p.id}`);
  }
  return { contentType, id };
}

export function errorResponse(err: unknown, tag: string): NextResponse {
  if (err instanceof InvalidFilterError) {
    return NextResponse.json({ error: err.message, field: err.field }, { status: 400 });
  }
  console.error(`[${tag}]`, err);
  return NextResponse.json({ error: errorMessage(err) || "Failed" }, { status: 500 });
}
