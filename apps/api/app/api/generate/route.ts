import { NextRequest, NextResponse } from "next/server";
import { describeError } from "@/lib/errors";
import { parseGenerateRequest } from "@/lib/requests";
import { getFlashcardService } from "@/lib/service";
import { NDJSON_CONTENT_TYPE, streamBatchEvents } from "@/lib/stream";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: NextRequest): Promise<Response> {
  const terms = parseGenerateRequest(await request.json().catch(() => undefined));
  if (!terms) {
    return NextResponse.json({ error: "words must contain at least one term" }, { status: 400 });
  }

  try {
    // Closing the connection aborts the batch through request.signal.
    const stream = streamBatchEvents(getFlashcardService(), terms, request.signal);
    return new Response(stream, {
      headers: { "content-type": NDJSON_CONTENT_TYPE, "cache-control": "no-store" }
    });
  } catch (error) {
    console.error("[generate] could not start batch", error);
    return NextResponse.json({ error: describeError(error) }, { status: 500 });
  }
}
