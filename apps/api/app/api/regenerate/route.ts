import { NextRequest, NextResponse } from "next/server";
import { BatchInProgressError, ClassificationError, describeError } from "@/lib/errors";
import { parseRegenerateRequest } from "@/lib/requests";
import { getFlashcardService } from "@/lib/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: NextRequest): Promise<NextResponse> {
  const body = parseRegenerateRequest(await request.json().catch(() => undefined));
  if (!body) {
    return NextResponse.json({ error: "word and a non-negative integer id are required" }, { status: 400 });
  }

  try {
    const card = await getFlashcardService().regenerate(body.word, body.id, request.signal);
    return NextResponse.json(card);
  } catch (error) {
    if (error instanceof BatchInProgressError) {
      return NextResponse.json({ error: error.message }, { status: 409 });
    }
    if (error instanceof ClassificationError) {
      return NextResponse.json({ error: error.message }, { status: 422 });
    }
    console.error("[regenerate] failed", error);
    return NextResponse.json({ error: describeError(error) }, { status: 500 });
  }
}
