import { NextResponse } from "next/server";
import { describeError } from "@/lib/errors";
import { getFlashcardService } from "@/lib/service";

export const dynamic = "force-dynamic";

export async function GET(): Promise<NextResponse> {
  try {
    return NextResponse.json(getFlashcardService().currentCards());
  } catch (error) {
    return NextResponse.json({ error: describeError(error) }, { status: 500 });
  }
}
