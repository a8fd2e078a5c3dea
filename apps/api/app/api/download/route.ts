import { NextResponse } from "next/server";
import { describeError } from "@/lib/errors";
import { DOWNLOAD_FILE_NAME } from "@/lib/requests";
import { getFlashcardService } from "@/lib/service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(): Promise<Response> {
  try {
    const bytes = await getFlashcardService().readPackage();
    if (!bytes) {
      return NextResponse.json({ error: "No deck has been generated yet" }, { status: 404 });
    }
    return new Response(new Uint8Array(bytes), {
      headers: {
        "content-type": "application/octet-stream",
        "content-disposition": `attachment; filename="${DOWNLOAD_FILE_NAME}"`
      }
    });
  } catch (error) {
    console.error("[download] failed", error);
    return NextResponse.json({ error: describeError(error) }, { status: 500 });
  }
}
