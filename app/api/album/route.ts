import { NextResponse } from "next/server";
import { analyzeAlbum } from "@/lib/album";
import { AlbumPipelineError } from "@/lib/album/errors";
import type { OutputType } from "@/lib/album/types";
import { getMissingConfig } from "@/lib/config";
import { logAlbumRun } from "@/lib/logging/album";

const OUTPUT_TYPES: readonly OutputType[] = ["json", "hash", "both"];

function parseOutputType(value: string | null): OutputType | null {
  const normalized = (value ?? "json").toLowerCase();
  return OUTPUT_TYPES.find((t) => t === normalized) ?? null;
}

export async function GET(req: Request) {
  const { searchParams } = new URL(req.url);
  const url = searchParams.get("url");
  const output = parseOutputType(searchParams.get("output"));

  if (!url) {
    return NextResponse.json(
      { error: "Missing query parameter 'url'" },
      { status: 400 },
    );
  }
  if (!output) {
    return NextResponse.json(
      { error: "Query parameter 'output' must be 'json', 'hash' or 'both'" },
      { status: 400 },
    );
  }

  const missing = getMissingConfig();
  if (missing.length > 0) {
    return NextResponse.json(
      { error: `Missing configuration: ${missing.join(", ")}` },
      { status: 503 },
    );
  }

  try {
    const result = await analyzeAlbum(url);
    await logAlbumRun({ reference: url, result });

    if (output === "hash") {
      return NextResponse.json({ fingerprint: result.fingerprint });
    }
    if (output === "both") {
      return NextResponse.json(result);
    }
    return NextResponse.json(result.report);
  } catch (error) {
    if (error instanceof AlbumPipelineError) {
      console.error(`[ALBUM] ${error.stage} failed:`, error.message);
      return NextResponse.json(
        { error: error.message, stage: error.stage },
        { status: 502 },
      );
    }

    console.error("Album error:", error);
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 },
    );
  }
}
