/**
 * Command-line entry point for the album pipeline.
 *
 *   npm run album -- <youtube_url> <json|hash>
 */

import "dotenv/config";
import { analyzeAlbum, AlbumPipelineError } from "./app/lib/album";
import { getMissingConfig } from "./app/lib/config";
import { logAlbumRun } from "./app/lib/logging/album";

function usage(): void {
  console.log("Usage: npm run album -- <youtube_url> <output_type>");
  console.log("  output_type: 'json' or 'hash'");
}

async function main(argv: string[]): Promise<number> {
  if (argv.length !== 2) {
    usage();
    return 1;
  }

  const [url, rawOutput] = argv;
  const output = rawOutput.toLowerCase();
  if (output !== "json" && output !== "hash") {
    console.error("Error: output_type must be 'json' or 'hash'");
    return 1;
  }

  const missing = getMissingConfig();
  if (missing.length > 0) {
    console.error("Error: Missing API keys in .env file");
    console.error(`Required: ${missing.join(", ")}`);
    return 1;
  }

  console.log("=".repeat(60));
  console.log("Starting album fingerprint run");
  console.log("=".repeat(60));

  try {
    const result = await analyzeAlbum(url);
    await logAlbumRun({ reference: url, result });

    if (output === "json") {
      process.stdout.write(JSON.stringify(result.report, null, 2) + "\n");
    } else {
      process.stdout.write(result.fingerprint + "\n");
    }
    return 0;
  } catch (error) {
    if (error instanceof AlbumPipelineError) {
      console.error(`\nError in ${error.stage} stage: ${error.message}`);
    } else {
      console.error("\nError in workflow:", error);
    }
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
