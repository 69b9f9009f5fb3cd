#!/usr/bin/env node

import { createRequire } from "node:module";
import { parseArgs } from "./args.js";
import { BatchConverter, DEFAULT_MIME_TYPES, DEFAULT_QUALITY } from "./converter.js";
import { InputNotFoundError, UsageError, errorMessage } from "./errors.js";
import { describeOutcome, renderSummary } from "./report.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
recode-images v${VERSION} — Batch-convert images to WebP or AVIF

Usage:
  recode-images [path]                 Convert every image under path (default: .)
  recode-images <path> -o <outputDir>  Write converted files under outputDir, mirroring subdirectories
  recode-images <path> --delete        Delete originals after a successful conversion

Options:
  -o, --output <dir>         Output directory (default: .)
  -q, --quality <n>          Encoder quality 1-100 (default: ${DEFAULT_QUALITY})
  -f, --format <name>        Output format: webp, avif (default: webp)
  -m, --mime-types <t...>    Formats to convert (default: ${DEFAULT_MIME_TYPES.join(" ")})
  -s, --skip-types <t...>    Formats to leave alone (default: the output format)
  -j, --jobs <n>             Files converted at once (default: available CPUs)
      --delete               Delete originals after conversion
  -h, --help                 Show this help message
  -v, --version              Show version number

Formats are detected from file content; types may be given as jpeg, png or image/png.
Exits with status 1 when any file fails to convert.
`.trim();

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  const converter = new BatchConverter({
    quality: parsed.quality,
    format: parsed.format,
    allowedFormats: parsed.mimeTypes,
    skipFormats: parsed.skipTypes,
    deleteOriginal: parsed.deleteOriginal,
    concurrency: parsed.jobs,
    progress: process.stdout.isTTY === true,
  });

  console.log(`Scanning ${parsed.input} with ${converter.config.concurrency} parallel jobs...`);
  const { outcomes, report } = await converter.run(parsed.input, parsed.output);

  if (outcomes.length === 0) {
    console.log("No eligible image files found to convert.");
  }

  for (const outcome of outcomes) {
    console.log(describeOutcome(outcome));
  }

  console.log("");
  renderSummary(report).forEach((line) => console.log(line));

  if (report.errors > 0) {
    process.exit(1);
  }
}

main().catch((err) => {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    console.error("Run recode-images --help for usage");
  } else if (err instanceof InputNotFoundError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Error:", errorMessage(err));
  }
  process.exit(1);
});
