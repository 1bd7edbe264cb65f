#!/usr/bin/env npx tsx
/**
 * correct-page.ts — Run the correction loop on one HTML file.
 *
 * Usage:
 *   npx tsx scripts/correct-page.ts <page.html> [--out <fixed.html>] [--max-iter <n>] [--trace <dir>]
 *
 * Output (stdout):
 *   Outcome JSON — stop reason, iterations, final overlaps, corrections.
 *
 * Exit codes:
 *   0 — converged
 *   1 — stopped with overlaps left (budget spent or rewrite failed)
 *   2 — usage error, missing services, or render/detection failure
 */

import "dotenv/config";
import * as fs from "node:fs";
import * as path from "node:path";
import {
  loadConfig,
  createLogger,
  createServiceContext,
  correctSinglePage,
} from "../src/index.js";
import { writeFile } from "../src/utils/fs-helpers.js";

// ── Parse args ──
const args = process.argv.slice(2);
const positional: string[] = [];
let outPath: string | undefined;
let maxIter: number | undefined;
let traceDir: string | undefined;

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  const next = args[i + 1];
  if (arg === "--out" && next) {
    outPath = next;
    i++;
  } else if (arg === "--max-iter" && next) {
    maxIter = parseInt(next, 10);
    i++;
  } else if (arg === "--trace" && next) {
    traceDir = next;
    i++;
  } else if (arg !== undefined) {
    positional.push(arg);
  }
}

const htmlPath = positional[0];
if (!htmlPath) {
  const prog = process.argv[1];
  console.error(`Usage: ${prog} <page.html> [--out <fixed.html>] [--max-iter <n>] [--trace <dir>]`);
  console.error("Exit 0 = converged, exit 1 = overlaps left, exit 2 = error.");
  process.exit(2);
}
if (!fs.existsSync(htmlPath)) {
  console.error(`Error: HTML file not found: ${htmlPath}`);
  process.exit(2);
}

// ── Run ──
async function main(file: string) {
  const config = loadConfig({
    ...process.env,
    ...(traceDir ? { TRACE_DIR: traceDir } : {}),
  });
  const logger = createLogger(config.LOG_LEVEL);
  const ctx = createServiceContext(config, logger);

  const markup = fs.readFileSync(path.resolve(file), "utf-8");
  const pageId = path.basename(file, path.extname(file)).replace(/[^A-Za-z0-9_-]/g, "_");
  const result = await correctSinglePage(ctx, {
    markup,
    page_id: pageId,
    ...(maxIter !== undefined ? { options: { max_iterations: maxIter } } : {}),
  });

  if (!result.ok) {
    console.error(`Error: ${result.error.kind}: ${result.error.detail}`);
    process.exit(2);
  }

  const outcome = result.value;
  if (outPath) await writeFile(path.resolve(outPath), outcome.markup);

  console.log(
    JSON.stringify(
      {
        page_id: outcome.pageId,
        stop_reason: outcome.stopReason,
        iterations_applied: outcome.iterationsApplied,
        final_overlaps: outcome.finalOverlaps,
        corrections: outcome.corrections,
        error: outcome.error?.detail,
      },
      null,
      2
    )
  );
  process.exit(outcome.stopReason === "converged" ? 0 : 1);
}

main(htmlPath).catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(2);
});
