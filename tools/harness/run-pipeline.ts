
/*
  Pipeline harness
  - Ingests captured review pages from a directory, then runs weekly analytics
  - Very verbose console logging for inspection
  Usage:
    npx tsx tools/harness/run-pipeline.ts --pages data/pages --entities B000111,B000222
    npx tsx tools/harness/run-pipeline.ts --pages data/pages --outcomes data/sales.csv --out out/run1
*/

import { promises as fs } from "fs";
import path from "path";
import { createDirectoryReviewSource } from "../../src/adapters/directory-source.adapter";
import { loadConfig } from "../../src/config/config";
import { createLogger } from "../../src/config/logger";
import { runAnalytics } from "../../src/workflows/analytics/orchestrator";
import { runIngest } from "../../src/workflows/ingest/orchestrator";

interface Args {
  pages?: string;
  entities?: string[];
  outcomes?: string;
  out?: string;
}

function parseArgs(): Args {
  const out: Args = {};
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--pages") out.pages = argv[++i];
    else if (a === "--entities") out.entities = (argv[++i] || "").split(",").map((s) => s.trim()).filter(Boolean);
    else if (a === "--outcomes") out.outcomes = argv[++i];
    else if (a === "--out") out.out = argv[++i];
  }
  return out;
}

async function listEntityDirs(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
}

async function run() {
  const args = parseArgs();
  const cfg = loadConfig();
  // Default to verbose logging for harness runs unless the env says otherwise
  const logger = createLogger(process.env.LOG_LEVEL ? cfg.logLevel : "debug", { logDir: cfg.logDir });

  const pagesDir = path.resolve(args.pages || "data/pages");
  const entities = args.entities && args.entities.length > 0 ? args.entities : await listEntityDirs(pagesDir);
  console.log(`[harness] pages dir: ${pagesDir}; entities: ${entities.length}`);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("[harness] interrupt: stopping after the current page");
    controller.abort();
  });

  const ingest = await runIngest(entities, {
    source: createDirectoryReviewSource(pagesDir),
    tablePath: path.resolve(cfg.storage.reviewsTablePath),
    checkpointDir: path.resolve(cfg.storage.checkpointDir),
    settings: cfg.ingest,
    logger,
    signal: controller.signal,
  });
  for (const o of ingest.outcomes) {
    console.log(`[harness] ${o.entityId}: ${o.state} (${o.reason}) pages=${o.pages} fetched=${o.fetched} added=${o.added}`);
  }
  if (ingest.aborted) {
    console.log("[harness] interrupted; rerun to resume from the checkpoint");
    return;
  }

  const analytics = await runAnalytics({
    tablePath: path.resolve(cfg.storage.reviewsTablePath),
    outDir: path.resolve(args.out || cfg.storage.outputDir),
    outcomesPath: args.outcomes ? path.resolve(args.outcomes) : undefined,
    settings: cfg.analytics,
    logger,
  });
  console.log(`[harness] done. reviews=${analytics.reviews} weeks=${analytics.weekly.length} files=${analytics.written.length}`);
}

run().catch((e) => {
  console.error("[harness] fatal:", e);
  process.exitCode = 1;
});
