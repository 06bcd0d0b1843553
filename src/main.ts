/**
 * CLI entrypoint: runs one search configured from the environment
 *
 * Usage:
 *   SEARCH_TERM="data engineer" SEARCH_SITES=gupy npm start
 *   OUTPUT_FORMAT=csv OUTPUT_PATH=out/jobs.csv npm start
 *
 * Environment variables (see .env.example):
 *   - SEARCH_TERM, SEARCH_LOCATION, SEARCH_SITES, RESULTS_WANTED, HOURS_OLD
 *   - SEARCH_COUNTRY, FETCH_DESCRIPTION, DESCRIPTION_FORMAT, VERBOSE
 *   - PROXIES, CA_CERT_PATH, SEARCH_DEADLINE_MS
 *   - OUTPUT_FORMAT: json (default) or csv
 *   - OUTPUT_PATH: file to write (stdout when unset)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *
 * Exit codes: 0 when at least one source succeeded, 1 on invalid input,
 * when every source failed, or on any other fatal error.
 */

import "dotenv/config";
import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { readOutputConfig, readSearchInputFromEnv } from "./config";
import { searchJobs } from "./orchestration";
import { serializeSearchResult, toCsv } from "./export";
import { AllSourcesFailedError, InvalidSpecError } from "./errors";
import * as logger from "./logger";

async function main(): Promise<void> {
  const output = readOutputConfig();
  const run = await searchJobs(readSearchInputFromEnv());

  if (run.status === "partially_failed") {
    logger.warn("Some sources failed", {
      failures: run.failures.map((f) => `${f.site}: ${f.kind}`),
    });
  }

  const body =
    output.format === "csv"
      ? toCsv(run.result)
      : JSON.stringify(serializeSearchResult(run), null, 2) + "\n";

  if (output.path) {
    mkdirSync(dirname(output.path), { recursive: true });
    writeFileSync(output.path, body, "utf-8");
    logger.info("Results written", {
      path: output.path,
      format: output.format,
      records: run.result.records.length,
    });
  } else {
    process.stdout.write(body);
  }
}

main().catch((error: unknown) => {
  if (error instanceof InvalidSpecError) {
    logger.error("Invalid search input", { field: error.field, error: error.message });
  } else if (error instanceof AllSourcesFailedError) {
    logger.error("All sources failed", { failures: error.failures });
  } else {
    logger.error("Fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  process.exitCode = 1;
});
