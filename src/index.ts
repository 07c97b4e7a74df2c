#!/usr/bin/env node
import * as path from "path";
import { CrawlSummary } from "./types";
import { CliArgs, parseArgs } from "./cli-args";
import { loadSources } from "./config-loader";
import { resolveSettings } from "./settings";
import { createHttpFetcher } from "./fetcher";
import { crawlSources } from "./source-crawler";
import { exportRecords, exportSummary } from "./exporter";
import { updateGolden } from "./golden";
import { ConfigurationError } from "./core/errors";
import { createHttpClient, formatDuration } from "./core/utils";

async function runCrawl(args: CliArgs): Promise<void> {
  if (!args.configPath) {
    throw new ConfigurationError("No config file provided. Use --config=<sources.yml>.");
  }

  // ── Step 1: Load and validate everything before any fetch ─────────
  console.log(`Step 1: Loading sources from ${args.configPath}...`);
  const sources = loadSources(args.configPath);
  const settings = resolveSettings(args.overrides);
  const enabled = sources.filter((s) => s.enabled);
  console.log(`   Found ${sources.length} sources (${enabled.length} enabled)`);

  if (enabled.length === 0) {
    console.log("Nothing to crawl. Exiting.");
    return;
  }

  // ── Step 2: Crawl ─────────────────────────────────────────────────
  console.log(
    `\nStep 2: Crawling (concurrency: ${settings.concurrency}, max runtime: ${settings.maxRuntimeSeconds}s` +
      (settings.maxItems > 0 ? `, max items per source: ${settings.maxItems})...` : ")...")
  );
  const fetcher = createHttpFetcher(createHttpClient(settings.requestTimeoutMs));
  let count = 0;
  const result = await crawlSources(sources, {
    fetcher,
    settings,
    onRecord: (record) => {
      count++;
      console.log(`   [${count}]  + ${record.source}: ${record.business_name || record.website || record.phone || record.email}`);
    },
  });

  // ── Step 3: Export ────────────────────────────────────────────────
  console.log("\nStep 3: Exporting...");
  const outputFiles: string[] = [];
  const csvPath = exportRecords(result.records, args.outputDir);
  outputFiles.push(csvPath);
  console.log(`   ${csvPath} (${result.records.length} rows)`);

  const summary: CrawlSummary = {
    config_file: path.resolve(args.configPath),
    sources_configured: sources.length,
    sources_crawled: result.reports.length,
    total_records: result.records.length,
    sources: result.reports,
    settings,
    elapsed_time: formatDuration(result.elapsedMs),
    output_files: outputFiles,
    crawled_at: new Date().toISOString(),
  };
  const summaryPath = exportSummary(summary, args.outputDir);
  console.log(`   ${summaryPath}`);

  // ── Done ──────────────────────────────────────────────────────────
  const failed = result.reports.filter((r) => r.stop_reason === "source_error");
  console.log(`\nDone in ${formatDuration(result.elapsedMs)}`);
  console.log(`   Records: ${result.records.length}`);
  console.log(`   Sources: ${result.reports.length - failed.length}/${result.reports.length} reachable`);
  for (const f of failed) {
    console.log(`     x ${f.source}: ${f.error}`);
  }
  console.log(`   Output:  ${args.outputDir}/`);
}

function runGolden(args: CliArgs): void {
  const update = updateGolden(args.outputDir);
  console.log(
    `Golden updated: ${update.before} -> ${update.after} rows (added ${Math.max(0, update.after - update.before)}). File: ${update.goldenPath}`
  );
  if (update.appended) {
    console.log(`Appended ${update.appended} golden rows across run CSVs`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  console.log(`Directory Contact Crawler v1.0  [Command: ${args.command}]\n`);

  if (args.command === "golden") {
    runGolden(args);
    return;
  }
  await runCrawl(args);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`\n   Error: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
