#!/usr/bin/env node
import { parseArgs, resolveConfig } from "./config";
import { createHttpClient } from "./core/utils";
import { createPageFetcher } from "./core/fetcher";
import { JsonFileBlobStore } from "./core/blob-store";
import { createGalnetMatchers } from "./galnet/matchers";
import { extractAllPages } from "./galnet/orchestrator";

async function main(): Promise<void> {
  const config = resolveConfig(parseArgs(process.argv.slice(2)));

  const modeLabel = config.sequential ? "Sequential (-s)" : "Concurrent";
  console.log(`GalNet Archiver v1.0  [Mode: ${modeLabel}]\n`);

  const summary = await extractAllPages({
    config,
    fetcher: createPageFetcher(createHttpClient()),
    store: new JsonFileBlobStore(),
    matchers: createGalnetMatchers(),
  });

  // ── Done ──────────────────────────────────────────────────────────
  console.log(`\nDone in ${summary.elapsed_time}`);
  console.log(`   Links:    ${summary.total_links} (${summary.already_downloaded} already downloaded)`);
  console.log(`   Success:  ${summary.total_success}/${summary.total_crawled}`);
  console.log(`   Errors:   ${summary.total_failed}/${summary.total_crawled}`);
  console.log(
    `   Articles: ${summary.articles_created} new, ${summary.articles_archived} changed, ` +
      `${summary.articles_unchanged} unchanged, ${summary.articles_failed} not saved`
  );
  console.log(`   Output:   ${config.outputDir}/`);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`\n   Error: ${msg}`);
  process.exitCode = 1;
});
