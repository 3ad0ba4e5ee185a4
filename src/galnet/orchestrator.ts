import { CrawlConfig, PageExtraction, PersistOutcome, RunSummary } from "../types";
import { RunAbortedError, fileError, networkError } from "../errors";
import { BlobStore } from "../core/blob-store";
import { PageFetcher } from "../core/fetcher";
import { formatDuration, getErrorMessage } from "../core/utils";
import { crawlPaths } from "../config";
import { crawlPage, extractIndexLinks } from "./page-crawler";
import { PagePersistResult, persistPage } from "./article-persister";
import { loadCrawlState, reconcileCrawlState, saveCrawlState } from "./crawl-state";
import { GalnetMatchers, loadDocument } from "./matchers";

export interface RunDeps {
  config: CrawlConfig;
  fetcher: PageFetcher;
  store: BlobStore;
  matchers: GalnetMatchers;
  now?: () => Date;
}

function countOutcomes(results: PagePersistResult[], outcome: PersistOutcome): number {
  return results.reduce(
    (sum, r) => sum + r.outcomes.filter((o) => o === outcome).length,
    0
  );
}

/**
 * Run one incremental crawl of the GalNet index.
 *
 * Every dated page linked from the site root that is not yet in
 * successful-pages.json is crawled and its articles persisted. Page failures
 * never stop the run; they land in failed-pages.json and the page is tried
 * again next time.
 *
 * @throws RunAbortedError when the root page cannot be fetched or the
 *   bookkeeping files cannot be read or written
 */
export async function extractAllPages(deps: RunDeps): Promise<RunSummary> {
  const { config, fetcher, store, matchers } = deps;
  const now = deps.now ?? (() => new Date());
  const paths = crawlPaths(config.outputDir);
  const startTime = Date.now();
  // one suffix for every archive written by this run
  const archivedAt = now();

  // ── Step 1: Discover links ────────────────────────────────────────
  console.log(`Step 1: Fetching index ${config.siteUrl}...`);
  let rootHtml: string;
  try {
    rootHtml = await fetcher.fetchText(config.siteUrl);
  } catch (err) {
    throw new RunAbortedError(networkError(config.siteUrl, getErrorMessage(err)));
  }
  const links = extractIndexLinks(loadDocument(rootHtml), config.siteUrl, matchers);
  console.log(`   Found ${links.length} index links`);

  const previous = loadCrawlState(store, paths);
  console.log(`   Downloaded pages before starting: ${previous.downloadedPages.size}`);

  const toCrawl = links.filter((url) => !previous.downloadedPages.has(url)).sort();
  console.log(`   Pages to crawl: ${toCrawl.length}\n`);

  // ── Step 2: Crawl and persist ─────────────────────────────────────
  try {
    store.ensureDir(paths.articlesDir);
  } catch (err) {
    throw new RunAbortedError(fileError(paths.articlesDir, getErrorMessage(err)));
  }

  const mode = config.sequential ? "sequentially" : "concurrently";
  console.log(`Step 2: Crawling ${toCrawl.length} pages ${mode}...`);

  let completed = 0;
  const processPage = async (url: string): Promise<PagePersistResult> => {
    const extraction = await crawlPage(url, {
      fetcher,
      matchers,
      siteUrl: config.siteUrl,
      now,
    });
    const result = persistPage(extraction, {
      store,
      matchers,
      articlesDir: paths.articlesDir,
      archivedAt,
    });
    completed++;
    const { errors } = result.extraction;
    const line =
      errors.length === 0
        ? `+ ${url}`
        : `x ${url} (${errors.length} error${errors.length === 1 ? "" : "s"})`;
    console.log(`   [${completed}/${toCrawl.length}]  ${line}`);
    return result;
  };

  let results: PagePersistResult[];
  if (config.sequential) {
    results = [];
    for (const url of toCrawl) {
      results.push(await processPage(url));
    }
  } else {
    results = await Promise.all(toCrawl.map(processPage));
  }

  // ── Step 3: Reconcile bookkeeping ─────────────────────────────────
  console.log("\nStep 3: Updating bookkeeping...");
  const extractions: PageExtraction[] = results.map((r) => r.extraction);
  const next = reconcileCrawlState(previous, extractions, links);
  saveCrawlState(store, paths, next);
  console.log(`   ${paths.downloadedPagesFile} (${next.downloadedPages.size} pages)`);
  console.log(`   ${paths.failedPagesFile} (${next.failedPages.size} pages)`);

  const known = new Set(links);
  const undiscovered = new Set<string>();
  for (const extraction of extractions) {
    for (const link of extraction.links) {
      if (!known.has(link)) undiscovered.add(link);
    }
  }
  if (undiscovered.size > 0) {
    console.warn(
      `   Warning: ${undiscovered.size} index links found on pages but not on the root`
    );
  }

  const succeeded = extractions.filter((e) => e.errors.length === 0).length;
  return {
    site_url: config.siteUrl,
    total_links: links.length,
    already_downloaded: links.length - toCrawl.length,
    total_crawled: toCrawl.length,
    total_success: succeeded,
    total_failed: toCrawl.length - succeeded,
    articles_created: countOutcomes(results, "created"),
    articles_archived: countOutcomes(results, "archived"),
    articles_unchanged: countOutcomes(results, "unchanged"),
    articles_failed: countOutcomes(results, "failed"),
    undiscovered_links: Array.from(undiscovered).sort(),
    elapsed_time: formatDuration(Date.now() - startTime),
    finished_at: now().toISOString(),
  };
}
