import { z } from "zod";
import { CrawlPaths, CrawlState, ErroredPage, PageExtraction } from "../types";
import { describeError, fileError, RunAbortedError } from "../errors";
import { BlobStore } from "../core/blob-store";
import { getErrorMessage } from "../core/utils";
import { DownloadedPagesFile, FailedPagesFile, formatIssues } from "../schemas";

function readValidated<T>(
  store: BlobStore,
  filePath: string,
  schema: z.ZodType<T>
): T | null {
  let raw: unknown;
  try {
    raw = store.read(filePath);
  } catch (err) {
    throw new RunAbortedError(fileError(filePath, getErrorMessage(err)));
  }
  if (raw === null) return null;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RunAbortedError(fileError(filePath, formatIssues(parsed.error)));
  }
  return parsed.data;
}

/**
 * Load both bookkeeping files. Missing files mean a first run.
 * A URL listed in both files (a run stopped between the two writes) counts
 * as downloaded only.
 * @throws RunAbortedError when a file exists but cannot be read or is malformed
 */
export function loadCrawlState(store: BlobStore, paths: CrawlPaths): CrawlState {
  const downloaded = readValidated(store, paths.downloadedPagesFile, DownloadedPagesFile);
  const failed = readValidated(store, paths.failedPagesFile, FailedPagesFile);

  const downloadedPages = new Set(downloaded ?? []);
  const failedPages = new Map(
    (failed ?? [])
      .filter((page) => !downloadedPages.has(page.url))
      .map((page) => [page.url, page])
  );
  return { downloadedPages, failedPages };
}

/**
 * Fold a run's page results into the previous state.
 *
 * Clean pages become downloaded; pages with any error are (re)recorded as
 * failed. Failed entries the root no longer lists, and that were not crawled
 * this run, are dropped, as is any entry for a downloaded page.
 */
export function reconcileCrawlState(
  previous: CrawlState,
  extractions: PageExtraction[],
  listedLinks: Iterable<string>
): CrawlState {
  const downloadedPages = new Set(previous.downloadedPages);
  const failedPages = new Map(previous.failedPages);
  const current = new Set(listedLinks);

  for (const { url, errors } of extractions) {
    current.add(url);
    if (errors.length === 0) {
      failedPages.delete(url);
      downloadedPages.add(url);
    } else {
      const page: ErroredPage = { url, errors: errors.map(describeError) };
      failedPages.set(url, page);
    }
  }

  for (const url of Array.from(failedPages.keys())) {
    if (downloadedPages.has(url) || !current.has(url)) failedPages.delete(url);
  }

  return { downloadedPages, failedPages };
}

function byUrl(a: ErroredPage, b: ErroredPage): number {
  if (a.url < b.url) return -1;
  if (a.url > b.url) return 1;
  return 0;
}

function writeOrAbort(store: BlobStore, filePath: string, value: unknown): void {
  try {
    store.write(filePath, value);
  } catch (err) {
    throw new RunAbortedError(fileError(filePath, getErrorMessage(err)));
  }
}

/**
 * Write both bookkeeping files, sorted so that runs diff cleanly.
 * @throws RunAbortedError when a file cannot be written
 */
export function saveCrawlState(
  store: BlobStore,
  paths: CrawlPaths,
  state: CrawlState
): void {
  writeOrAbort(store, paths.downloadedPagesFile, Array.from(state.downloadedPages).sort());
  writeOrAbort(
    store,
    paths.failedPagesFile,
    Array.from(state.failedPages.values()).sort(byUrl)
  );
}
