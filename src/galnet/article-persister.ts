import * as path from "path";
import { Article, PageExtraction, PersistOutcome } from "../types";
import { GalnetError, fileError } from "../errors";
import { BlobStore } from "../core/blob-store";
import { getErrorMessage, toFileTimestamp } from "../core/utils";
import { ArticleRecord, formatIssues } from "../schemas";
import { GalnetMatchers, reformatDate } from "./matchers";

export interface PersisterDeps {
  store: BlobStore;
  matchers: GalnetMatchers;
  articlesDir: string;
  /** Run timestamp used to suffix archived records. */
  archivedAt: Date;
}

export interface PersistResult {
  outcome: PersistOutcome;
  errors: GalnetError[];
}

export interface PagePersistResult {
  extraction: PageExtraction;
  outcomes: PersistOutcome[];
}

/** Content equality: extraction date and the deprecated flag do not count. */
export function articlesEqual(a: Article, b: Article): boolean {
  return (
    a.uid === b.uid &&
    a.title === b.title &&
    a.content === b.content &&
    a.url === b.url &&
    a.pageIndex === b.pageIndex
  );
}

function baseName(article: Article, matchers: GalnetMatchers): string {
  return `${reformatDate(article.date, matchers)} - ${article.pageIndex} - ${article.uid}`;
}

/** "<dir>/3301 SEP 07 - 0 - <uid>.json" */
export function articleFilename(
  article: Article,
  articlesDir: string,
  matchers: GalnetMatchers
): string {
  return path.join(articlesDir, `${baseName(article, matchers)}.json`);
}

/**
 * "<dir>/3301 SEP 07 - 0 - <uid> - 2026-10-19T08-30-00Z.json"
 *
 * The run timestamp is appended to the live name before the extension, so
 * archives stay .json files and sort next to their live record.
 */
export function archiveFilename(
  article: Article,
  articlesDir: string,
  matchers: GalnetMatchers,
  at: Date
): string {
  return path.join(
    articlesDir,
    `${baseName(article, matchers)} - ${toFileTimestamp(at)}.json`
  );
}

type StoredRead =
  | { success: true; article: Article | null }
  | { success: false; error: GalnetError };

function readStored(store: BlobStore, filename: string): StoredRead {
  let raw: unknown;
  try {
    raw = store.read(filename);
  } catch (err) {
    return { success: false, error: fileError(filename, getErrorMessage(err)) };
  }
  if (raw === null) return { success: true, article: null };

  const parsed = ArticleRecord.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: fileError(filename, `Invalid article record: ${formatIssues(parsed.error)}`),
    };
  }
  return { success: true, article: parsed.data };
}

function tryWrite(store: BlobStore, filename: string, value: Article): GalnetError | null {
  try {
    store.write(filename, value);
    return null;
  } catch (err) {
    return fileError(filename, getErrorMessage(err));
  }
}

/**
 * Write an article unless an identical record already exists.
 * A changed article first has the previous record archived, flagged deprecated.
 */
export function persistArticle(article: Article, deps: PersisterDeps): PersistResult {
  const filename = articleFilename(article, deps.articlesDir, deps.matchers);
  const stored = readStored(deps.store, filename);
  if (!stored.success) {
    return { outcome: "failed", errors: [stored.error] };
  }

  const errors: GalnetError[] = [];
  let outcome: PersistOutcome = "created";

  if (stored.article !== null) {
    if (articlesEqual(stored.article, article)) {
      return { outcome: "unchanged", errors };
    }
    const backup = archiveFilename(article, deps.articlesDir, deps.matchers, deps.archivedAt);
    const archiveError = tryWrite(deps.store, backup, {
      ...stored.article,
      deprecated: true,
    });
    if (archiveError) errors.push(archiveError);
    outcome = "archived";
  }

  const writeError = tryWrite(deps.store, filename, article);
  if (writeError) {
    errors.push(writeError);
    outcome = "failed";
  }

  return { outcome, errors };
}

/**
 * Persist every article of a crawled page.
 * File errors are appended to the page's own error list.
 */
export function persistPage(
  extraction: PageExtraction,
  deps: PersisterDeps
): PagePersistResult {
  const errors = [...extraction.errors];
  const outcomes: PersistOutcome[] = [];

  for (const article of extraction.articles) {
    const result = persistArticle(article, deps);
    outcomes.push(result.outcome);
    errors.push(...result.errors);
  }

  return { extraction: { ...extraction, errors }, outcomes };
}
