import { GalnetError } from "./errors";

/** CLI configuration parsed from command-line arguments */
export interface CrawlConfig {
  /** Root index page; every dated index link is harvested from here. */
  siteUrl: string;
  outputDir: string;
  /** Crawl pages one at a time instead of all at once. */
  sequential: boolean;
}

/** Where a run reads and writes its files */
export interface CrawlPaths {
  downloadedPagesFile: string;
  failedPagesFile: string;
  articlesDir: string;
}

/** One GalNet news item, as stored on disk */
export interface Article {
  uid: string;
  /** Position of the article block on the page it was scraped from. */
  pageIndex: number;
  title: string;
  /** Free-text in-game date, e.g. "07 SEP 3301". */
  date: string;
  url: string;
  content: string;
  extractionDate: string;
  /** True only on archived snapshots. */
  deprecated: boolean;
}

/** Result of crawling a single index page */
export interface PageExtraction {
  url: string;
  /** Unique by uid. */
  articles: Article[];
  links: string[];
  errors: GalnetError[];
}

/** Record for a page that failed during the latest run it was crawled in */
export interface ErroredPage {
  url: string;
  errors: string[];
}

export interface CrawlState {
  downloadedPages: Set<string>;
  failedPages: Map<string, ErroredPage>;
}

export type PersistOutcome = "created" | "unchanged" | "archived" | "failed";

/** Statistics printed after a run completes */
export interface RunSummary {
  site_url: string;
  total_links: number;
  already_downloaded: number;
  total_crawled: number;
  total_success: number;
  total_failed: number;
  articles_created: number;
  articles_archived: number;
  articles_unchanged: number;
  articles_failed: number;
  undiscovered_links: string[];
  elapsed_time: string;
  finished_at: string;
}
