import * as cheerio from "cheerio";
import { Article, PageExtraction } from "../types";
import { GalnetError, fromMissingField, networkError, parserError } from "../errors";
import { PageFetcher } from "../core/fetcher";
import { getErrorMessage } from "../core/utils";
import { extractArticles } from "./article-extractor";
import { GalnetMatchers, elementAttr, loadDocument, toAbsoluteUrl } from "./matchers";

export interface PageCrawlerDeps {
  fetcher: PageFetcher;
  matchers: GalnetMatchers;
  siteUrl: string;
  now?: () => Date;
}

/**
 * Collect the dated index-page links found in a document, as absolute URLs.
 * Used on the site root and again on every crawled page.
 */
export function extractIndexLinks(
  $: cheerio.CheerioAPI,
  siteUrl: string,
  matchers: GalnetMatchers
): string[] {
  const links = new Set<string>();
  $(matchers.indexLinkSelector).each((_, el) => {
    const href = elementAttr($(el), "href");
    if (href === null) return;
    const url = toAbsoluteUrl(href, siteUrl);
    if (url !== null) links.add(url);
  });
  return Array.from(links);
}

/**
 * Fetch one index page and extract its articles and links.
 * Never throws: every problem is reported in `errors`.
 */
export async function crawlPage(
  url: string,
  deps: PageCrawlerDeps
): Promise<PageExtraction> {
  let html: string;
  try {
    html = await deps.fetcher.fetchText(url);
  } catch (err) {
    return {
      url,
      articles: [],
      links: [],
      errors: [networkError(url, getErrorMessage(err))],
    };
  }

  const $ = loadDocument(html);
  const links = extractIndexLinks($, deps.siteUrl, deps.matchers);

  const byUid = new Map<string, Article>();
  const errors: GalnetError[] = [];
  for (const result of extractArticles($, deps.siteUrl, deps.matchers, deps.now)) {
    if (result.success) {
      byUid.set(result.article.uid, result.article);
    } else {
      errors.push(fromMissingField(result.error));
    }
  }

  // A page without a single article means the markup changed under us.
  if (byUid.size === 0) {
    errors.push(parserError(`No article found on page "${url}"`));
  }

  return { url, articles: Array.from(byUid.values()), links, errors };
}
