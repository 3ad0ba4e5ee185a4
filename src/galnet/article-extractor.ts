import * as cheerio from "cheerio";
import { Article } from "../types";
import { ArticleField, MissingFieldError } from "../errors";
import { toIsoSeconds } from "../core/utils";
import {
  GalnetMatchers,
  elementAttr,
  elementText,
  extractUid,
  toAbsoluteUrl,
} from "./matchers";

export type ExtractionResult =
  | { success: true; article: Article }
  | { success: false; error: MissingFieldError };

function missing(field: ArticleField, article: string | null): ExtractionResult {
  return { success: false, error: { kind: "missing-field", field, article } };
}

/**
 * Extract every article block of a GalNet index page, in document order.
 *
 * Each block yields either an article or the first required field it lacks
 * (url, uid, title, date, content, checked in that order). A bad block never
 * affects its siblings, and still takes up a page index.
 */
export function extractArticles(
  $: cheerio.CheerioAPI,
  siteUrl: string,
  matchers: GalnetMatchers,
  now: () => Date = () => new Date()
): ExtractionResult[] {
  const results: ExtractionResult[] = [];

  $(matchers.articleSelector).each((pageIndex, el) => {
    const $article = $(el);

    const href = elementAttr($article.find(matchers.urlSelector), "href");
    const url = href === null ? null : toAbsoluteUrl(href, siteUrl);
    if (url === null) {
      results.push(missing("url", null));
      return;
    }

    const uid = extractUid(url, matchers);
    if (uid === null) {
      results.push(missing("uid", url));
      return;
    }

    const title = elementText($article.find(matchers.titleSelector));
    if (title === null) {
      results.push(missing("title", uid));
      return;
    }

    const date = elementText($article.find(matchers.dateSelector));
    if (date === null) {
      results.push(missing("date", uid));
      return;
    }

    const content = elementText($article.children(matchers.contentSelector));
    if (content === null) {
      results.push(missing("content", uid));
      return;
    }

    results.push({
      success: true,
      article: {
        uid,
        pageIndex,
        title,
        date,
        url,
        content,
        extractionDate: toIsoSeconds(now()),
        deprecated: false,
      },
    });
  });

  return results;
}
