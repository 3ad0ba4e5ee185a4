import * as cheerio from "cheerio";

export type CheerioEl = ReturnType<cheerio.CheerioAPI>;

/**
 * Selectors and patterns used to read GalNet markup.
 * Built once at startup and shared by the crawler and the extractor.
 */
export interface GalnetMatchers {
  readonly indexLinkSelector: string;
  readonly articleSelector: string;
  readonly titleSelector: string;
  readonly dateSelector: string;
  readonly urlSelector: string;
  /** Matched against the direct children of an article block. */
  readonly contentSelector: string;
  readonly uidPattern: RegExp;
  readonly datePattern: RegExp;
}

export interface GalnetDate {
  day: string;
  month: string;
  year: string;
}

export function createGalnetMatchers(): GalnetMatchers {
  return Object.freeze({
    indexLinkSelector: "a.galnetLinkBoxLink",
    articleSelector: ".article",
    titleSelector: "h3",
    dateSelector: "div > p",
    urlSelector: "h3 > a",
    contentSelector: "p",
    uidPattern: /\/uid\/([^/#?]+)/,
    datePattern: /(\d{2})[\s-](\w{3})[\s-](\d{4,})/,
  });
}

export function loadDocument(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

/** Concatenated, trimmed text of the first element, or null when nothing matched. */
export function elementText($el: CheerioEl): string | null {
  if ($el.length === 0) return null;
  return $el.first().text().trim();
}

/** Trimmed attribute of the first element, or null when absent. */
export function elementAttr($el: CheerioEl, name: string): string | null {
  const value = $el.first().attr(name);
  return value === undefined ? null : value.trim();
}

/** Pull the opaque article id out of a ".../uid/<token>" permalink. */
export function extractUid(url: string, matchers: GalnetMatchers): string | null {
  const match = matchers.uidPattern.exec(url);
  return match ? match[1] : null;
}

export function parseGalnetDate(
  text: string,
  matchers: GalnetMatchers
): GalnetDate | null {
  const match = matchers.datePattern.exec(text);
  if (!match) return null;
  return { day: match[1], month: match[2], year: match[3] };
}

/**
 * "07 SEP 3301" → "3301 SEP 07", so that record filenames sort by date.
 * Text that does not look like a GalNet date is returned as is.
 */
export function reformatDate(text: string, matchers: GalnetMatchers): string {
  const date = parseGalnetDate(text, matchers);
  if (!date) return text;
  return `${date.year} ${date.month} ${date.day}`;
}

/** Resolve a (possibly relative) href against the site root. */
export function toAbsoluteUrl(href: string, siteUrl: string): string | null {
  try {
    return new URL(href.trim(), siteUrl).href;
  } catch {
    return null;
  }
}
