/** Article fields in the order the extractor looks for them. */
export type ArticleField = "url" | "uid" | "title" | "date" | "content";

/** A required field could not be found in one article block. */
export interface MissingFieldError {
  kind: "missing-field";
  field: ArticleField;
  /** Best identifier known when the miss happened: the uid, else the url. */
  article: string | null;
}

/** Everything that can go wrong while crawling one page. */
export type GalnetError =
  | { kind: "network"; url: string; cause: string }
  | { kind: "parser"; cause: string }
  | { kind: "file"; filename: string; cause: string };

export function networkError(url: string, cause: string): GalnetError {
  return { kind: "network", url, cause };
}

export function parserError(cause: string): GalnetError {
  return { kind: "parser", cause };
}

export function fileError(filename: string, cause: string): GalnetError {
  return { kind: "file", filename, cause };
}

/**
 * Turn a field miss into the page-level parser error that ends up in
 * failed-pages.json.
 */
export function fromMissingField(err: MissingFieldError): GalnetError {
  const subject = err.article === null ? "" : ` "${err.article}"`;
  return parserError(`Couldn't find article${subject} ${err.field}`);
}

export function describeError(err: GalnetError): string {
  switch (err.kind) {
    case "network":
      return `Error while scraping from "${err.url}": ${err.cause}`;
    case "parser":
      return `Error while parsing: ${err.cause}`;
    case "file":
      return `Error while accessing file "${err.filename}": ${err.cause}`;
  }
}

/** Thrown by the run itself when it cannot start (root page, bookkeeping). */
export class RunAbortedError extends Error {
  constructor(readonly reason: GalnetError) {
    super(describeError(reason));
    this.name = "RunAbortedError";
  }
}
