import { z } from "zod";

/** Shape of a stored article record, live or archived. */
export const ArticleRecord = z.object({
  uid: z.string(),
  pageIndex: z.number().int().nonnegative(),
  title: z.string(),
  date: z.string(),
  url: z.string(),
  content: z.string(),
  extractionDate: z.string(),
  deprecated: z.boolean(),
});

/** successful-pages.json */
export const DownloadedPagesFile = z.array(z.string());

/** failed-pages.json */
export const FailedPagesFile = z.array(
  z.object({
    url: z.string(),
    errors: z.array(z.string()),
  })
);

export function formatIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
