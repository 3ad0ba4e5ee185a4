import * as path from "path";
import { CrawlConfig, CrawlPaths } from "./types";

export const GALNET_SITE_URL = "https://community.elitedangerous.com";
export const DEFAULT_OUTPUT_DIR = "./galnet";

export interface CliArgs {
  siteUrl?: string;
  outputDir?: string;
  sequential: boolean;
}

/**
 * Parse CLI arguments.
 * Supports --site, --output and the -s / --sequential flag.
 */
export function parseArgs(argv: string[]): CliArgs {
  const opts: Record<string, string> = {};
  let sequential = false;

  for (const arg of argv) {
    if (arg === "-s" || arg === "--sequential") { sequential = true; continue; }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      const key = arg.slice(2, eqIdx);
      const value = arg.slice(eqIdx + 1);
      opts[key] = value;
    }
  }

  return {
    siteUrl: opts.site,
    outputDir: opts.output,
    sequential,
  };
}

export function resolveConfig(args: CliArgs): CrawlConfig {
  return {
    siteUrl: args.siteUrl || GALNET_SITE_URL,
    outputDir: path.resolve(args.outputDir || DEFAULT_OUTPUT_DIR),
    sequential: args.sequential,
  };
}

export function crawlPaths(outputDir: string): CrawlPaths {
  return {
    downloadedPagesFile: path.join(outputDir, "successful-pages.json"),
    failedPagesFile: path.join(outputDir, "failed-pages.json"),
    articlesDir: path.join(outputDir, "files"),
  };
}
