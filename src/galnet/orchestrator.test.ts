import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { extractAllPages } from "./orchestrator";
import { createGalnetMatchers } from "./matchers";
import { MemoryBlobStore } from "../testing/memory-blob-store";
import { PageFetcher } from "../core/fetcher";
import { RunAbortedError } from "../errors";
import { crawlPaths } from "../config";
import { MapFetcher } from "../testing/map-fetcher";
import { SITE_URL, galnetPage } from "../testing/galnet-pages";

const OUT = "/out";
const paths = crawlPaths(OUT);
const A = `${SITE_URL}/galnet/01-SEP-3301`;
const B = `${SITE_URL}/galnet/02-SEP-3301`;
const C = `${SITE_URL}/galnet/03-SEP-3301`;
const ROOT = galnetPage({
  links: ["/galnet/01-SEP-3301", "/galnet/02-SEP-3301", "/galnet/03-SEP-3301"],
  articles: [{ uid: "root" }],
});

function run(
  fetcher: PageFetcher,
  store: MemoryBlobStore,
  options: { sequential?: boolean; at?: string } = {}
) {
  return extractAllPages({
    config: { siteUrl: SITE_URL, outputDir: OUT, sequential: options.sequential ?? false },
    fetcher,
    store,
    matchers: createGalnetMatchers(),
    now: () => new Date(options.at ?? "2026-10-19T08:30:00Z"),
  });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("extractAllPages", () => {
  it("reconciles downloaded and failed pages across runs", async () => {
    const store = new MemoryBlobStore();
    store.ensureDir(OUT);
    store.write(paths.downloadedPagesFile, [A]);
    store.write(paths.failedPagesFile, [{ url: B, errors: ["old"] }]);
    const fetcher = new MapFetcher({
      [SITE_URL]: ROOT,
      [A]: galnetPage({ articles: [{ uid: "a1" }] }),
      [B]: galnetPage({ articles: [{ uid: "b1", date: "02 SEP 3301" }] }),
    });

    const summary = await run(fetcher, store);

    expect(fetcher.requested).not.toContain(A);
    expect(store.read(paths.downloadedPagesFile)).toEqual([A, B]);
    expect(store.read(paths.failedPagesFile)).toEqual([
      { url: C, errors: [`Error while scraping from "${C}": HTTP 404: Not Found`] },
    ]);
    expect(store.read("/out/files/3301 SEP 02 - 0 - b1.json")).toMatchObject({
      uid: "b1",
      deprecated: false,
    });
    expect(summary).toMatchObject({
      total_links: 3,
      already_downloaded: 1,
      total_crawled: 2,
      total_success: 1,
      total_failed: 1,
      articles_created: 1,
    });
  });

  it("clears a stale failed entry for a page already downloaded", async () => {
    const store = new MemoryBlobStore();
    store.ensureDir(OUT);
    store.write(paths.downloadedPagesFile, [A]);
    store.write(paths.failedPagesFile, [{ url: A, errors: ["old"] }]);
    const fetcher = new MapFetcher({
      [SITE_URL]: galnetPage({ links: ["/galnet/01-SEP-3301"] }),
    });

    await run(fetcher, store);

    expect(fetcher.requested).toEqual([SITE_URL]);
    expect(store.read(paths.downloadedPagesFile)).toEqual([A]);
    expect(store.read(paths.failedPagesFile)).toEqual([]);
  });

  it("changes nothing when re-run against the same markup", async () => {
    const store = new MemoryBlobStore();
    const fetcher = new MapFetcher({
      [SITE_URL]: ROOT,
      [A]: galnetPage({ articles: [{ uid: "a1" }] }),
      // a broken block keeps B failing, so it is crawled again
      [B]: galnetPage({ articles: [{ uid: "b1" }, { uid: "b2", content: null }] }),
      [C]: galnetPage({ articles: [{ uid: "c1" }] }),
    });

    await run(fetcher, store, { at: "2026-10-19T08:30:00Z" });
    const keysAfterFirst = store.keys();
    const recordAfterFirst = store.read("/out/files/3301 SEP 07 - 0 - b1.json");
    const failedAfterFirst = store.read(paths.failedPagesFile);

    fetcher.requested.length = 0;
    const second = await run(fetcher, store, { at: "2026-10-20T09:00:00Z" });

    expect(fetcher.requested).toEqual([SITE_URL, B]);
    expect(store.keys()).toEqual(keysAfterFirst);
    expect(store.read("/out/files/3301 SEP 07 - 0 - b1.json")).toEqual(recordAfterFirst);
    expect(store.read(paths.downloadedPagesFile)).toEqual([A, C]);
    expect(store.read(paths.failedPagesFile)).toEqual(failedAfterFirst);
    expect(second.articles_unchanged).toBe(1);
    expect(second.articles_created).toBe(0);
  });

  it("archives the old version when an article changes", async () => {
    const store = new MemoryBlobStore();
    const fetcher = new MapFetcher({
      [SITE_URL]: galnetPage({ links: ["/galnet/02-SEP-3301"] }),
      [B]: galnetPage({ articles: [{ uid: "b1", content: "Old" }, { uid: "b2", content: null }] }),
    });
    await run(fetcher, store, { at: "2026-10-19T08:30:00Z" });

    fetcher.set(
      B,
      galnetPage({ articles: [{ uid: "b1", content: "New" }, { uid: "b2", content: null }] })
    );
    const summary = await run(fetcher, store, { at: "2026-10-20T09:00:00Z" });

    expect(summary.articles_archived).toBe(1);
    expect(store.read("/out/files/3301 SEP 07 - 0 - b1 - 2026-10-20T09-00-00Z.json")).toMatchObject({
      content: "Old",
      extractionDate: "2026-10-19T08:30:00Z",
      deprecated: true,
    });
    expect(store.read("/out/files/3301 SEP 07 - 0 - b1.json")).toMatchObject({
      content: "New",
      extractionDate: "2026-10-20T09:00:00Z",
      deprecated: false,
    });
  });

  it("produces the same result sequentially and concurrently", async () => {
    const pages = {
      [SITE_URL]: ROOT,
      [A]: galnetPage({ articles: [{ uid: "a1" }, { uid: "a2" }] }),
      [B]: galnetPage({ articles: [] }),
      [C]: galnetPage({ articles: [{ uid: "c1" }] }),
    };
    const sequentialStore = new MemoryBlobStore();
    const concurrentStore = new MemoryBlobStore();

    await run(new MapFetcher(pages), sequentialStore, { sequential: true });
    await run(new MapFetcher(pages), concurrentStore, { sequential: false });

    expect(concurrentStore.keys()).toEqual(sequentialStore.keys());
    expect(concurrentStore.read(paths.failedPagesFile)).toEqual(
      sequentialStore.read(paths.failedPagesFile)
    );
    expect(sequentialStore.read(paths.downloadedPagesFile)).toEqual([A, C]);
  });

  it("crawls pages one at a time in sequential mode", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const inner = new MapFetcher({
      [SITE_URL]: ROOT,
      [A]: galnetPage({ articles: [{ uid: "a1" }] }),
      [B]: galnetPage({ articles: [{ uid: "b1" }] }),
      [C]: galnetPage({ articles: [{ uid: "c1" }] }),
    });
    const fetcher: PageFetcher = {
      async fetchText(url: string): Promise<string> {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 1));
        inFlight--;
        return inner.fetchText(url);
      },
    };

    await run(fetcher, new MemoryBlobStore(), { sequential: true });

    expect(maxInFlight).toBe(1);
    expect(inner.requested).toEqual([SITE_URL, A, B, C]);
  });

  it("launches every page at once in concurrent mode", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const inner = new MapFetcher({
      [SITE_URL]: ROOT,
      [A]: galnetPage({ articles: [{ uid: "a1" }] }),
      [B]: galnetPage({ articles: [{ uid: "b1" }] }),
      [C]: galnetPage({ articles: [{ uid: "c1" }] }),
    });
    const fetcher: PageFetcher = {
      async fetchText(url: string): Promise<string> {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 1));
        inFlight--;
        return inner.fetchText(url);
      },
    };

    const summary = await run(fetcher, new MemoryBlobStore(), { sequential: false });

    expect(maxInFlight).toBe(3);
    expect(summary.total_success).toBe(3);
  });

  it("reports links found on pages but not on the root", async () => {
    const store = new MemoryBlobStore();
    const fetcher = new MapFetcher({
      [SITE_URL]: galnetPage({ links: ["/galnet/01-SEP-3301"] }),
      [A]: galnetPage({
        links: ["/galnet/01-SEP-3301", "/galnet/09-SEP-3301"],
        articles: [{ uid: "a1" }],
      }),
    });

    const summary = await run(fetcher, store);

    expect(summary.undiscovered_links).toEqual([`${SITE_URL}/galnet/09-SEP-3301`]);
    expect(fetcher.requested).toEqual([SITE_URL, A]);
  });

  it("aborts without touching bookkeeping when the root cannot be fetched", async () => {
    const store = new MemoryBlobStore();

    await expect(run(new MapFetcher({}), store)).rejects.toThrow(RunAbortedError);
    expect(store.keys()).toEqual([]);
  });
});
