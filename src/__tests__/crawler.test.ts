import { describe, it, expect, vi } from "vitest";
import { Crawler } from "../crawler/scheduler.js";
import type { CrawlerOptions } from "../crawler/scheduler.js";
import { FetchError } from "../fetcher/index.js";
import type { Fetcher, FetchedPage } from "../fetcher/index.js";
import type { Extractor } from "../extractor/index.js";
import type { OutputWriter } from "../output/index.js";
import type { CrawlEvent, PageResult } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface SitePage {
  text?: string;
  links?: string[];
  invalidLinks?: number;
  status?: number;
  error?: Error;
  /** Serve the page at this URL instead, as after a redirect. */
  redirectTo?: string;
}

type Site = Record<string, SitePage>;

function makeOptions(overrides: Partial<CrawlerOptions> = {}): CrawlerOptions {
  return {
    maxDepth: 5,
    concurrency: 1,
    sameHostOnly: true,
    outputDir: "./out",
    ...overrides,
  };
}

/** Fetcher serving the pages of `site`; the body is the page URL. */
function createSiteFetcher(site: Site): Fetcher & { fetched: string[] } {
  const fetched: string[] = [];
  return {
    fetched,
    fetch: vi.fn(async (url: string): Promise<FetchedPage> => {
      fetched.push(url);
      const page = site[url];
      if (!page) {
        throw new FetchError(`No page at ${url}`, url, 404);
      }
      if (page.error) {
        throw page.error;
      }
      const served = page.redirectTo ?? url;
      return {
        url,
        finalUrl: served,
        status: page.status ?? 200,
        body: served,
        headers: { "content-type": "text/html" },
        fetchedAt: new Date(),
      };
    }),
    close: vi.fn(),
  };
}

/** Extractor looking up the text and links of the page named by the body. */
function createSiteExtractor(site: Site): Extractor {
  return {
    extract: (body: string, pageUrl: string): PageResult => {
      const page = site[body];
      if (!page) {
        throw new Error(`Unknown page ${body}`);
      }
      return {
        url: pageUrl,
        mainText: page.text ?? `Text of ${pageUrl}`,
        links: page.links ?? [],
        invalidLinks: page.invalidLinks ?? 0,
      };
    },
  };
}

function createMemoryWriter(): OutputWriter & {
  records: Array<{ url: string; text: string }>;
} {
  const records: Array<{ url: string; text: string }> = [];
  return {
    records,
    write: vi.fn(async (url: string, text: string) => {
      records.push({ url, text });
      return `./out/${new URL(url).pathname.slice(1) || "index"}.txt`;
    }),
  };
}

function createCrawler(
  site: Site,
  overrides: Partial<CrawlerOptions> = {},
  writer = createMemoryWriter(),
) {
  const fetcher = createSiteFetcher(site);
  const crawler = new Crawler(
    makeOptions(overrides),
    fetcher,
    createSiteExtractor(site),
    writer,
  );
  return { crawler, fetcher, writer };
}

const A = "https://example.com/a";
const B = "https://example.com/b";
const C = "https://example.com/c";
const D = "https://example.com/d";
const E = "https://example.com/e";

// ---------------------------------------------------------------------------
// 1. Traversal
// ---------------------------------------------------------------------------
describe("Crawler traversal", () => {
  it("should fetch two mutually linked pages once each", async () => {
    const { crawler, fetcher, writer } = createCrawler(
      { [A]: { links: [B] }, [B]: { links: [A] } },
      { maxDepth: 1 },
    );

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B]);
    expect(writer.records.map((r) => r.url)).toEqual([A, B]);
    expect(summary.pagesFetched).toBe(2);
    expect(summary.pagesWritten).toBe(2);
    expect(summary.duplicatesSkipped).toBe(1);
    expect(summary.overDepthSkipped).toBe(0);
  });

  it("should not crawl a redirect target that is already claimed", async () => {
    const OLD = "https://example.com/old";
    const { crawler, fetcher, writer } = createCrawler({
      [A]: { links: [OLD, B] },
      [OLD]: { redirectTo: B },
      [B]: {},
    });

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, OLD, B]);
    expect(writer.records.map((r) => r.url)).toEqual([A, B]);
    expect(summary.pagesFetched).toBe(2);
    expect(summary.duplicatesSkipped).toBe(1);
  });

  it("should not fetch a redirect target again when it is linked later", async () => {
    const OLD = "https://example.com/old";
    const { crawler, fetcher, writer } = createCrawler({
      [A]: { links: [OLD] },
      [OLD]: { redirectTo: B },
      [B]: { links: [B, C] },
      [C]: {},
    });

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, OLD, C]);
    expect(writer.records.map((r) => r.url)).toEqual([A, OLD, C]);
    expect(summary.duplicatesSkipped).toBe(1);
  });

  it("should visit pages in breadth-first order with one worker", async () => {
    const { crawler, fetcher } = createCrawler({
      [A]: { links: [B, C] },
      [B]: { links: [D] },
      [C]: { links: [E] },
      [D]: {},
      [E]: {},
    });

    await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B, C, D, E]);
  });

  it("should not fetch links beyond maxDepth", async () => {
    const { crawler, fetcher } = createCrawler(
      {
        [A]: { links: [B] },
        [B]: { links: [C] },
        [C]: { links: [D] },
        [D]: {},
      },
      { maxDepth: 1 },
    );

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B]);
    expect(summary.overDepthSkipped).toBe(1);
  });

  it("should fetch only the seeds when maxDepth is 0", async () => {
    const { crawler, fetcher } = createCrawler(
      { [A]: { links: [B, C] }, [B]: {}, [C]: {} },
      { maxDepth: 0 },
    );

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A]);
    expect(summary.overDepthSkipped).toBe(2);
  });

  it("should terminate on a cycle", async () => {
    const { crawler, fetcher } = createCrawler(
      {
        [A]: { links: [B] },
        [B]: { links: [C] },
        [C]: { links: [A] },
      },
      { maxDepth: 10, concurrency: 3 },
    );

    const summary = await crawler.run([A]);

    expect([...fetcher.fetched].sort()).toEqual([A, B, C]);
    expect(summary.duplicatesSkipped).toBe(1);
  });

  it("should ignore links repeated across pages", async () => {
    const { crawler, fetcher } = createCrawler({
      [A]: { links: [B, C] },
      [B]: { links: [C] },
      [C]: { links: [B] },
    });

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B, C]);
    expect(summary.duplicatesSkipped).toBe(2);
  });

  it("should skip links to other hosts", async () => {
    const { crawler, fetcher } = createCrawler({
      [A]: { links: ["https://other.test/x", B] },
      [B]: {},
    });

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B]);
    expect(summary.outOfScopeSkipped).toBe(1);
  });

  it("should follow links to other hosts when sameHostOnly is off", async () => {
    const other = "https://other.test/x";
    const { crawler, fetcher } = createCrawler(
      { [A]: { links: [other] }, [other]: {} },
      { sameHostOnly: false },
    );

    await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, other]);
  });

  it("should apply exclude patterns to discovered links", async () => {
    const { crawler, fetcher } = createCrawler(
      { [A]: { links: [B, C] }, [B]: {}, [C]: {} },
      { excludePatterns: ["/c"] },
    );

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B]);
    expect(summary.outOfScopeSkipped).toBe(1);
  });

  it("should add invalid links reported by the extractor", async () => {
    const { crawler } = createCrawler({ [A]: { invalidLinks: 3 } });

    const summary = await crawler.run([A]);

    expect(summary.invalidUrls).toBe(3);
  });
});

// ---------------------------------------------------------------------------
// 2. Seeds
// ---------------------------------------------------------------------------
describe("Crawler seeds", () => {
  it("should normalize seeds and skip duplicates among them", async () => {
    const { crawler, fetcher } = createCrawler({ [A]: {} });

    const summary = await crawler.run([A, "https://EXAMPLE.com/a/", `${A}#top`]);

    expect(fetcher.fetched).toEqual([A]);
    expect(summary.duplicatesSkipped).toBe(2);
  });

  it("should count an invalid seed and still finish", async () => {
    const { crawler, fetcher } = createCrawler({});

    const summary = await crawler.run(["mailto:someone@example.com"]);

    expect(fetcher.fetched).toEqual([]);
    expect(summary.invalidUrls).toBe(1);
    expect(summary.pagesFetched).toBe(0);
  });

  it("should finish immediately with no seeds", async () => {
    const { crawler } = createCrawler({});

    const summary = await crawler.run([]);

    expect(summary.pagesFetched).toBe(0);
    expect(summary.cancelled).toBe(false);
  });

  it("should allow the hosts of every seed", async () => {
    const other = "https://docs.example.org/start";
    const { crawler, fetcher } = createCrawler({
      [A]: {},
      [other]: { links: [B] },
      [B]: {},
    });

    await crawler.run([A, other]);

    expect(fetcher.fetched).toEqual([A, other, B]);
  });

  it("should refuse a second run", async () => {
    const { crawler } = createCrawler({});
    await crawler.run([]);

    await expect(crawler.run([])).rejects.toThrow(
      "Crawler.run() can only be called once per instance",
    );
  });
});

// ---------------------------------------------------------------------------
// 3. Failures
// ---------------------------------------------------------------------------
describe("Crawler failures", () => {
  it("should record a fetch failure and continue with other pages", async () => {
    const { crawler, fetcher } = createCrawler({
      [A]: { links: [B, C] },
      [B]: { error: new FetchError("Network error fetching b: refused", B) },
      [C]: {},
    });

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B, C]);
    expect(summary.fetchFailures).toBe(1);
    expect(summary.pagesFetched).toBe(2);
    expect(summary.failures).toEqual([
      { url: B, kind: "fetch", reason: "Network error fetching b: refused" },
    ]);
  });

  it("should treat a non-2xx status as a fetch failure", async () => {
    const events: CrawlEvent[] = [];
    const { crawler, writer } = createCrawler(
      { [A]: { status: 404, links: [B] }, [B]: {} },
      { onEvent: (event) => events.push(event) },
    );

    const summary = await crawler.run([A]);

    expect(summary.fetchFailures).toBe(1);
    expect(summary.pagesFetched).toBe(0);
    expect(writer.records).toEqual([]);
    expect(events[0]).toEqual({
      type: "fetch:failure",
      url: A,
      depth: 0,
      error: `HTTP 404 for ${A}`,
      status: 404,
    });
  });

  it("should record a parse failure without following links", async () => {
    // B is served by the fetcher but unknown to the extractor
    const fetcher = createSiteFetcher({
      [A]: { links: [B] },
      [B]: { links: [C] },
      [C]: {},
    });
    const crawler = new Crawler(
      makeOptions(),
      fetcher,
      createSiteExtractor({ [A]: { links: [B] }, [C]: {} }),
      createMemoryWriter(),
    );

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B]);
    expect(summary.parseFailures).toBe(1);
    expect(summary.pagesFetched).toBe(2);
    expect(summary.pagesWritten).toBe(1);
    expect(summary.failures).toEqual([
      { url: B, kind: "parse", reason: `Unknown page ${B}` },
    ]);
  });

  it("should count a missing page as a fetch failure with its status", async () => {
    const events: CrawlEvent[] = [];
    const { crawler } = createCrawler(
      { [A]: { links: [B] } },
      { onEvent: (event) => events.push(event) },
    );

    const summary = await crawler.run([A]);

    expect(summary.fetchFailures).toBe(1);
    expect(events).toContainEqual({
      type: "fetch:failure",
      url: B,
      depth: 1,
      error: `No page at ${B}`,
      status: 404,
    });
  });

  it("should record a write failure and still follow the page's links", async () => {
    const writer = createMemoryWriter();
    writer.write = vi.fn(async (url: string) => {
      if (url === A) {
        throw new Error("disk full");
      }
      return "./out/b.txt";
    });
    const { crawler, fetcher } = createCrawler(
      { [A]: { links: [B] }, [B]: {} },
      {},
      writer,
    );

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A, B]);
    expect(summary.writeFailures).toBe(1);
    expect(summary.pagesWritten).toBe(1);
    expect(summary.failures).toEqual([
      { url: A, kind: "write", reason: "disk full" },
    ]);
  });

  it("should not write pages with empty main text", async () => {
    const { crawler, writer } = createCrawler({
      [A]: { text: "  \n ", links: [B] },
      [B]: {},
    });

    const summary = await crawler.run([A]);

    expect(summary.emptyPages).toBe(1);
    expect(summary.pagesWritten).toBe(1);
    expect(writer.records.map((r) => r.url)).toEqual([B]);
  });

  it("should stop the crawl and rethrow an unexpected error", async () => {
    const { crawler } = createCrawler(
      { [A]: {} },
      {
        onEvent: (event) => {
          if (event.type === "fetch:success") {
            throw new Error("listener exploded");
          }
        },
      },
    );

    await expect(crawler.run([A])).rejects.toThrow("listener exploded");
  });
});

// ---------------------------------------------------------------------------
// 4. Events
// ---------------------------------------------------------------------------
describe("Crawler events", () => {
  it("should emit the stages of a page in order and finish with crawl:complete", async () => {
    const events: CrawlEvent[] = [];
    const { crawler } = createCrawler(
      { [A]: { text: "hello", links: [A] } },
      { onEvent: (event) => events.push(event) },
    );

    const summary = await crawler.run([A]);

    expect(events.map((e) => e.type)).toEqual([
      "fetch:success",
      "extract:success",
      "write:success",
      "link:skipped",
      "crawl:complete",
    ]);
    expect(events[1]).toEqual({
      type: "extract:success",
      url: A,
      depth: 0,
      links: 1,
      chars: 5,
    });
    expect(events[2]).toEqual({
      type: "write:success",
      url: A,
      depth: 0,
      filePath: "./out/a.txt",
    });
    expect(events[3]).toEqual({
      type: "link:skipped",
      url: A,
      depth: 1,
      reason: "duplicate",
    });
    expect(events[4]).toEqual({ type: "crawl:complete", summary });
  });
});

// ---------------------------------------------------------------------------
// 5. Concurrency
// ---------------------------------------------------------------------------
describe("Crawler concurrency", () => {
  function createSlowFetcher(site: Site, delayMs: number) {
    const inner = createSiteFetcher(site);
    let active = 0;
    let maxActive = 0;
    const fetcher: Fetcher = {
      fetch: async (url: string) => {
        active++;
        maxActive = Math.max(maxActive, active);
        try {
          await new Promise((resolve) => setTimeout(resolve, delayMs));
          return await inner.fetch(url);
        } finally {
          active--;
        }
      },
      close: vi.fn(),
    };
    return { fetcher, inner, getMaxActive: () => maxActive };
  }

  const fanOut: Site = {
    [A]: { links: [B, C, D, E, "https://example.com/f"] },
    [B]: {},
    [C]: {},
    [D]: {},
    [E]: {},
    "https://example.com/f": {},
  };

  it("should never exceed the configured number of workers", async () => {
    const { fetcher, inner, getMaxActive } = createSlowFetcher(fanOut, 5);
    const crawler = new Crawler(
      makeOptions({ concurrency: 2 }),
      fetcher,
      createSiteExtractor(fanOut),
      createMemoryWriter(),
    );

    const summary = await crawler.run([A]);

    expect(summary.pagesFetched).toBe(6);
    expect(inner.fetched).toHaveLength(6);
    expect(getMaxActive()).toBe(2);
  });

  it("should fetch every page exactly once with many workers", async () => {
    const { fetcher, inner } = createSlowFetcher(fanOut, 1);
    const crawler = new Crawler(
      makeOptions({ concurrency: 8 }),
      fetcher,
      createSiteExtractor(fanOut),
      createMemoryWriter(),
    );

    await crawler.run([A]);

    expect([...inner.fetched].sort()).toEqual(Object.keys(fanOut).sort());
  });
});

// ---------------------------------------------------------------------------
// 6. Cancellation
// ---------------------------------------------------------------------------
describe("Crawler cancellation", () => {
  it("should fetch nothing when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const { crawler, fetcher } = createCrawler(
      { [A]: {} },
      { signal: controller.signal },
    );

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([]);
    expect(summary.cancelled).toBe(true);
  });

  it("should finish the in-flight page and fetch nothing new after abort", async () => {
    const controller = new AbortController();
    const { crawler, fetcher, writer } = createCrawler(
      { [A]: { links: [B, C] }, [B]: {}, [C]: {} },
      {
        signal: controller.signal,
        onEvent: (event) => {
          if (event.type === "fetch:success") {
            controller.abort();
          }
        },
      },
    );

    const summary = await crawler.run([A]);

    expect(fetcher.fetched).toEqual([A]);
    expect(writer.records.map((r) => r.url)).toEqual([A]);
    expect(summary.cancelled).toBe(true);
    expect(summary.pagesFetched).toBe(1);
  });
});
