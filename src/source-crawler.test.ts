import { crawlSource, crawlSources } from "./source-crawler";
import { createStaticFetcher, PageFetcher } from "./fetcher";
import { resolveSettings } from "./settings";
import { SourceError } from "./core/errors";
import * as utils from "./core/utils";
import { ContactRecord, RunSettings, SourceConfig } from "./types";

const BASE = "https://directory.test";

function card(name: string, extra = ""): string {
  return `<li class="card"><h2 class="name">${name}</h2>${extra}</li>`;
}

function listing(cards: string[], next?: string): string {
  const nextLink = next ? `<a class="next" href="${next}">Next</a>` : "";
  return `<html><body><ul>${cards.join("")}</ul>${nextLink}</body></html>`;
}

function source(overrides: Partial<SourceConfig> = {}): SourceConfig {
  return {
    name: "test-directory",
    enabled: true,
    start_urls: [`${BASE}/list/1`],
    listing: {
      item_selector: "li.card",
      fields: { business_name: "h2.name", phone: "span.phone" },
    },
    pagination: { next_page_selector: "a.next" },
    jsonld_fallback: true,
    ...overrides,
  };
}

function settings(overrides: Partial<RunSettings> = {}): Readonly<RunSettings> {
  return resolveSettings({ maxRuntimeSeconds: 60, concurrency: 1, delayMs: 0, ...overrides });
}

function names(records: ContactRecord[]): string[] {
  return records.map((r) => r.business_name);
}

describe("crawlSources", () => {
  it("should stop at the item cap before processing the next card", async () => {
    const pages: Record<string, string> = {
      [`${BASE}/list/1`]: listing(
        Array.from({ length: 10 }, (_, i) => card(`Biz ${i + 1}`, `<a class="more" href="/biz/${i + 1}">More</a>`)),
        "/list/2"
      ),
      [`${BASE}/list/2`]: listing([card("Never")]),
    };
    for (let i = 1; i <= 10; i++) pages[`${BASE}/biz/${i}`] = "<p>About us</p>";
    const fetcher = createStaticFetcher(pages);

    const result = await crawlSources(
      [source({ listing: { item_selector: "li.card", fields: { business_name: "h2.name" }, detail_link_selector: "a.more" } })],
      { fetcher, settings: settings({ maxItems: 5 }) }
    );

    expect(names(result.records)).toEqual(["Biz 1", "Biz 2", "Biz 3", "Biz 4", "Biz 5"]);
    expect(fetcher.requested).toEqual([
      `${BASE}/list/1`,
      `${BASE}/biz/1`,
      `${BASE}/biz/2`,
      `${BASE}/biz/3`,
      `${BASE}/biz/4`,
      `${BASE}/biz/5`,
    ]);
    expect(result.reports[0].stop_reason).toBe("max_items");
  });

  it("should follow a three-page chain until there is no next link", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([card("A1"), card("A2")], "/list/2"),
      [`${BASE}/list/2`]: listing([card("B1"), card("B2")], "/list/3"),
      [`${BASE}/list/3`]: listing([card("C1"), card("C2")]),
    });

    const result = await crawlSources([source()], { fetcher, settings: settings() });

    expect(names(result.records)).toEqual(["A1", "A2", "B1", "B2", "C1", "C2"]);
    expect(result.reports).toEqual([
      {
        source: "test-directory",
        records: 6,
        pages_fetched: 3,
        pages_failed: 0,
        details_failed: 0,
        stop_reason: "exhausted",
        error: null,
      },
    ]);
  });

  it("should emit complete records with provenance", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([card("Acme")]),
    });

    const result = await crawlSources(
      [source({ category: "plumbing", region: "ON" })],
      { fetcher, settings: settings() }
    );

    expect(result.records).toEqual([
      {
        source: "test-directory",
        category: "plumbing",
        region: "ON",
        business_name: "Acme",
        phone: "",
        email: "",
        website: "",
        address: "",
        city: "",
        province: "",
        postal_code: "",
        listing_url: `${BASE}/list/1`,
        detail_url: "",
      },
    ]);
  });

  it("should prefer detail values and fall back to scanning the detail page for email", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([
        card("Acme", '<span class="phone">111</span><a class="more" href="/biz/acme">More</a>'),
      ]),
      [`${BASE}/biz/acme`]:
        '<div class="phone">222</div><p>Contact: sales@example.ca for quotes</p>',
    });

    const result = await crawlSources(
      [
        source({
          listing: {
            item_selector: "li.card",
            fields: { business_name: "h2.name", phone: "span.phone" },
            detail_link_selector: "a.more",
          },
          detail: { fields: { phone: "div.phone", email: "a.email::attr(href)" } },
        }),
      ],
      { fetcher, settings: settings() }
    );

    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({
      business_name: "Acme",
      phone: "222",
      email: "sales@example.ca",
      detail_url: `${BASE}/biz/acme`,
    });
  });

  it("should keep listing fields when a detail page fails", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([
        card("Acme", '<span class="phone">111</span><a class="more" href="/biz/missing">More</a>'),
      ]),
    });

    const result = await crawlSources(
      [
        source({
          listing: {
            item_selector: "li.card",
            fields: { business_name: "h2.name", phone: "span.phone" },
            detail_link_selector: "a.more",
          },
        }),
      ],
      { fetcher, settings: settings() }
    );

    expect(result.records[0]).toMatchObject({ business_name: "Acme", phone: "111", detail_url: "" });
    expect(result.reports[0].details_failed).toBe(1);
  });

  it("should drop cards without an identifying field without counting them", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([
        '<li class="card"><p class="city">Ottawa</p></li>',
        card("Acme"),
        card("Beta"),
      ]),
    });

    const result = await crawlSources([source()], { fetcher, settings: settings({ maxItems: 2 }) });

    expect(names(result.records)).toEqual(["Acme", "Beta"]);
  });

  it("should treat a failing later page as the end of that chain", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([card("A1")], "/list/2"),
    });

    const result = await crawlSources([source()], { fetcher, settings: settings() });

    expect(names(result.records)).toEqual(["A1"]);
    expect(result.reports[0]).toMatchObject({
      pages_fetched: 1,
      pages_failed: 1,
      stop_reason: "exhausted",
      error: null,
    });
  });

  it("should report a source error and continue with the next source", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([card("Acme")]),
    });

    const result = await crawlSources(
      [source({ name: "broken", start_urls: ["https://broken.test/"] }), source()],
      { fetcher, settings: settings() }
    );

    expect(result.reports[0]).toEqual({
      source: "broken",
      records: 0,
      pages_fetched: 0,
      pages_failed: 1,
      details_failed: 0,
      stop_reason: "source_error",
      error: 'Source "broken" unreachable at https://broken.test/: HTTP 404: Not Found',
    });
    expect(names(result.records)).toEqual(["Acme"]);
  });

  it("should fetch only the first listing page when the runtime budget is zero", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([card("A1"), card("A2")], "/list/2"),
      [`${BASE}/list/2`]: listing([card("B1")]),
      "https://second.test/list": listing([card("S1")]),
    });

    const result = await crawlSources(
      [source(), source({ name: "second", start_urls: ["https://second.test/list"] })],
      { fetcher, settings: settings({ maxRuntimeSeconds: 0, concurrency: 2 }) }
    );

    expect(fetcher.requested).toEqual([`${BASE}/list/1`]);
    expect(names(result.records)).toEqual(["A1", "A2"]);
    expect(result.reports.map((r) => r.stop_reason)).toEqual(["max_runtime", "max_runtime"]);
  });

  it("should skip disabled sources", async () => {
    const fetcher = createStaticFetcher({});

    const result = await crawlSources([source({ enabled: false })], { fetcher, settings: settings() });

    expect(fetcher.requested).toEqual([]);
    expect(result.reports).toEqual([]);
  });

  it("should crawl every start URL of a source in order", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([card("A1")]),
      [`${BASE}/other`]: listing([card("O1")]),
    });

    const result = await crawlSources(
      [source({ start_urls: [`${BASE}/list/1`, `${BASE}/other`] })],
      { fetcher, settings: settings() }
    );

    expect(names(result.records)).toEqual(["A1", "O1"]);
  });

  it("should build records from JSON-LD when a page has no cards", async () => {
    const jsonLd = JSON.stringify({
      "@type": "LocalBusiness",
      name: "Structured Co",
      telephone: "613 555 0199",
    });
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: `<html><head><script type="application/ld+json">${jsonLd}</script></head><body></body></html>`,
    });

    const result = await crawlSources([source()], { fetcher, settings: settings() });

    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ business_name: "Structured Co", phone: "6135550199" });
  });

  it("should follow index links as detail pages", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]:
        '<a class="profile" href="/p/1">One</a><a class="profile" href="/p/2">Two</a>',
      [`${BASE}/p/1`]: '<h1>First Co</h1><a href="mailto:first@example.ca">mail</a>',
      [`${BASE}/p/2`]: "<h1>Second Co</h1>",
    });

    const result = await crawlSources(
      [
        source({
          listing: { item_selector: "li.card", fields: {}, follow_links_selector: "a.profile" },
          detail: { fields: { business_name: "h1" } },
        }),
      ],
      { fetcher, settings: settings() }
    );

    expect(result.records.map((r) => [r.business_name, r.email, r.detail_url])).toEqual([
      ["First Co", "first@example.ca", `${BASE}/p/1`],
      ["Second Co", "", `${BASE}/p/2`],
    ]);
  });

  it("should hand every record to the sink and produce identical output on repeat runs", async () => {
    const pages = {
      [`${BASE}/list/1`]: listing([card("A1"), card("A2")], "/list/2"),
      [`${BASE}/list/2`]: listing([card("B1")]),
    };
    const sink: ContactRecord[] = [];

    const first = await crawlSources([source()], {
      fetcher: createStaticFetcher(pages),
      settings: settings(),
      onRecord: (record) => sink.push(record),
    });
    const second = await crawlSources([source()], {
      fetcher: createStaticFetcher(pages),
      settings: settings(),
    });

    expect(sink).toEqual(first.records);
    expect(JSON.stringify(second.records)).toBe(JSON.stringify(first.records));
  });
});

describe("anchor cards", () => {
  it("should take the detail link and website from the card element itself", async () => {
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: '<div><a class="card" href="/biz/1"><h3>Acme</h3></a></div>',
      [`${BASE}/biz/1`]: "<p>About us</p>",
    });

    const result = await crawlSources(
      [
        source({
          listing: {
            item_selector: "a.card",
            fields: { business_name: "h3", website: "a.card" },
            detail_link_selector: "a.card",
          },
        }),
      ],
      { fetcher, settings: settings() }
    );

    expect(fetcher.requested).toEqual([`${BASE}/list/1`, `${BASE}/biz/1`]);
    expect(result.records.map((r) => [r.business_name, r.website, r.detail_url])).toEqual([
      ["Acme", `${BASE}/biz/1`, `${BASE}/biz/1`],
    ]);
  });
});

describe("politeness delay", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should wait before every fetch of a source except its first", async () => {
    const events: string[] = [];
    jest.spyOn(utils, "sleep").mockImplementation(async (ms) => {
      events.push(`sleep ${ms}`);
    });
    const pages = createStaticFetcher({
      [`${BASE}/list/1`]: listing([card("A", '<a class="more" href="/biz/a">More</a>')], "/list/2"),
      [`${BASE}/list/2`]: listing([card("B", '<a class="more" href="/biz/b">More</a>')]),
      [`${BASE}/biz/a`]: "<p>A</p>",
      [`${BASE}/biz/b`]: "<p>B</p>",
    });
    const fetcher: PageFetcher = {
      fetch: (url) => {
        events.push(`fetch ${url}`);
        return pages.fetch(url);
      },
    };

    const result = await crawlSources(
      [
        source({
          listing: {
            item_selector: "li.card",
            fields: { business_name: "h2.name" },
            detail_link_selector: "a.more",
          },
        }),
      ],
      { fetcher, settings: settings({ delayMs: 250 }) }
    );

    expect(names(result.records)).toEqual(["A", "B"]);
    expect(events).toEqual([
      `fetch ${BASE}/list/1`,
      "sleep 250",
      `fetch ${BASE}/biz/a`,
      "sleep 250",
      `fetch ${BASE}/list/2`,
      "sleep 250",
      `fetch ${BASE}/biz/b`,
    ]);
  });

  it("should not wait at all when the delay is zero", async () => {
    const sleep = jest.spyOn(utils, "sleep");
    const fetcher = createStaticFetcher({
      [`${BASE}/list/1`]: listing([card("A1")], "/list/2"),
      [`${BASE}/list/2`]: listing([card("B1")]),
    });

    await crawlSources([source()], { fetcher, settings: settings({ delayMs: 0 }) });

    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("crawlSource", () => {
  it("should surface a SourceError when the first page is unreachable", async () => {
    const fetcher = createStaticFetcher({});

    await expect(crawlSource(source(), { fetcher, settings: settings() })).rejects.toThrow(
      SourceError
    );
  });
});
