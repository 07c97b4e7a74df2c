import * as cheerio from "cheerio";
import {
  ContactRecord,
  RawFields,
  RunResult,
  RunSettings,
  SourceConfig,
  SourceReport,
  StopReason,
} from "./types";
import { PageFetcher, FetchResult } from "./fetcher";
import { SourceError } from "./core/errors";
import { createLogger } from "./core/logger";
import { absoluteUrl, runInBatches, sleep } from "./core/utils";
import { extractFields, extractLink, extractLinks, selectAll, Scope } from "./selector-engine";
import { extractJsonLdBusinesses } from "./jsonld";
import { buildRecord, mergeFields, RecordInput } from "./record-builder";
import { nextPageUrl } from "./pagination";

const logger = createLogger("[Crawl]");

export interface CrawlOptions {
  fetcher: PageFetcher;
  settings: Readonly<RunSettings>;
  /** Shared output sink; called once per record, in discovery order per source */
  onRecord?: (record: ContactRecord) => void;
}

interface RunContext extends CrawlOptions {
  startedAt: number;
}

/** Per-source mutable counters, discarded when the source's crawl ends */
interface CrawlState {
  itemsEmitted: number;
  fetches: number;
  pagesFetched: number;
  pagesFailed: number;
  detailsFailed: number;
  currentUrl: string;
}

/** Outcome of processing one listing page */
type PageOutcome = "continue" | "max_items";

interface DetailPage {
  url: string;
  fields: RawFields;
  jsonLd?: RawFields;
  scope: Scope;
}

function runtimeExhausted(run: RunContext): boolean {
  return Date.now() - run.startedAt >= run.settings.maxRuntimeSeconds * 1000;
}

/** Fetch with the politeness delay before every request but a source's first */
async function politeFetch(
  url: string,
  state: CrawlState,
  run: RunContext
): Promise<FetchResult> {
  if (state.fetches > 0 && run.settings.delayMs > 0) {
    await sleep(run.settings.delayMs);
  }
  state.fetches++;
  return run.fetcher.fetch(url);
}

/**
 * Crawl one source through its listing pages until pagination runs out or a
 * stop condition fires.
 * @param isFirst - The first source always fetches its first page, even when
 *   the runtime budget is already spent
 * @throws SourceError when the source's first listing page cannot be fetched
 */
export async function crawlSource(
  source: SourceConfig,
  options: CrawlOptions & { startedAt?: number; isFirst?: boolean }
): Promise<SourceReport> {
  const run: RunContext = { ...options, startedAt: options.startedAt ?? Date.now() };
  const state: CrawlState = {
    itemsEmitted: 0,
    fetches: 0,
    pagesFetched: 0,
    pagesFailed: 0,
    detailsFailed: 0,
    currentUrl: source.start_urls[0],
  };

  const report = (stop_reason: StopReason): SourceReport => ({
    source: source.name,
    records: state.itemsEmitted,
    pages_fetched: state.pagesFetched,
    pages_failed: state.pagesFailed,
    details_failed: state.detailsFailed,
    stop_reason,
    error: null,
  });

  if (!(options.isFirst ?? true) && runtimeExhausted(run)) {
    return report("max_runtime");
  }

  for (const [startIndex, startUrl] of source.start_urls.entries()) {
    if (startIndex > 0 && runtimeExhausted(run)) return report("max_runtime");

    let url: string | undefined = startUrl;
    while (url) {
      state.currentUrl = url;
      const result = await politeFetch(url, state, run);

      if (!result.success) {
        if (state.pagesFetched === 0 && state.pagesFailed === 0) {
          throw new SourceError(source.name, url, result.error.error_message);
        }
        state.pagesFailed++;
        logger.warn(`${source.name}: listing page failed ${url}: ${result.error.error_message}`);
        break;
      }
      state.pagesFetched++;

      const $ = cheerio.load(result.page.html);
      const outcome = await extractPage($, url, source, state, run);
      logger.debug(`${source.name}: ${url} → ${state.itemsEmitted} records so far`);
      if (outcome === "max_items") return report("max_items");

      const next = nextPageUrl($.root(), source.pagination?.next_page_selector, url);
      if (!next) break;
      if (runtimeExhausted(run)) return report("max_runtime");
      url = next;
    }
  }

  return report("exhausted");
}

/**
 * Extract every card on a listing page, following detail links as configured.
 * Stops mid-page once the item cap is reached.
 */
async function extractPage(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  source: SourceConfig,
  state: CrawlState,
  run: RunContext
): Promise<PageOutcome> {
  const { listing } = source;
  const provenance = {
    source: source.name,
    category: source.category ?? "",
    region: source.region ?? "",
    listing_url: pageUrl,
    detail_url: "",
  };

  // Returns true when the item cap has been reached
  const emit = (input: RecordInput): boolean => {
    const record = buildRecord(input);
    if (!record) return false;
    state.itemsEmitted++;
    run.onRecord?.(record);
    return run.settings.maxItems > 0 && state.itemsEmitted >= run.settings.maxItems;
  };

  const cards = selectAll($.root(), listing.item_selector);
  for (const card of cards) {
    const fields = extractFields(card, listing.fields, pageUrl);
    const detailUrl = listing.detail_link_selector
      ? absoluteUrl(pageUrl, extractLink(card, listing.detail_link_selector)?.trim())
      : undefined;
    const detail = detailUrl ? await fetchDetail(detailUrl, source, state, run) : undefined;

    const capped = emit({
      listing: fields,
      detail: detail?.fields,
      jsonLd: detail?.jsonLd,
      listingScope: card,
      detailScope: detail?.scope,
      provenance: { ...provenance, detail_url: detail?.url ?? "" },
    });
    if (capped) return "max_items";
  }

  const followed = extractLinks($.root(), listing.follow_links_selector)
    .map((href) => absoluteUrl(pageUrl, href))
    .filter((href): href is string => Boolean(href));
  for (const linkUrl of followed) {
    const detail = await fetchDetail(linkUrl, source, state, run);
    if (!detail) continue;
    const capped = emit({
      listing: {},
      detail: detail.fields,
      jsonLd: detail.jsonLd,
      detailScope: detail.scope,
      provenance: { ...provenance, detail_url: detail.url },
    });
    if (capped) return "max_items";
  }

  if (cards.length === 0 && followed.length === 0 && source.jsonld_fallback) {
    for (const business of extractJsonLdBusinesses($, pageUrl)) {
      if (emit({ listing: business, provenance })) return "max_items";
    }
  }

  return "continue";
}

/**
 * Fetch and extract one detail page. Failures are logged and yield undefined,
 * leaving the record with its listing fields.
 */
async function fetchDetail(
  url: string,
  source: SourceConfig,
  state: CrawlState,
  run: RunContext
): Promise<DetailPage | undefined> {
  const result = await politeFetch(url, state, run);
  if (!result.success) {
    state.detailsFailed++;
    logger.warn(`${source.name}: detail page failed ${url}: ${result.error.error_message}`);
    return undefined;
  }

  const $ = cheerio.load(result.page.html);
  const jsonLd = source.jsonld_fallback
    ? extractJsonLdBusinesses($, url).reduce<RawFields>((acc, b) => mergeFields(b, acc), {})
    : undefined;

  return {
    url,
    fields: extractFields($.root(), source.detail?.fields, url),
    jsonLd,
    scope: $.root(),
  };
}

/**
 * Crawl every enabled source. Sources run in batches of `concurrency`; each
 * source fetches sequentially, so in-flight requests never exceed that limit.
 * A Source Error ends only its own source.
 */
export async function crawlSources(
  sources: readonly SourceConfig[],
  options: CrawlOptions
): Promise<RunResult> {
  const startedAt = Date.now();
  const records: ContactRecord[] = [];
  const onRecord = (record: ContactRecord): void => {
    records.push(record);
    options.onRecord?.(record);
  };

  const active = sources.filter((source) => {
    if (!source.enabled) logger.info(`Skipping disabled source: ${source.name}`);
    return source.enabled;
  });

  const reports = await runInBatches(
    active,
    options.settings.concurrency,
    options.settings.delayMs,
    async (source, index): Promise<SourceReport> => {
      try {
        return await crawlSource(source, {
          ...options,
          onRecord,
          startedAt,
          isFirst: index === 0,
        });
      } catch (err) {
        if (!(err instanceof SourceError)) throw err;
        logger.error(err.message);
        return {
          source: source.name,
          records: 0,
          pages_fetched: 0,
          pages_failed: 1,
          details_failed: 0,
          stop_reason: "source_error",
          error: err.message,
        };
      }
    },
    (completed, total, source, report) => {
      logger.info(
        `[${completed}/${total}] ${source.name}: ${report.records} records (${report.stop_reason})`
      );
    }
  );

  return { records, reports, elapsedMs: Date.now() - startedAt };
}
