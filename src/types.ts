/** Contact fields a selector can be configured for, in export order */
export const FIELD_NAMES = [
  "business_name",
  "phone",
  "email",
  "website",
  "address",
  "city",
  "province",
  "postal_code",
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

/** A record must carry at least one of these to be emitted */
export const IDENTIFYING_FIELDS: readonly FieldName[] = [
  "business_name",
  "phone",
  "email",
  "website",
];

/** Field name → one selector expression, or several tried in order */
export type FieldSpec = Partial<Record<FieldName, string | string[]>>;

/** Raw extracted values for one card or detail page; absent = extraction miss */
export type RawFields = Partial<Record<FieldName, string>>;

export interface ListingConfig {
  item_selector: string | string[];
  fields: FieldSpec;
  detail_link_selector?: string;
  follow_links_selector?: string | string[];
}

/** One configured directory website */
export interface SourceConfig {
  name: string;
  category?: string;
  region?: string;
  enabled: boolean;
  start_urls: string[];
  listing: ListingConfig;
  detail?: { fields: FieldSpec };
  pagination?: { next_page_selector: string | string[] };
  jsonld_fallback: boolean;
}

/** Where a record came from; exported alongside the contact fields */
export interface RecordProvenance {
  source: string;
  category: string;
  region: string;
  listing_url: string;
  detail_url: string;
}

/** One finalized business contact row */
export type ContactRecord = Readonly<Record<FieldName, string> & RecordProvenance>;

/** Runtime knobs supplied by the caller, not by the source list */
export interface RunSettings {
  /** Wall-clock budget for the whole run, checked at page boundaries */
  maxRuntimeSeconds: number;
  /** Per-source record cap; 0 disables it */
  maxItems: number;
  concurrency: number;
  delayMs: number;
  requestTimeoutMs: number;
}

/** Why a source stopped crawling */
export type StopReason =
  | "exhausted"
  | "max_items"
  | "max_runtime"
  | "source_error";

/** Per-source outcome, collected into the run summary */
export interface SourceReport {
  source: string;
  records: number;
  pages_fetched: number;
  pages_failed: number;
  details_failed: number;
  stop_reason: StopReason;
  error: string | null;
}

export interface RunResult {
  records: ContactRecord[];
  reports: SourceReport[];
  elapsedMs: number;
}

/** Statistics written to summary.json after a crawl completes */
export interface CrawlSummary {
  config_file: string;
  sources_configured: number;
  sources_crawled: number;
  total_records: number;
  sources: SourceReport[];
  settings: RunSettings;
  elapsed_time: string;
  output_files: string[];
  crawled_at: string;
}
