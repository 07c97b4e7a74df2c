import {
  ContactRecord,
  FIELD_NAMES,
  IDENTIFYING_FIELDS,
  RawFields,
  RecordProvenance,
} from "./types";
import { cleanText } from "./core/utils";
import { Scope } from "./selector-engine";
import { scanForEmail, scanForPhone } from "./email-scanner";

export interface RecordInput {
  listing: RawFields;
  /** Fields from the item's detail page, when one was fetched */
  detail?: RawFields;
  /** Structured data found on the detail page; fills gaps only */
  jsonLd?: RawFields;
  /** The listing card; absent for items discovered through followed links */
  listingScope?: Scope;
  /** Root of the fetched detail document */
  detailScope?: Scope;
  provenance: RecordProvenance;
}

/**
 * Merge listing and detail fields. A detail value replaces the listing value
 * for the same field; every value is whitespace-normalized.
 */
export function mergeFields(listing: RawFields, detail?: RawFields): RawFields {
  const merged: RawFields = {};
  for (const field of FIELD_NAMES) {
    const value = cleanText(detail?.[field]) ?? cleanText(listing[field]);
    if (value) merged[field] = value;
  }
  return merged;
}

export function hasIdentifyingField(fields: RawFields): boolean {
  return IDENTIFYING_FIELDS.some((field) => Boolean(fields[field]));
}

/**
 * Finalize one business entry.
 * Runs the email fallback against the detail document when one was fetched,
 * otherwise against the listing card, and the phone fallback against the card.
 * @returns undefined when no identifying field survives
 */
export function buildRecord(input: RecordInput): ContactRecord | undefined {
  const fields = mergeFields(input.listing, input.detail);

  if (input.jsonLd) {
    for (const field of FIELD_NAMES) {
      fields[field] ??= cleanText(input.jsonLd[field]);
    }
  }

  const emailScope = input.detailScope ?? input.listingScope;
  if (!fields.email && emailScope) {
    fields.email = scanForEmail(emailScope);
  }
  if (!fields.phone && input.listingScope) {
    fields.phone = scanForPhone(input.listingScope);
  }

  if (!hasIdentifyingField(fields)) return undefined;

  return Object.freeze({
    source: input.provenance.source,
    category: input.provenance.category,
    region: input.provenance.region,
    business_name: fields.business_name ?? "",
    phone: fields.phone ?? "",
    email: fields.email ?? "",
    website: fields.website ?? "",
    address: fields.address ?? "",
    city: fields.city ?? "",
    province: fields.province ?? "",
    postal_code: fields.postal_code ?? "",
    listing_url: input.provenance.listing_url,
    detail_url: input.provenance.detail_url,
  });
}
