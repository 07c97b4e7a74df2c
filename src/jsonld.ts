import * as cheerio from "cheerio";
import { FIELD_NAMES, RawFields } from "./types";
import { normalizeField } from "./normalize";

/** schema.org types treated as a business listing */
const BUSINESS_TYPES = new Set([
  "LocalBusiness",
  "Organization",
  "ProfessionalService",
  "HomeAndConstructionBusiness",
]);

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Parse every JSON-LD script block on the page.
 * `@graph` containers and top-level arrays are flattened; blocks that fail to
 * parse are skipped.
 */
export function extractJsonLdObjects($: cheerio.CheerioAPI): unknown[] {
  const objects: unknown[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    const script = $(el).html();
    if (!script) return;
    let data: unknown;
    try {
      data = JSON.parse(script);
    } catch {
      return; // malformed block, other blocks may still be usable
    }
    if (isObject(data) && Array.isArray(data["@graph"])) {
      objects.push(...data["@graph"]);
    } else if (Array.isArray(data)) {
      objects.push(...data);
    } else {
      objects.push(data);
    }
  });
  return objects;
}

function isBusiness(obj: JsonObject): boolean {
  const type = obj["@type"];
  const types = Array.isArray(type) ? type : [type];
  return types.some((t) => typeof t === "string" && BUSINESS_TYPES.has(t));
}

/**
 * Map a schema.org business object onto contact fields.
 */
export function businessToFields(obj: JsonObject, pageUrl: string): RawFields {
  const link = obj.url ?? obj.sameAs;
  const url = asString(Array.isArray(link) ? link[0] : link);
  const address = isObject(obj.address) ? obj.address : {};

  const raw: RawFields = {
    business_name: asString(obj.name) ?? asString(obj.legalName),
    phone: asString(obj.telephone),
    email: asString(obj.email),
    website: url,
    address: asString(address.streetAddress),
    city: asString(address.addressLocality),
    province: asString(address.addressRegion),
    postal_code: asString(address.postalCode),
  };

  const fields: RawFields = {};
  for (const field of FIELD_NAMES) {
    const value = normalizeField(field, raw[field], pageUrl);
    if (value) fields[field] = value;
  }
  return fields;
}

/**
 * Contact fields of every business object on the page, in document order.
 */
export function extractJsonLdBusinesses(
  $: cheerio.CheerioAPI,
  pageUrl: string
): RawFields[] {
  return extractJsonLdObjects($)
    .filter(isObject)
    .filter(isBusiness)
    .map((obj) => businessToFields(obj, pageUrl));
}
