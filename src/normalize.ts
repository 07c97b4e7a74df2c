import { FieldName } from "./types";
import { absoluteUrl, cleanText } from "./core/utils";

/** Strip a `tel:` scheme and all whitespace */
export function normalizePhone(raw: string | undefined): string | undefined {
  let phone = cleanText(raw);
  if (!phone) return undefined;
  if (phone.toLowerCase().startsWith("tel:")) phone = phone.slice(4);
  return phone.replace(/\s+/g, "") || undefined;
}

/** Strip a `mailto:` scheme and any `?subject=...` query */
export function normalizeEmail(raw: string | undefined): string | undefined {
  let email = cleanText(raw);
  if (!email) return undefined;
  if (email.toLowerCase().startsWith("mailto:")) {
    email = email.slice(7).split("?", 1)[0];
  }
  return cleanText(email);
}

/**
 * Normalize one extracted value for its field.
 * Website links are resolved against the page they were found on.
 */
export function normalizeField(
  field: FieldName,
  raw: string | undefined,
  pageUrl: string
): string | undefined {
  switch (field) {
    case "phone":
      return normalizePhone(raw);
    case "email":
      return normalizeEmail(raw);
    case "website": {
      const href = cleanText(raw);
      if (!href) return undefined;
      return /^https?:\/\//i.test(href) ? href : absoluteUrl(pageUrl, href);
    }
    default:
      return cleanText(raw);
  }
}
