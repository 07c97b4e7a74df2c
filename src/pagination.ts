import { absoluteUrl } from "./core/utils";
import { extractLink, Scope } from "./selector-engine";

/**
 * Resolve the next listing page from the configured "next page" selector(s).
 * Returns undefined when nothing matches, which ends pagination for the chain.
 * There is no cycle detection: a selector pointing back at the same page is
 * bounded only by the run's item and runtime caps.
 */
export function nextPageUrl(
  document: Scope,
  selector: string | string[] | undefined,
  pageUrl: string
): string | undefined {
  if (selector === undefined) return undefined;
  return absoluteUrl(pageUrl, extractLink(document, selector)?.trim());
}
