import * as cheerio from "cheerio";
import type { AnyNode, Element } from "domhandler";
import { isTag, isText } from "domhandler";
import { FIELD_NAMES, FieldName, FieldSpec, RawFields } from "./types";
import { ConfigurationError } from "./core/errors";
import { getErrorMessage, listify } from "./core/utils";
import { normalizeField } from "./normalize";

/** A whole document (`$.root()`) or a single listing card */
export type Scope = cheerio.Cheerio<AnyNode>;

/**
 * What to read from the first matched element.
 * `text` is the full text content, `own-text` only the element's direct text nodes.
 */
export type SelectorTarget =
  | { kind: "text" }
  | { kind: "own-text" }
  | { kind: "attr"; name: string };

export interface ParsedSelector {
  css: string;
  /** null when the expression has no suffix and the caller's default applies */
  target: SelectorTarget | null;
}

const TEXT: SelectorTarget = { kind: "text" };
const HREF: SelectorTarget = { kind: "attr", name: "href" };

const SUFFIX_RE = /::(?:text|attr\(\s*([^()\s]+)\s*\))\s*$/;

/**
 * Split `"a.phone::attr(href)"` into its CSS part and extraction target.
 * Recognized suffixes: `::text` and `::attr(name)`.
 */
export function parseSelector(expression: string): ParsedSelector {
  const trimmed = expression.trim();
  const match = SUFFIX_RE.exec(trimmed);
  if (!match) return { css: trimmed, target: null };

  const css = trimmed.slice(0, match.index).trim();
  const target: SelectorTarget = match[1]
    ? { kind: "attr", name: match[1] }
    : { kind: "own-text" };
  return { css, target };
}

/**
 * Match a CSS selector against the scope's elements and their descendants, in
 * document order. A card scope can therefore match itself, as when the cards
 * are the links. Selector syntax errors become configuration errors.
 */
export function selectWithin(scope: Scope, css: string): cheerio.Cheerio<Element> {
  try {
    const descendants = scope.find(css);
    const self = scope.filter((_, node): node is Element => isTag(node)).filter(css);
    return self.length > 0 ? self.add(descendants) : descendants;
  } catch (err) {
    throw new ConfigurationError(`Invalid selector "${css}"`, [
      getErrorMessage(err),
    ]);
  }
}

let probe: cheerio.CheerioAPI | undefined;

/**
 * Check a selector expression without fetching anything.
 * @returns a description of the problem, or undefined when it compiles
 */
export function validateSelector(expression: string): string | undefined {
  const { css } = parseSelector(expression);
  if (!css) return `"${expression}" has no CSS selector before its suffix`;

  probe ??= cheerio.load("<html><body></body></html>");
  try {
    selectWithin(probe.root(), css);
    return undefined;
  } catch (err) {
    return `"${expression}": ${
      err instanceof ConfigurationError ? err.issues.join("; ") : getErrorMessage(err)
    }`;
  }
}

function readTarget(el: cheerio.Cheerio<Element>, target: SelectorTarget): string | undefined {
  switch (target.kind) {
    case "text":
      return el.text();
    case "own-text":
      return el
        .contents()
        .filter((_, node) => isText(node))
        .text();
    case "attr":
      return el.attr(target.name);
  }
}

/**
 * Apply one or more selector expressions to a scope; the first expression whose
 * first matching element yields a non-blank value wins.
 */
export function extractValue(
  scope: Scope,
  expressions: string | string[] | undefined,
  defaultTarget: SelectorTarget = TEXT
): string | undefined {
  for (const expression of listify(expressions)) {
    const { css, target } = parseSelector(expression);
    const el = selectWithin(scope, css).first();
    if (el.length === 0) continue;

    const value = readTarget(el, target ?? defaultTarget);
    if (value && value.trim() !== "") return value;
  }
  return undefined;
}

/** Same as extractValue, reading the `href` attribute unless told otherwise */
export function extractLink(
  scope: Scope,
  expressions: string | string[] | undefined
): string | undefined {
  return extractValue(scope, expressions, HREF);
}

/**
 * Every `href` matched by the expressions, in document order per expression.
 */
export function extractLinks(
  scope: Scope,
  expressions: string | string[] | undefined
): string[] {
  const links: string[] = [];
  for (const expression of listify(expressions)) {
    const { css, target } = parseSelector(expression);
    const resolved = target ?? HREF;
    const matches = selectWithin(scope, css);
    for (let i = 0; i < matches.length; i++) {
      const value = readTarget(matches.eq(i), resolved)?.trim();
      if (value) links.push(value);
    }
  }
  return links;
}

/**
 * All elements matched by the item selector(s): the listing cards of a page.
 */
export function selectAll(
  scope: Scope,
  expressions: string | string[]
): cheerio.Cheerio<Element>[] {
  const cards: cheerio.Cheerio<Element>[] = [];
  for (const expression of listify(expressions)) {
    const matches = selectWithin(scope, parseSelector(expression).css);
    for (let i = 0; i < matches.length; i++) {
      cards.push(matches.eq(i));
    }
  }
  return cards;
}

/**
 * Extract every configured field from a scope.
 * Misses are left out of the result; `website` defaults to the `href` attribute.
 */
export function extractFields(
  scope: Scope,
  fieldSpec: FieldSpec | undefined,
  pageUrl: string
): RawFields {
  const fields: RawFields = {};
  if (!fieldSpec) return fields;

  for (const field of FIELD_NAMES) {
    const expressions = fieldSpec[field];
    if (expressions === undefined) continue;

    const raw = extractValue(scope, expressions, defaultTargetFor(field));
    const value = normalizeField(field, raw, pageUrl);
    if (value) fields[field] = value;
  }
  return fields;
}

function defaultTargetFor(field: FieldName): SelectorTarget {
  return field === "website" ? HREF : TEXT;
}
