import type { AnyNode } from "domhandler";
import { hasChildren, isTag, isText } from "domhandler";
import { Scope, selectWithin } from "./selector-engine";
import { normalizeEmail, normalizePhone } from "./normalize";

const EMAIL_RE = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;
const PHONE_RE = /\+?1?[\s\-.]?\(?\d{3}\)?[\s\-.]?\d{3}[\s\-.]?\d{4}/;

/** Elements whose text is never rendered */
const HIDDEN_TAGS = new Set(["script", "style", "noscript", "template"]);

function collectText(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
    } else if (isTag(node) && HIDDEN_TAGS.has(node.name)) {
      continue;
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/**
 * Rendered text of a scope in document order.
 * Text nodes are joined with spaces so adjacent elements never fuse into one token.
 */
export function visibleText(scope: Scope): string {
  const parts: string[] = [];
  collectText(scope.toArray(), parts);
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

/**
 * Find an email address when no selector produced one.
 * The first `mailto:` link wins; otherwise the first email-shaped token in the
 * visible text.
 */
export function scanForEmail(scope: Scope): string | undefined {
  const mailto = selectWithin(scope, "a[href]")
    .toArray()
    .map((el) => el.attribs.href.trim())
    .find((href) => href.toLowerCase().startsWith("mailto:"));
  if (mailto) {
    const email = normalizeEmail(mailto);
    if (email) return email;
  }

  return EMAIL_RE.exec(visibleText(scope))?.[0];
}

/** First North American phone number in the visible text, whitespace removed */
export function scanForPhone(scope: Scope): string | undefined {
  const match = PHONE_RE.exec(visibleText(scope));
  return match ? normalizePhone(match[0]) : undefined;
}
