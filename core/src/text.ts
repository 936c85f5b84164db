const BULLET_PATTERN = /^\s*(?:[-*•+]|\d{1,3}[.)]|[a-z][.)])\s+/;
const CHECKBOX_PATTERN = /^\[[ xX]?\]\s*/;

export function hasListMarker(text: string): boolean {
  return BULLET_PATTERN.test(text) || CHECKBOX_PATTERN.test(text.trim());
}

/** Remove one enumeration marker (`1.`, `a)`, `-`, `•`) and an optional checkbox. */
export function stripListMarker(text: string): string {
  return text.replace(BULLET_PATTERN, "").trim().replace(CHECKBOX_PATTERN, "").trim();
}

export function isIndented(text: string): boolean {
  return /^[ \t]+\S/.test(text);
}

/** Heading text without markdown markers, emphasis or trailing colon. */
export function cleanHeading(text: string): string {
  return text
    .trim()
    .replace(/^#{1,6}\s*/, "")
    .replace(/\*\*|__/g, "")
    .trim()
    .replace(/:$/, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function normalizeHeading(text: string): string {
  return cleanHeading(text).toLowerCase();
}
