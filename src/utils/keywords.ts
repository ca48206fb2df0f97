/**
 * Keyword matching shared by the offline classifier and handoff triggers.
 *
 * A keyword matches at the start of a word, so "charge" also hits
 * "charged" and "charges" but not "surcharge".
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function normalizeText(text: string): string {
  return text.trim().toLowerCase();
}

export function matchesKeyword(text: string, keyword: string): boolean {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword.toLowerCase())}`);
  return pattern.test(normalizeText(text));
}

/**
 * Keywords from `keywords` that occur in `text`, in list order.
 */
export function findKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter(keyword => matchesKeyword(text, keyword));
}
