/**
 * Normalizes text for matching by:
 * - converting to lowercase
 * - replacing punctuation with spaces
 * - collapsing whitespace (including line breaks) to a single space
 * - trimming leading/trailing spaces
 */
export function normalizeTextForMatching(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeTextForMatching(text);
  return normalized.length === 0 ? [] : normalized.split(' ');
}

export function toDisplayName(name: string): string {
  return name
    .split('_')
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch]);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * HTML-escapes text and wraps case-insensitive occurrences of term in <mark>.
 * Matching runs on the raw text so escaping cannot split a match.
 */
export function highlight(text: string, term?: string): string {
  const needle = term?.trim();
  if (!needle) {
    return escapeHtml(text);
  }
  const pattern = new RegExp(escapeRegExp(needle), 'gi');
  let result = '';
  let last = 0;
  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    result += escapeHtml(text.slice(last, index)) + `<mark>${escapeHtml(match[0])}</mark>`;
    last = index + match[0].length;
  }
  return result + escapeHtml(text.slice(last));
}
