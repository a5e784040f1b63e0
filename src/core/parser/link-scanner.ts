const URL_PATTERN = /https?:\/\/[^\s<>"'`]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?*_]+$/;

const CLOSERS: Record<string, string> = { ')': '(', ']': '[' };

/**
 * Find bare http(s) URLs in plain text, in order of appearance.
 * Trailing punctuation and unbalanced closing brackets are not part of a URL.
 */
export function scanUrls(text: string): string[] {
  return Array.from(text.matchAll(URL_PATTERN), (match) => trimUrl(match[0]));
}

function trimUrl(raw: string): string {
  let url = raw;
  let changed = true;
  while (changed) {
    changed = false;
    const stripped = url.replace(TRAILING_PUNCTUATION, '');
    if (stripped !== url) {
      url = stripped;
      changed = true;
    }
    const last = url.charAt(url.length - 1);
    const opener = CLOSERS[last];
    if (opener && count(url, opener) < count(url, last)) {
      url = url.slice(0, -1);
      changed = true;
    }
  }
  return url;
}

function count(value: string, char: string): number {
  return value.split(char).length - 1;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
