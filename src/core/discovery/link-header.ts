/**
 * One link-value of an RFC 8288 `Link` header
 */
export interface LinkHeaderEntry {
  url: string;
  rel: string[];
  params: Record<string, string>;
}

export const WEBMENTION_REL = 'webmention';

/**
 * Parse a `Link` header into its link-values.
 * Accepts several links, quoted or bare parameters and multiple rel tokens.
 */
export function parseLinkHeader(
  value: string | null | undefined,
): LinkHeaderEntry[] {
  if (!value) {
    return [];
  }

  const entries: LinkHeaderEntry[] = [];
  let position = 0;
  while (position < value.length) {
    const open = value.indexOf('<', position);
    if (open === -1) {
      break;
    }
    const close = value.indexOf('>', open);
    if (close === -1) {
      break;
    }

    const end = findLinkEnd(value, close + 1);
    const params = parseParams(value.slice(close + 1, end));
    entries.push({
      url: value.slice(open + 1, close).trim(),
      rel: (params.rel ?? '')
        .split(/\s+/)
        .map((token) => token.toLowerCase())
        .filter(Boolean),
      params,
    });
    position = end + 1;
  }
  return entries;
}

/**
 * URL of the first link carrying `rel`, or null
 */
export function findRelLink(
  value: string | null | undefined,
  rel: string,
): string | null {
  const wanted = rel.toLowerCase();
  const entry = parseLinkHeader(value).find((link) => link.rel.includes(wanted));
  return entry ? entry.url : null;
}

/**
 * `Link` header value advertising a Webmention endpoint
 */
export function formatWebmentionLink(endpoint: string): string {
  return `<${endpoint}>; rel="${WEBMENTION_REL}"`;
}

/**
 * Append a link-value to an existing `Link` header unless already present
 */
export function appendLinkHeader(
  existing: string | null | undefined,
  toAdd: string,
): string {
  if (!existing) {
    return toAdd;
  }
  if (existing.includes(toAdd)) {
    return existing;
  }
  return `${existing}, ${toAdd}`;
}

/**
 * Index of the comma ending the link-value that starts at `from`,
 * ignoring commas inside quoted strings
 */
function findLinkEnd(value: string, from: number): number {
  let quoted = false;
  for (let index = from; index < value.length; index++) {
    const char = value[index];
    if (char === '\\' && quoted) {
      index++;
    } else if (char === '"') {
      quoted = !quoted;
    } else if (char === ',' && !quoted) {
      return index;
    }
  }
  return value.length;
}

function parseParams(segment: string): Record<string, string> {
  const params: Record<string, string> = {};
  for (const part of splitOutsideQuotes(segment, ';')) {
    const separator = part.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const name = part.slice(0, separator).trim().toLowerCase();
    let paramValue = part.slice(separator + 1).trim();
    if (paramValue.startsWith('"') && paramValue.endsWith('"') && paramValue.length >= 2) {
      paramValue = paramValue.slice(1, -1).replace(/\\(.)/g, '$1');
    }
    // first occurrence wins
    if (name && !(name in params)) {
      params[name] = paramValue;
    }
  }
  return params;
}

function splitOutsideQuotes(segment: string, separator: string): string[] {
  const parts: string[] = [];
  let quoted = false;
  let current = '';
  for (const char of segment) {
    if (char === '"') {
      quoted = !quoted;
    }
    if (char === separator && !quoted) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  parts.push(current);
  return parts;
}
