const HTTP_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Resolve `href` against `base` and normalize it for comparison:
 * http(s) only, fragment removed. Returns null for anything else.
 */
export function normalizeUrl(href: string, base?: string): string | null {
  const trimmed = href.trim();
  let url: URL;
  try {
    url = base === undefined ? new URL(trimmed) : new URL(trimmed, base);
  } catch {
    return null;
  }
  if (!HTTP_PROTOCOLS.has(url.protocol)) {
    return null;
  }
  url.hash = '';
  return url.toString();
}

export function sameUrl(a: string, b: string, base?: string): boolean {
  const left = normalizeUrl(a, base);
  return left !== null && left === normalizeUrl(b, base);
}

/**
 * Whether `url` lives under `baseUrl`: same origin, and a path equal to or
 * below the base path
 */
export function isUnderBaseUrl(url: string, baseUrl: string): boolean {
  const normalized = normalizeUrl(url);
  const base = normalizeUrl(baseUrl);
  if (!normalized || !base) {
    return false;
  }

  const candidate = new URL(normalized);
  const root = new URL(base);
  if (candidate.origin !== root.origin) {
    return false;
  }

  const rootPath = root.pathname.endsWith('/')
    ? root.pathname
    : `${root.pathname}/`;
  return (
    candidate.pathname === root.pathname ||
    `${candidate.pathname}/` === rootPath ||
    candidate.pathname.startsWith(rootPath)
  );
}
