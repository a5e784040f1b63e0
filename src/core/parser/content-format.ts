import { ContentFormat } from '../domain/enums';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];
const MARKDOWN_CONTENT_TYPES = ['text/markdown', 'text/x-markdown'];

const EXTENSION_FORMATS: Record<string, ContentFormat> = {
  '.md': ContentFormat.MARKDOWN,
  '.markdown': ContentFormat.MARKDOWN,
  '.html': ContentFormat.HTML,
  '.htm': ContentFormat.HTML,
  '.txt': ContentFormat.PLAIN,
};

const HTML_SHAPE =
  /<(?:!doctype|html|head|body|article|section|div|p|a|span|ul|ol|li|h[1-6]|img|br|blockquote)\b/i;
const MARKDOWN_SHAPE = [
  /\[[^\]]*\]\([^)\s]+\)/, // [label](url)
  /^#{1,6}\s+\S/m, // heading
  /<https?:\/\/[^>\s]+>/, // autolink
  /^\s{0,3}(?:[-*+]|\d+\.)\s+\S/m, // list item
];

/**
 * Infer the format of some content.
 *
 * An HTML or Markdown Content-Type decides; otherwise the URL extension,
 * then the shape of the text.
 */
export function inferContentFormat(
  text: string,
  contentType?: string | null,
  url?: string | null,
): ContentFormat {
  const mediaType = contentType?.split(';')[0].trim().toLowerCase();
  if (mediaType && HTML_CONTENT_TYPES.includes(mediaType)) {
    return ContentFormat.HTML;
  }
  if (mediaType && MARKDOWN_CONTENT_TYPES.includes(mediaType)) {
    return ContentFormat.MARKDOWN;
  }

  const extension = url ? urlExtension(url) : null;
  if (extension && EXTENSION_FORMATS[extension]) {
    return EXTENSION_FORMATS[extension];
  }

  if (HTML_SHAPE.test(text)) {
    return ContentFormat.HTML;
  }
  if (MARKDOWN_SHAPE.some((pattern) => pattern.test(text))) {
    return ContentFormat.MARKDOWN;
  }
  return ContentFormat.PLAIN;
}

function urlExtension(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const match = /\.[a-z0-9]+$/i.exec(pathname);
  return match ? match[0].toLowerCase() : null;
}
