import { mf2 } from 'microformats-parser';
import {
  AuthorCard,
  Citation,
  EntryComment,
  LocationInfo,
  MicroformatEntry,
  MicroformatItem,
  MicroformatValue,
  ParsedMicroformats,
} from './types';

/**
 * Parse microformats2 markup, or null when the document cannot be parsed
 */
export function parseMicroformats(
  html: string,
  baseUrl: string,
): ParsedMicroformats | null {
  try {
    return mf2(html, { baseUrl });
  } catch {
    return null;
  }
}

/**
 * First h-entry: top-level, else a child of a top-level item (h-feed)
 */
export function findEntryItem(
  document: ParsedMicroformats,
): MicroformatItem | null {
  const topLevel = document.items.find((item) => hasType(item, 'h-entry'));
  if (topLevel) {
    return topLevel;
  }
  for (const item of document.items) {
    const child = (item.children ?? []).find((c) => hasType(c, 'h-entry'));
    if (child) {
      return child;
    }
  }
  return null;
}

/**
 * First top-level h-card
 */
export function findCardItem(
  document: ParsedMicroformats,
): MicroformatItem | null {
  return document.items.find((item) => hasType(item, 'h-card')) ?? null;
}

export function hasType(item: MicroformatItem, type: string): boolean {
  return (item.type ?? []).includes(type);
}

/**
 * Flatten a property value to a string: the text of an html value, the URL
 * of an image, the value or url of an embedded item
 */
export function valueToString(
  value: MicroformatValue | undefined,
): string | null {
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if ('properties' in value) {
    if (typeof value.value === 'string' && value.value) {
      return value.value;
    }
    return firstString(value.properties.url);
  }
  return value.value ?? null;
}

export function firstString(
  values: MicroformatValue[] | undefined,
): string | null {
  return valueToString(values?.[0]);
}

export function allStrings(values: MicroformatValue[] | undefined): string[] {
  return (values ?? [])
    .map((value) => valueToString(value))
    .filter((value): value is string => value !== null && value !== '');
}

/**
 * Plain text and markup of an e-* property
 */
function readContent(values: MicroformatValue[] | undefined): {
  text: string | null;
  html: string | null;
} {
  const first = values?.[0];
  if (first === undefined) {
    return { text: null, html: null };
  }
  if (typeof first === 'object' && 'html' in first) {
    return { text: first.value || null, html: first.html || null };
  }
  return { text: valueToString(first), html: null };
}

export function toAuthorCard(
  value: MicroformatValue | undefined,
): AuthorCard | null {
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return { name: null, url: value, photo: null };
  }
  if ('properties' in value) {
    return {
      name: firstString(value.properties.name),
      url: firstString(value.properties.url),
      photo: firstString(value.properties.photo),
    };
  }
  return { name: value.value ?? null, url: null, photo: null };
}

function toCitation(value: MicroformatValue): Citation {
  if (typeof value === 'object' && 'properties' in value) {
    return {
      url: valueToString(value),
      name: firstString(value.properties.name),
      content: readContent(value.properties.content).text,
      author: toAuthorCard(value.properties.author?.[0]),
    };
  }
  return { url: valueToString(value), name: null, content: null, author: null };
}

function toLocation(value: MicroformatValue | undefined): LocationInfo | null {
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'object' && 'properties' in value) {
    return {
      type: value.type ?? [],
      name: firstString(value.properties.name),
      url: firstString(value.properties.url),
      latitude: firstString(value.properties.latitude),
      longitude: firstString(value.properties.longitude),
    };
  }
  return {
    type: [],
    name: null,
    url: valueToString(value),
    latitude: null,
    longitude: null,
  };
}

function toComment(value: MicroformatValue): EntryComment {
  if (typeof value === 'object' && 'properties' in value) {
    return {
      type: value.type ?? [],
      name: firstString(value.properties.name),
      url: firstString(value.properties.url),
      published: firstString(value.properties.published),
      content: readContent(value.properties.content).text,
      author: toAuthorCard(value.properties.author?.[0]),
    };
  }
  return {
    type: [],
    name: null,
    url: valueToString(value),
    published: null,
    content: null,
    author: null,
  };
}

/**
 * Read the properties of an h-entry
 */
export function toEntry(item: MicroformatItem): MicroformatEntry {
  const props = item.properties;
  const content = readContent(props.content);
  const citations = (name: string): Citation[] =>
    (props[name] ?? []).map((value) => toCitation(value));

  return {
    type: item.type ?? [],
    name: firstString(props.name),
    content: content.text,
    contentHtml: content.html,
    summary: firstString(props.summary),
    published: firstString(props.published),
    url: firstString(props.url),
    uid: firstString(props.uid),
    inReplyTo: citations('in-reply-to'),
    likeOf: citations('like-of'),
    repostOf: citations('repost-of'),
    bookmarkOf: citations('bookmark-of'),
    followOf: citations('follow-of'),
    rsvp: firstString(props.rsvp),
    location: toLocation(props.location?.[0] ?? props.checkin?.[0]),
    category: allStrings(props.category),
    syndication: allStrings(props.syndication),
    photo: allStrings(props.photo),
    comments: (props.comment ?? []).map((value) => toComment(value)),
    author: toAuthorCard(props.author?.[0]),
  };
}

/**
 * JSON-safe summary stored under `metadata.mf2`
 */
export function summarizeEntry(entry: MicroformatEntry): Record<string, unknown> {
  const urls = (citations: Citation[]): string[] =>
    citations
      .map((citation) => citation.url)
      .filter((url): url is string => url !== null);

  return {
    type: entry.type,
    url: entry.url,
    uid: entry.uid,
    category: entry.category,
    syndication: entry.syndication,
    rsvp: entry.rsvp,
    inReplyTo: urls(entry.inReplyTo),
    likeOf: urls(entry.likeOf),
    repostOf: urls(entry.repostOf),
    bookmarkOf: urls(entry.bookmarkOf),
    followOf: urls(entry.followOf),
    photo: entry.photo,
    location: entry.location,
  };
}
