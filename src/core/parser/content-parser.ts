import { Logger as NestLogger } from '@nestjs/common';
import { load } from 'cheerio';
import { marked } from 'marked';
import { ContentFormat, MentionType, parseRsvpValue } from '../domain/enums';
import { parseDate } from '../domain/models';
import { Logger } from '../interfaces';
import { inferContentFormat } from './content-format';
import { escapeHtml, scanUrls } from './link-scanner';
import {
  findCardItem,
  findEntryItem,
  parseMicroformats,
  summarizeEntry,
  toAuthorCard,
  toEntry,
} from './microformats';
import {
  AuthorCard,
  Citation,
  MentionDetails,
  MicroformatEntry,
  ParseInput,
  ParsedContent,
} from './types';
import { normalizeUrl, sameUrl } from './url.utils';

export const EXCERPT_LENGTH = 250;

const LINK_SELECTOR = 'a[href], area[href]';

/**
 * Content parser - turns plain text, Markdown or HTML into the list of URLs
 * it mentions, and reads microformats2 metadata from HTML sources
 */
export class ContentParser {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new NestLogger(ContentParser.name);
  }

  /**
   * Parse content into its links and microformats
   */
  parse(input: ParseInput): ParsedContent {
    const format = input.format ?? inferContentFormat(input.text);
    const html = this.render(input.text, format);
    const { entry, card } =
      format === ContentFormat.PLAIN
        ? { entry: null, card: null }
        : this.readMicroformats(html, input.baseUrl);

    return {
      format,
      html,
      links: Array.from(
        this.collectLinks(input.text, format, html, input.baseUrl, entry),
      ),
      entry,
      card,
    };
  }

  /**
   * Lazily yield the normalized absolute URLs the content links to,
   * deduplicated and without links back to `baseUrl`
   */
  *links(input: ParseInput): Generator<string, void, undefined> {
    const format = input.format ?? inferContentFormat(input.text);
    const html = this.render(input.text, format);
    const entry =
      format === ContentFormat.PLAIN
        ? null
        : this.readMicroformats(html, input.baseUrl).entry;
    yield* this.collectLinks(input.text, format, html, input.baseUrl, entry);
  }

  /**
   * HTML rendition of the content
   */
  render(text: string, format: ContentFormat): string {
    switch (format) {
      case ContentFormat.HTML:
        return text;
      case ContentFormat.MARKDOWN: {
        const rendered = marked.parse(text, { gfm: true });
        if (typeof rendered !== 'string') {
          throw new Error('Markdown rendering returned a promise');
        }
        return rendered;
      }
      case ContentFormat.PLAIN:
        return escapeHtml(text);
    }
  }

  /**
   * Whether the content links to `target`.
   * Link attributes and bare URLs are compared after normalization, with a
   * raw substring check as the last resort.
   */
  mentionsTarget(
    text: string,
    format: ContentFormat,
    sourceUrl: string,
    target: string,
  ): boolean {
    const normalizedTarget = normalizeUrl(target);
    if (normalizedTarget) {
      const candidates =
        format === ContentFormat.PLAIN
          ? scanUrls(text)
          : this.linkAttributes(this.render(text, format));
      const found = candidates.some(
        (candidate) => normalizeUrl(candidate, sourceUrl) === normalizedTarget,
      );
      if (found) {
        return true;
      }
    }
    return text.includes(target);
  }

  /**
   * Read the metadata of a source document for one target
   */
  extractMentionDetails(
    html: string,
    sourceUrl: string,
    targetUrl: string,
  ): MentionDetails {
    const details: MentionDetails = {
      mentionType: MentionType.MENTION,
      rsvp: null,
      title: null,
      content: null,
      excerpt: null,
      published: null,
      authorName: null,
      authorUrl: null,
      authorPhoto: null,
      metadata: {},
    };

    const { entry, card } = this.readMicroformats(html, sourceUrl);
    if (entry) {
      this.fillFromEntry(details, entry, sourceUrl, targetUrl);
    }
    if (!details.authorName && !details.authorUrl && !details.authorPhoto) {
      this.fillAuthor(details, card);
    }

    this.fillFromHtml(details, html);

    if (!details.excerpt && details.content) {
      details.excerpt = toExcerpt(details.content);
    }
    return details;
  }

  private readMicroformats(
    html: string,
    baseUrl: string,
  ): { entry: MicroformatEntry | null; card: AuthorCard | null } {
    const document = parseMicroformats(html, baseUrl);
    if (!document) {
      this.logger.debug(`Could not parse microformats for ${baseUrl}`);
      return { entry: null, card: null };
    }

    const entryItem = findEntryItem(document);
    const cardItem = findCardItem(document);
    return {
      entry: entryItem ? toEntry(entryItem) : null,
      card: cardItem ? toAuthorCard(cardItem) : null,
    };
  }

  private *collectLinks(
    text: string,
    format: ContentFormat,
    html: string,
    baseUrl: string,
    entry: MicroformatEntry | null,
  ): Generator<string, void, undefined> {
    const self = normalizeUrl(baseUrl);
    const seen = new Set<string>();
    const raw =
      format === ContentFormat.PLAIN
        ? scanUrls(text)
        : [...this.linkAttributes(html, LINK_SELECTOR), ...entryUrls(entry)];

    for (const href of raw) {
      const url = normalizeUrl(href, baseUrl);
      if (!url || url === self || seen.has(url)) {
        continue;
      }
      seen.add(url);
      yield url;
    }
  }

  private linkAttributes(html: string, selector = '[href], [src]'): string[] {
    const $ = load(html);
    return $(selector)
      .toArray()
      .flatMap((element) => {
        const node = $(element);
        return [node.attr('href'), node.attr('src')];
      })
      .filter((value): value is string => typeof value === 'string');
  }

  private fillFromEntry(
    details: MentionDetails,
    entry: MicroformatEntry,
    sourceUrl: string,
    targetUrl: string,
  ): void {
    details.title = entry.name;
    details.content = entry.content;
    details.excerpt = entry.summary;
    details.published = parseDate(entry.published);
    this.fillAuthor(details, entry.author);

    const classification = classifyMention(entry, sourceUrl, targetUrl);
    details.mentionType = classification.mentionType;
    details.rsvp = classification.rsvp;

    details.metadata.mf2 = summarizeEntry(entry);
    if (entry.comments.length > 0) {
      details.metadata.comments = entry.comments;
    }
  }

  private fillAuthor(details: MentionDetails, author: AuthorCard | null): void {
    if (!author) {
      return;
    }
    details.authorName = author.name;
    details.authorUrl = author.url;
    details.authorPhoto = author.photo;
  }

  private fillFromHtml(details: MentionDetails, html: string): void {
    const $ = load(html);
    const meta = (selector: string): string | null =>
      $(selector).first().attr('content')?.trim() || null;

    details.title ??=
      meta('meta[property="og:title"]') ??
      meta('meta[name="twitter:title"]') ??
      ($('title').first().text().trim() || null);
    details.authorName ??= meta('meta[name="author"]');
    details.published ??= parseDate(
      meta('meta[property="article:published_time"]'),
    );
    details.content ??= meta('meta[property="og:description"]');
  }
}

/**
 * Mention type for one target.
 * RSVP > reply > repost > like > bookmark > follow > location > mention
 */
export function classifyMention(
  entry: MicroformatEntry,
  sourceUrl: string,
  targetUrl: string,
): Pick<MentionDetails, 'mentionType' | 'rsvp'> {
  const cites = (citations: Citation[]): boolean =>
    citations.some(
      (citation) =>
        citation.url !== null && sameUrl(citation.url, targetUrl, sourceUrl),
    );

  if (entry.rsvp && cites(entry.inReplyTo)) {
    return { mentionType: MentionType.RSVP, rsvp: parseRsvpValue(entry.rsvp) };
  }

  const ordered: Array<[Citation[], MentionType]> = [
    [entry.inReplyTo, MentionType.REPLY],
    [entry.repostOf, MentionType.REPOST],
    [entry.likeOf, MentionType.LIKE],
    [entry.bookmarkOf, MentionType.BOOKMARK],
    [entry.followOf, MentionType.FOLLOW],
  ];
  for (const [citations, mentionType] of ordered) {
    if (cites(citations)) {
      return { mentionType, rsvp: null };
    }
  }

  const locationUrl = entry.location?.url;
  if (locationUrl && sameUrl(locationUrl, targetUrl, sourceUrl)) {
    return { mentionType: MentionType.LOCATION, rsvp: null };
  }
  return { mentionType: MentionType.MENTION, rsvp: null };
}

/**
 * Collapse whitespace and truncate
 */
export function toExcerpt(text: string, length = EXCERPT_LENGTH): string | null {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed ? collapsed.slice(0, length) : null;
}

function entryUrls(entry: MicroformatEntry | null): string[] {
  if (!entry) {
    return [];
  }
  return [
    ...entry.inReplyTo,
    ...entry.likeOf,
    ...entry.repostOf,
    ...entry.bookmarkOf,
    ...entry.followOf,
  ]
    .map((citation) => citation.url)
    .filter((url): url is string => url !== null);
}
