import type { mf2 } from 'microformats-parser';
import { ContentFormat, MentionType, RsvpValue } from '../domain/enums';

/**
 * Raw microformats2 document as returned by microformats-parser
 */
export type ParsedMicroformats = ReturnType<typeof mf2>;
export type MicroformatItem = ParsedMicroformats['items'][number];
export type MicroformatValue = MicroformatItem['properties'][string][number];

/**
 * Input accepted by the content parser
 */
export interface ParseInput {
  text: string;
  /**
   * Inferred from the text when omitted
   */
  format?: ContentFormat;
  /**
   * Absolute URL of the content; links are resolved against it and
   * links pointing back to it are dropped
   */
  baseUrl: string;
}

/**
 * Author information from an h-card
 */
export interface AuthorCard {
  name: string | null;
  url: string | null;
  photo: string | null;
}

/**
 * A referenced post, either a bare URL or an embedded h-cite
 */
export interface Citation {
  url: string | null;
  name: string | null;
  content: string | null;
  author: AuthorCard | null;
}

export interface LocationInfo {
  type: string[];
  name: string | null;
  url: string | null;
  latitude: string | null;
  longitude: string | null;
}

export interface EntryComment {
  type: string[];
  name: string | null;
  url: string | null;
  published: string | null;
  content: string | null;
  author: AuthorCard | null;
}

/**
 * The parts of an h-entry the engine uses
 */
export interface MicroformatEntry {
  type: string[];
  name: string | null;
  content: string | null;
  contentHtml: string | null;
  summary: string | null;
  published: string | null;
  url: string | null;
  uid: string | null;
  inReplyTo: Citation[];
  likeOf: Citation[];
  repostOf: Citation[];
  bookmarkOf: Citation[];
  followOf: Citation[];
  rsvp: string | null;
  location: LocationInfo | null;
  category: string[];
  syndication: string[];
  photo: string[];
  comments: EntryComment[];
  author: AuthorCard | null;
}

/**
 * Result of ContentParser.parse
 */
export interface ParsedContent {
  format: ContentFormat;
  /**
   * HTML rendition of the content (escaped for plain text)
   */
  html: string;
  links: string[];
  entry: MicroformatEntry | null;
  card: AuthorCard | null;
}

/**
 * Metadata extracted from a source for one specific target
 */
export interface MentionDetails {
  mentionType: MentionType;
  rsvp: RsvpValue | null;
  title: string | null;
  content: string | null;
  excerpt: string | null;
  published: Date | null;
  authorName: string | null;
  authorUrl: string | null;
  authorPhoto: string | null;
  metadata: Record<string, unknown>;
}
