/**
 * Feedkeeper — Feed Parser
 *
 * Turns a downloaded payload into raw entries, in document order.
 *
 * XML goes through rss-parser first. When the strict parse rejects the
 * document, a lenient xml2js pass recovers what it can (stray ampersands,
 * HTML entities, undeclared prefixes). JSON Feed is read directly.
 */

import Parser from 'rss-parser';
import * as xml2js from 'xml2js';
import { z } from 'zod';
import type { FeedDialect, ParsedFeed, RawEntry } from '../types';
import { ParseError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'parser' });

// ============================================================
// SNIFFING
// ============================================================

type PayloadKind = 'xml' | 'json' | 'unknown';

function decode(bytes: Uint8Array | string): string {
  const text = typeof bytes === 'string' ? bytes : new TextDecoder('utf-8').decode(bytes);
  return text.replace(/^\uFEFF/, '');
}

function sniff(text: string): PayloadKind {
  const first = text.trimStart().charAt(0);
  if (first === '<') return 'xml';
  if (first === '{') return 'json';
  return 'unknown';
}

/**
 * Parse a feed payload. Throws ParseError when the payload is not a
 * feed at all; entries that fail individually are only counted.
 */
export async function parseFeed(bytes: Uint8Array | string): Promise<ParsedFeed> {
  const text = decode(bytes);

  if (text.trim() === '') {
    throw new ParseError('Malformed', 'Empty body');
  }

  switch (sniff(text)) {
    case 'xml':
      return parseXml(text);
    case 'json':
      return parseJsonFeed(text);
    default:
      throw new ParseError('Unsupported', 'Payload is neither XML nor JSON');
  }
}

// ============================================================
// TEXT HELPERS
// ============================================================

/**
 * Pull text out of whatever shape a parser produced: plain strings,
 * xml2js `{ _: text }` nodes, or single-element arrays of either.
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) return value.length > 0 ? textOf(value[0]) : undefined;
  if (isRecord(value) && '_' in value) return textOf(value._);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function present(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? undefined : value;
}

/**
 * Build a RawEntry, or null when the entry has nothing to identify it.
 */
const ENTRY_FIELDS = [
  'guid',
  'link',
  'title',
  'summary',
  'published',
  'updated',
  'author',
  'source',
] as const satisfies ReadonlyArray<keyof RawEntry>;

function toEntry(fields: RawEntry): RawEntry | null {
  const entry: RawEntry = {};
  for (const key of ENTRY_FIELDS) {
    const value = present(fields[key]);
    if (value !== undefined) entry[key] = value;
  }

  if (!entry.guid && !entry.link && !entry.title) return null;
  return entry;
}

function collect<T>(items: T[], extract: (item: T) => RawEntry | null): { entries: RawEntry[]; skipped: number } {
  const entries: RawEntry[] = [];
  let skipped = 0;

  items.forEach((item, index) => {
    try {
      const entry = extract(item);
      if (entry) {
        entries.push(entry);
      } else {
        skipped++;
        log.debug('Entry skipped: no guid, link or title', { index });
      }
    } catch (error) {
      skipped++;
      log.debug('Entry skipped: extraction failed', { index, error: describeError(error) });
    }
  });

  return { entries, skipped };
}

// ============================================================
// XML: STRICT PASS (rss-parser)
// ============================================================

interface ExtraItemFields {
  id?: unknown;
  published?: unknown;
  updated?: unknown;
  'dc:date'?: unknown;
  summary?: unknown;
  author?: unknown;
  source?: unknown;
}

const rssParser = new Parser<Record<string, unknown>, ExtraItemFields>({
  customFields: {
    item: ['id', 'published', 'updated', 'dc:date', 'summary', 'author', 'source'],
  },
});

function rootOf(text: string): string | undefined {
  const withoutProlog = text
    .replace(/<\?[\s\S]*?\?>/g, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<!DOCTYPE[^>]*>/gi, '');
  const match = /<\s*([A-Za-z_][\w.:-]*)/.exec(withoutProlog);
  return match?.[1]?.toLowerCase();
}

function dialectForRoot(root: string | undefined): FeedDialect | undefined {
  switch (root) {
    case 'rss':
      return 'rss';
    case 'rdf:rdf':
      return 'rdf';
    case 'feed':
      return 'atom';
    default:
      return undefined;
  }
}

async function parseXml(text: string): Promise<ParsedFeed> {
  const dialect = dialectForRoot(rootOf(text));
  if (!dialect) {
    throw new ParseError('Unsupported', `Root element <${rootOf(text) ?? '?'}> is not RSS, RDF or Atom`);
  }

  try {
    const output = await rssParser.parseString(text);
    const { entries, skipped } = collect(output.items ?? [], item =>
      toEntry({
        guid: textOf(item.guid) ?? textOf(item.id),
        link: textOf(item.link),
        title: textOf(item.title),
        summary: textOf(item.contentSnippet) ?? textOf(item.summary) ?? textOf(item.content),
        published:
          dialect === 'atom'
            ? textOf(item.published)
            : textOf(item.pubDate) ?? textOf(item['dc:date']),
        updated: textOf(item.updated),
        author: textOf(item.creator) ?? textOf(item.author),
        source: dialect === 'atom' ? undefined : textOf(item.source),
      })
    );

    return { dialect, title: present(output.title), entries, skipped, recovered: false };
  } catch (strictError) {
    log.debug('Strict parse failed, trying lenient parse', { error: describeError(strictError) });
    return parseXmlLenient(text, dialect, strictError);
  }
}

// ============================================================
// XML: LENIENT PASS (xml2js, non-strict)
// ============================================================

type XmlNode = Record<string, unknown>;

function child(node: unknown, name: string): unknown {
  return isRecord(node) ? node[name] : undefined;
}

function children(node: unknown, name: string): XmlNode[] {
  const value = child(node, name);
  if (!Array.isArray(value)) return [];
  return value.map(item => (isRecord(item) ? item : { _: item }));
}

function attr(node: unknown, name: string): string | undefined {
  const attrs = child(node, '$');
  return isRecord(attrs) ? textOf(attrs[name]) : undefined;
}

function atomLink(entry: XmlNode): string | undefined {
  const links = children(entry, 'link');
  const alternate = links.find(link => {
    const rel = attr(link, 'rel');
    return rel === undefined || rel === 'alternate';
  });
  return attr(alternate ?? links[0], 'href');
}

function stripTags(html: string | undefined): string | undefined {
  return html?.replace(/<[^>]*>/g, ' ');
}

function lenientRssEntry(item: XmlNode): RawEntry | null {
  return toEntry({
    guid: textOf(child(item, 'guid')),
    link: textOf(child(item, 'link')) ?? attr(children(item, 'link')[0], 'rdf:resource'),
    title: textOf(child(item, 'title')),
    summary: stripTags(textOf(child(item, 'description')) ?? textOf(child(item, 'content:encoded'))),
    published: textOf(child(item, 'pubdate')) ?? textOf(child(item, 'dc:date')),
    updated: textOf(child(item, 'atom:updated')),
    author: textOf(child(item, 'dc:creator')) ?? textOf(child(item, 'author')),
    source: textOf(child(item, 'source')),
  });
}

function lenientAtomEntry(entry: XmlNode): RawEntry | null {
  const author = children(entry, 'author')[0];
  return toEntry({
    guid: textOf(child(entry, 'id')),
    link: atomLink(entry),
    title: textOf(child(entry, 'title')),
    summary: stripTags(textOf(child(entry, 'summary')) ?? textOf(child(entry, 'content'))),
    published: textOf(child(entry, 'published')) ?? textOf(child(entry, 'issued')),
    updated: textOf(child(entry, 'updated')) ?? textOf(child(entry, 'modified')),
    author: textOf(child(author, 'name')),
  });
}

async function parseXmlLenient(text: string, dialect: FeedDialect, strictError: unknown): Promise<ParsedFeed> {
  const lenient = new xml2js.Parser({
    strict: false,
    normalizeTags: true,
    attrNameProcessors: [xml2js.processors.normalize],
  });

  let document: unknown;
  try {
    document = await lenient.parseStringPromise(text);
  } catch (error) {
    throw new ParseError(
      'Malformed',
      `Unreadable XML: ${describeError(strictError)}; lenient parse: ${describeError(error)}`,
      { cause: error }
    );
  }

  let title: string | undefined;
  let items: XmlNode[];
  let extract: (item: XmlNode) => RawEntry | null;

  if (dialect === 'atom') {
    const feed = child(document, 'feed');
    title = textOf(child(feed, 'title'));
    items = children(feed, 'entry');
    extract = lenientAtomEntry;
  } else if (dialect === 'rdf') {
    const rdf = child(document, 'rdf:rdf');
    title = textOf(child(children(rdf, 'channel')[0], 'title'));
    items = children(rdf, 'item');
    extract = lenientRssEntry;
  } else {
    const channel = children(child(document, 'rss'), 'channel')[0];
    title = textOf(child(channel, 'title'));
    items = children(channel, 'item');
    extract = lenientRssEntry;
  }

  const { entries, skipped } = collect(items, extract);

  log.info('Recovered malformed feed with lenient parser', {
    dialect,
    entries: entries.length,
    skipped,
  });

  return { dialect, title: present(title), entries, skipped, recovered: true };
}

// ============================================================
// JSON FEED
// ============================================================

const JsonFeedItemSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    url: z.string().optional(),
    title: z.string().optional(),
    summary: z.string().optional(),
    content_text: z.string().optional(),
    content_html: z.string().optional(),
    date_published: z.string().optional(),
    date_modified: z.string().optional(),
    author: z.object({ name: z.string().optional() }).optional(),
    authors: z.array(z.object({ name: z.string().optional() })).optional(),
  })
  .passthrough();

const JsonFeedSchema = z.object({
  version: z.string().regex(/^https:\/\/jsonfeed\.org\/version\/1(\.\d+)?$/),
  title: z.string().optional(),
  items: z.array(z.unknown()),
});

function parseJsonFeed(text: string): ParsedFeed {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ParseError('Malformed', `Invalid JSON: ${describeError(error)}`, { cause: error });
  }

  const feed = JsonFeedSchema.safeParse(json);
  if (!feed.success) {
    throw new ParseError('Unsupported', 'JSON payload is not a JSON Feed');
  }

  const { entries, skipped } = collect(feed.data.items, raw => {
    const item = JsonFeedItemSchema.parse(raw);
    return toEntry({
      guid: item.id !== undefined ? String(item.id) : undefined,
      link: item.url,
      title: item.title,
      summary: item.summary ?? item.content_text ?? stripTags(item.content_html),
      published: item.date_published,
      updated: item.date_modified,
      author: item.authors?.[0]?.name ?? item.author?.name,
    });
  });

  return { dialect: 'json', title: present(feed.data.title), entries, skipped, recovered: false };
}
