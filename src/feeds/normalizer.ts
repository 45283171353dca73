/**
 * Feedkeeper — Item Normalizer
 *
 * Converts raw parser entries into the canonical FeedItem: cleaned text,
 * a UTC timestamp and a content fingerprint used for deduplication.
 */

import { createHash } from 'crypto';
import type { FeedItem, RawEntry, TimestampDowngrade, TimestampSource } from '../types';

export interface NormalizedEntry {
  item: FeedItem;
  downgrade?: TimestampDowngrade;
}

// ============================================================
// TIMESTAMPS
// ============================================================

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Offsets in minutes east of UTC */
const ZONES: Record<string, number> = {
  UT: 0, UTC: 0, GMT: 0, Z: 0,
  EST: -300, EDT: -240,
  CST: -360, CDT: -300,
  MST: -420, MDT: -360,
  PST: -480, PDT: -420,
};

const ISO_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)\s*(Z|[+-]\d{2}:?\d{2})?)?$/i;

const RFC822_PATTERN =
  /^(?:[A-Za-z]{3,},?\s+)?(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\.?\s+(\d{2,4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([A-Za-z]{1,4}|[+-]\d{4})?$/;

function parseIso(value: string): number | undefined {
  const match = ISO_PATTERN.exec(value);
  if (!match) return undefined;

  const [, date, time, zone] = match;
  if (!time) {
    const ms = Date.parse(`${date}T00:00:00Z`);
    return Number.isNaN(ms) ? undefined : ms;
  }

  let offset = 'Z';
  if (zone && zone.toUpperCase() !== 'Z') {
    offset = zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  }

  const ms = Date.parse(`${date}T${time}${offset}`);
  return Number.isNaN(ms) ? undefined : ms;
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (zone === undefined) return 0;

  const numeric = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  if (numeric) {
    const [, sign, hours, minutes] = numeric;
    const total = Number(hours) * 60 + Number(minutes);
    return sign === '-' ? -total : total;
  }

  // Abbreviations outside the table are ambiguous; read them as UTC
  return ZONES[zone.toUpperCase()] ?? 0;
}

function parseRfc822(value: string): number | undefined {
  const match = RFC822_PATTERN.exec(value);
  if (!match) return undefined;

  const [, dayStr, monthStr, yearStr, hourStr, minuteStr, secondStr, zone] = match;
  const month = MONTHS[(monthStr ?? '').toLowerCase()];
  const offset = zoneOffsetMinutes(zone);
  if (month === undefined) return undefined;

  let year = Number(yearStr);
  if ((yearStr ?? '').length === 2) year += year < 50 ? 2000 : 1900;

  const day = Number(dayStr);
  const hour = Number(hourStr);
  const minute = Number(minuteStr);
  const second = secondStr === undefined ? 0 : Number(secondStr);
  if (day < 1 || day > 31 || hour > 23 || minute > 59 || second > 60) return undefined;

  return Date.UTC(year, month, day, hour, minute, second) - offset * 60_000;
}

/**
 * Parse a feed timestamp into epoch milliseconds. Accepts ISO 8601 and
 * RFC 822 dates; a timestamp without a zone, or with a zone name outside
 * the table, is read as UTC.
 */
export function parseTimestamp(value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  return parseIso(trimmed) ?? parseRfc822(trimmed);
}

// ============================================================
// TEXT
// ============================================================

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, code: string) => {
    if (code.startsWith('#x') || code.startsWith('#X')) {
      const point = parseInt(code.slice(2), 16);
      return Number.isNaN(point) ? whole : String.fromCodePoint(point);
    }
    if (code.startsWith('#')) {
      const point = parseInt(code.slice(1), 10);
      return Number.isNaN(point) ? whole : String.fromCodePoint(point);
    }
    return ENTITIES[code.toLowerCase()] ?? whole;
  });
}

export function normalizeWhitespace(text: string | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

export function stripHtml(text: string | undefined): string {
  const withoutTags = (text ?? '')
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<[^>]*>/g, ' ');
  return normalizeWhitespace(decodeEntities(withoutTags));
}

// ============================================================
// FINGERPRINT
// ============================================================

const FIELD_SEPARATOR = '\u001f';

/**
 * SHA-256 over identity, lower-cased title and whole-second timestamp.
 * An entry without a date of its own hashes an empty timestamp, so the
 * same undated entry keeps its fingerprint from one fetch to the next.
 */
export function computeFingerprint(input: {
  guid?: string;
  link?: string;
  title: string;
  publishedAtMs?: number;
}): string {
  const identity = input.guid ?? input.link ?? '';
  const title = normalizeWhitespace(input.title).toLowerCase();
  const seconds = input.publishedAtMs === undefined ? '' : String(Math.floor(input.publishedAtMs / 1000));

  return createHash('sha256')
    .update([identity, title, seconds].join(FIELD_SEPARATOR))
    .digest('hex');
}

/** Host of the entry link, used when the feed names no publisher */
export function domainOf(link: string | undefined): string | undefined {
  if (!link) return undefined;
  try {
    return new URL(link).hostname.toLowerCase() || undefined;
  } catch {
    return undefined;
  }
}

// ============================================================
// NORMALIZE
// ============================================================

function resolveTimestamp(
  entry: RawEntry,
  fetchedAt: Date
): { ms: number; source: TimestampSource; downgrade?: Omit<TimestampDowngrade, 'entry'> } {
  const published = parseTimestamp(entry.published);
  if (published !== undefined) {
    return { ms: published, source: 'published' };
  }

  const reason = entry.published?.trim() ? 'published_unparsable' : 'published_missing';
  const updated = parseTimestamp(entry.updated);
  if (updated !== undefined) {
    return { ms: updated, source: 'updated', downgrade: { reason, resolvedFrom: 'updated' } };
  }

  return {
    ms: fetchedAt.getTime(),
    source: 'fetch_time',
    downgrade: { reason, resolvedFrom: 'fetch_time' },
  };
}

export function normalizeEntry(feedId: string, entry: RawEntry, fetchedAt: Date): NormalizedEntry {
  const guid = normalizeWhitespace(entry.guid) || undefined;
  const link = normalizeWhitespace(entry.link) || undefined;
  const title = stripHtml(entry.title);
  const author = normalizeWhitespace(entry.author) || undefined;
  const source = stripHtml(entry.source) || domainOf(link);
  const timestamp = resolveTimestamp(entry, fetchedAt);

  const item: FeedItem = Object.freeze({
    feedId,
    ...(guid !== undefined ? { guid } : {}),
    title,
    ...(link !== undefined ? { link } : {}),
    publishedAt: new Date(timestamp.ms).toISOString(),
    timestampSource: timestamp.source,
    summary: stripHtml(entry.summary),
    ...(author !== undefined ? { author } : {}),
    ...(source !== undefined ? { source } : {}),
    fingerprint: computeFingerprint({
      guid,
      link,
      title,
      publishedAtMs: timestamp.source === 'fetch_time' ? undefined : timestamp.ms,
    }),
  });

  if (!timestamp.downgrade) return { item };

  return {
    item,
    downgrade: { entry: guid ?? link ?? title, ...timestamp.downgrade },
  };
}
