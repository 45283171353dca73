/**
 * Feedkeeper — Google News Keyword Sources
 *
 * A feed entry can carry a search query instead of a URL; it becomes a
 * Google News RSS search feed.
 */

import type { FeedQuery } from '../types';

const GOOGLE_NEWS_SEARCH = 'https://news.google.com/rss/search';

export function buildGoogleNewsUrl(query: FeedQuery): string {
  const language = query.language;
  const country = query.country.toUpperCase();

  const params = new URLSearchParams({
    q: query.terms.trim(),
    hl: language,
    gl: country,
    ceid: `${country}:${language}`,
  });

  return `${GOOGLE_NEWS_SEARCH}?${params.toString()}`;
}
