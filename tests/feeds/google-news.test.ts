/**
 * Feedkeeper — Google News Source Tests
 *
 * Tests for:
 * - Keyword search URL building
 */

import { describe, it, expect } from 'vitest';
import { buildGoogleNewsUrl } from '../../src/feeds/google-news';

describe('buildGoogleNewsUrl', () => {
  it('encodes the search terms and locale', () => {
    const url = buildGoogleNewsUrl({ terms: ' open source ', language: 'en', country: 'us' });
    expect(url).toBe('https://news.google.com/rss/search?q=open+source&hl=en&gl=US&ceid=US%3Aen');
  });

  it('keeps search operators intact', () => {
    const url = new URL(buildGoogleNewsUrl({ terms: '"rust lang" when:7d', language: 'de', country: 'DE' }));
    expect(url.searchParams.get('q')).toBe('"rust lang" when:7d');
    expect(url.searchParams.get('ceid')).toBe('DE:de');
  });
});
