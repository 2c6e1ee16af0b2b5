/**
 * Tests for the feed reader
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchFeed, parseFeedDocument, toRawEntry } from '../../src/sources/rss.js';
import { aggregate } from '../../src/pipeline.js';
import type { FeedReader } from '../../src/types.js';

const { get } = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock('axios', () => ({ default: { get } }));

const VALID_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:media="http://search.yahoo.com/mrss/">
  <channel>
    <title>Sekcja</title>
    <link>https://example.com/</link>
    <description>Opis sekcji</description>
    <item>
      <title>First</title>
      <link>https://example.com/1</link>
      <guid isPermaLink="false">g-1</guid>
      <description>Opis</description>
      <pubDate>Mon, 19 Oct 2026 08:00:00 +0200</pubDate>
      <enclosure url="https://img.example.com/1.jpg" length="0" type="image/jpeg"/>
    </item>
    <item>
      <title>Second</title>
      <link>https://example.com/2</link>
      <media:content url="https://img.example.com/2.jpg" medium="image"/>
      <media:thumbnail url="https://img.example.com/2-small.jpg"/>
    </item>
  </channel>
</rss>`;

const BROKEN_RSS = `<rss version="2.0"><channel><title>Broken</title>
<item><title>One</title><link>https://example.com/1</link><guid>g1</guid><description>Fish & chips</description></item>
<item><title>Two</title><link>https://example.com/2</link>`;

beforeEach(() => {
  get.mockReset();
});

describe('parseFeedDocument', () => {
  it('maps RSS items to raw entries', async () => {
    const parsed = await parseFeedDocument(VALID_RSS);

    expect(parsed.malformed).toBe(false);
    expect(parsed.entries).toHaveLength(2);

    const [first, second] = parsed.entries;
    expect(first.guid).toBe('g-1');
    expect(first.title).toBe('First');
    expect(first.link).toBe('https://example.com/1');
    expect(first.description).toBe('Opis');
    expect(first.published?.toISOString()).toBe('2026-10-19T06:00:00.000Z');
    expect(first.enclosures).toEqual([{ url: 'https://img.example.com/1.jpg' }]);
    expect(first.mediaContent).toEqual([]);

    expect(second.published).toBeUndefined();
    expect(second.enclosures).toEqual([]);
    expect(second.mediaContent).toEqual([{ url: 'https://img.example.com/2.jpg' }]);
    expect(second.mediaThumbnails).toEqual([{ url: 'https://img.example.com/2-small.jpg' }]);
  });

  it('flags a broken document and salvages its items', async () => {
    const parsed = await parseFeedDocument(BROKEN_RSS);

    expect(parsed.malformed).toBe(true);
    expect(typeof parsed.error).toBe('string');
    expect(parsed.entries.map((e) => e.title)).toEqual(['One', 'Two']);
    expect(parsed.entries.map((e) => e.guid)).toEqual(['g1', undefined]);
  });

  it('flags a document that is not a feed', async () => {
    const parsed = await parseFeedDocument('not xml at all');

    expect(parsed.malformed).toBe(true);
    expect(parsed.entries).toEqual([]);
  });
});

describe('identifiers with surrounding whitespace', () => {
  const doc = (title: string, guid: string, link: string) => `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Sekcja</title>
    <item>
      <title>${title}</title>
      <link>${link}</link>
      <guid>${guid}</guid>
      <pubDate>Sun, 18 Oct 2026 09:00:00 +0200</pubDate>
    </item>
  </channel>
</rss>`;

  it('trims guid and link text', async () => {
    const parsed = await parseFeedDocument(doc('Padded', '\n        abc123\n      ', '\n  https://example.com/1\n'));

    expect(parsed.entries[0].guid).toBe('abc123');
    expect(parsed.entries[0].link).toBe('https://example.com/1');
  });

  it('deduplicates the same article across feeds despite padding', async () => {
    const docs: Record<string, string> = {
      'https://a.example.com/.feed': doc('First', 'abc123', 'https://example.com/1'),
      'https://b.example.com/.feed': doc('Second', '\n        abc123\n      ', 'https://example.com/1'),
    };
    const readFeed: FeedReader = (url) => parseFeedDocument(docs[url] ?? '');

    const { items, reports } = await aggregate([
      { url: 'https://a.example.com/.feed', label: 'ogólny' },
      { url: 'https://b.example.com/.feed', label: 'dziecko' },
    ], { readFeed, now: new Date('2026-10-19T12:00:00Z'), fallbackImage: 'https://cdn.example.com/fallback.jpg' });

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({ guid: 'abc123', title: 'First', label: 'ogólny' });
    expect(reports[1]).toMatchObject({ added: 0, duplicates: 1 });
  });
});

describe('toRawEntry', () => {
  it('unwraps text nodes that carry attributes', () => {
    const entry = toRawEntry({ guid: 'g', id: { _: 'urn:x', $: { type: 'text' } }, description: { _: 'd' } });
    expect(entry.id).toBe('urn:x');
    expect(entry.description).toBe('d');
  });

  it('reads Atom published and updated dates separately', () => {
    const entry = toRawEntry({
      pubDate: '2026-10-18T07:00:00Z',
      published: '2026-10-17T07:00:00Z',
      updated: '2026-10-18T07:00:00Z',
    });
    expect(entry.published?.toISOString()).toBe('2026-10-17T07:00:00.000Z');
    expect(entry.updated?.toISOString()).toBe('2026-10-18T07:00:00.000Z');
  });

  it('trims attribute-carrying text nodes', () => {
    const entry = toRawEntry({ id: { _: '\n  urn:x\n', $: { type: 'text' } }, guid: ' g ' });
    expect(entry.id).toBe('urn:x');
    expect(entry.guid).toBe('g');
  });

  it('ignores media nodes without attributes', () => {
    const entry = toRawEntry({ mediaContent: ['plain text', { $: { medium: 'image' } }] });
    expect(entry.mediaContent).toEqual([{ url: undefined }, { url: undefined }]);
  });
});

describe('fetchFeed', () => {
  it('downloads with the configured agent and timeout', async () => {
    get.mockResolvedValue({ status: 200, data: VALID_RSS });

    const parsed = await fetchFeed('https://feeds.example.com/a', { userAgent: 'test-agent/1.0', timeoutMs: 500 });

    expect(parsed.entries).toHaveLength(2);
    expect(get).toHaveBeenCalledWith('https://feeds.example.com/a', {
      responseType: 'text',
      timeout: 500,
      headers: { 'User-Agent': 'test-agent/1.0' },
    });
  });

  it('lets network errors through', async () => {
    get.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:80'));

    await expect(fetchFeed('https://feeds.example.com/a', { userAgent: 'test-agent/1.0', timeoutMs: 500 }))
      .rejects.toThrow('ECONNREFUSED');
  });
});
