/**
 * Unit tests for the status feed adapter
 */

import { buildRssFeed, createMockResponse } from '../../__tests__/fixtures';
import {
  fetchAndParse,
  fetchFeedDocument,
  parseFeedDocument,
  validateAndNormalizeEntry
} from '../openai-status';

const FEED_URL = 'https://status.example.com/history.rss';

const SAMPLE_FEED = buildRssFeed([
  {
    title: 'Increased latency for ChatGPT',
    description: 'Resolved - This incident has been resolved.',
    pubDate: 'Sat, 17 Oct 2026 12:00:00 +0000',
    link: 'https://status.example.com/incidents/def456',
    guid: 'https://status.example.com/incidents/def456'
  },
  {
    title: 'Elevated error rates on Assistants API',
    description: '<strong>Investigating</strong> - We are investigating elevated error rates.',
    pubDate: 'Sun, 18 Oct 2026 09:30:00 +0000',
    link: 'https://status.example.com/incidents/abc123',
    guid: 'https://status.example.com/incidents/abc123'
  },
  {
    description: 'An entry without a title',
    pubDate: 'Sun, 18 Oct 2026 10:00:00 +0000',
    guid: 'https://status.example.com/incidents/notitle'
  },
  {
    title: 'Entry with a broken date',
    pubDate: 'not a date',
    guid: 'https://status.example.com/incidents/baddate'
  }
]);

describe('validateAndNormalizeEntry', () => {
  it('falls back to the link when there is no guid', () => {
    const entry = validateAndNormalizeEntry({
      title: 'Batch API jobs delayed',
      link: 'https://status.example.com/incidents/batch1',
      isoDate: '2026-10-18T08:00:00.000Z',
      contentSnippet: '  Monitoring -\n  A fix   has been implemented. '
    });

    expect(entry).toEqual({
      entry_id: 'https://status.example.com/incidents/batch1',
      title: 'Batch API jobs delayed',
      summary: 'Monitoring - A fix has been implemented.',
      phase: undefined,
      url: 'https://status.example.com/incidents/batch1',
      published_at: '2026-10-18T08:00:00.000Z'
    });
  });

  it('rejects entries without an identifier', () => {
    expect(validateAndNormalizeEntry({ title: 'Orphan', isoDate: '2026-10-18T08:00:00.000Z' })).toBeNull();
  });
});

describe('parseFeedDocument', () => {
  it('normalizes valid entries newest first and counts malformed ones', async () => {
    const feed = await parseFeedDocument(SAMPLE_FEED);

    expect(feed.skipped).toBe(2);
    expect(feed.entries).toHaveLength(2);
    expect(feed.entries[0]).toEqual({
      entry_id: 'https://status.example.com/incidents/abc123',
      title: 'Elevated error rates on Assistants API',
      summary: 'Investigating - We are investigating elevated error rates.',
      phase: 'Investigating',
      url: 'https://status.example.com/incidents/abc123',
      published_at: '2026-10-18T09:30:00.000Z'
    });
    expect(feed.entries[1].entry_id).toBe('https://status.example.com/incidents/def456');
    expect(feed.entries[1].summary).toBe('Resolved - This incident has been resolved.');
    expect(feed.entries[1].phase).toBeUndefined();
  });

  it('reads Atom feeds', async () => {
    const atom = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<feed xmlns="http://www.w3.org/2005/Atom">',
      '  <title>Example Status</title>',
      '  <id>tag:status.example.com,2005:/history</id>',
      '  <updated>2026-10-18T08:00:00Z</updated>',
      '  <entry>',
      '    <id>tag:status.example.com,2005:Incident/1</id>',
      '    <title>Batch API jobs delayed</title>',
      '    <link rel="alternate" type="text/html" href="https://status.example.com/incidents/1"/>',
      '    <updated>2026-10-18T08:00:00Z</updated>',
      '    <content type="html">&lt;strong&gt;Monitoring&lt;/strong&gt; - A fix has been implemented.</content>',
      '  </entry>',
      '</feed>'
    ].join('\n');

    const feed = await parseFeedDocument(atom);

    expect(feed.entries).toHaveLength(1);
    expect(feed.entries[0]).toMatchObject({
      entry_id: 'tag:status.example.com,2005:Incident/1',
      title: 'Batch API jobs delayed',
      phase: 'Monitoring',
      url: 'https://status.example.com/incidents/1',
      published_at: '2026-10-18T08:00:00.000Z'
    });
  });

  it('rejects documents that are not XML feeds', async () => {
    await expect(parseFeedDocument('<html><body>Maintenance</body></html>')).rejects.toThrow();
  });
});

describe('fetchFeedDocument', () => {
  it('requests the feed with the configured user agent', async () => {
    const fetchMock = vi.fn().mockResolvedValue(createMockResponse(SAMPLE_FEED));
    vi.stubGlobal('fetch', fetchMock);

    const xml = await fetchFeedDocument(FEED_URL, { userAgent: 'test-agent/1.0' });

    expect(xml).toBe(SAMPLE_FEED);
    expect(fetchMock).toHaveBeenCalledWith(FEED_URL, expect.objectContaining({
      headers: expect.objectContaining({ 'User-Agent': 'test-agent/1.0' })
    }));
  });

  it('retries server errors', async () => {
    const fetchMock = vi.fn()
      .mockResolvedValueOnce(createMockResponse('unavailable', 503, 'Service Unavailable'))
      .mockResolvedValueOnce(createMockResponse(SAMPLE_FEED));
    vi.stubGlobal('fetch', fetchMock);

    const xml = await fetchFeedDocument(FEED_URL, { retries: 2, minRetryDelayMs: 1 });

    expect(xml).toBe(SAMPLE_FEED);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    const fetchMock = vi.fn().mockResolvedValue(createMockResponse('missing', 404, 'Not Found'));
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchFeedDocument(FEED_URL, { retries: 3, minRetryDelayMs: 1 }))
      .rejects.toThrow('HTTP 404: Not Found');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured number of retries', async () => {
    const fetchMock = vi.fn().mockRejectedValue(new Error('socket hang up'));
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchFeedDocument(FEED_URL, { retries: 1, minRetryDelayMs: 1 }))
      .rejects.toThrow('socket hang up');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('fetchAndParse', () => {
  it('fetches and normalizes the feed', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(createMockResponse(SAMPLE_FEED)));

    const feed = await fetchAndParse(FEED_URL, { retries: 0 });

    expect(feed.entries.map(entry => entry.title)).toEqual([
      'Elevated error rates on Assistants API',
      'Increased latency for ChatGPT'
    ]);
  });
});
