/**
 * Shared fixtures for tests
 */

import type { FeedEntry } from '../types/incident';

// Utility function to create mock fetch responses
export const createMockResponse = (body: string, status = 200, statusText = 'OK') =>
  new Response(body, { status, statusText });

export interface FeedItemFixture {
  title?: string;
  link?: string;
  guid?: string;
  pubDate?: string;
  description?: string;
}

// Build a minimal RSS 2.0 document from item fixtures
export const buildRssFeed = (items: FeedItemFixture[]): string => {
  const renderItem = (item: FeedItemFixture) => [
    '    <item>',
    item.title !== undefined ? `      <title>${item.title}</title>` : '',
    item.description !== undefined ? `      <description><![CDATA[${item.description}]]></description>` : '',
    item.pubDate !== undefined ? `      <pubDate>${item.pubDate}</pubDate>` : '',
    item.link !== undefined ? `      <link>${item.link}</link>` : '',
    item.guid !== undefined ? `      <guid isPermaLink="false">${item.guid}</guid>` : '',
    '    </item>'
  ].filter(Boolean).join('\n');

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0">',
    '  <channel>',
    '    <title>Example Status - Incident History</title>',
    '    <link>https://status.example.com</link>',
    '    <description>Statuspage</description>',
    ...items.map(renderItem),
    '  </channel>',
    '</rss>'
  ].join('\n');
};

export const createFeedEntry = (overrides: Partial<FeedEntry> = {}): FeedEntry => ({
  entry_id: 'https://status.example.com/incidents/abc123',
  title: 'Elevated error rates on Assistants API',
  summary: 'Investigating - We are investigating elevated error rates.',
  phase: 'Investigating',
  url: 'https://status.example.com/incidents/abc123',
  published_at: '2026-10-18T09:30:00.000Z',
  ...overrides
});
