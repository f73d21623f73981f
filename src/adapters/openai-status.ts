import Parser from 'rss-parser';
import pRetry, { AbortError } from 'p-retry';
import type { FeedEntry } from '../types/incident';
import { logger } from '../utils/logger';
import { parseDate } from '../utils/time';

export const DEFAULT_FEED_URL = 'https://status.openai.com/history.rss';

interface RSSItem {
  title?: string;
  link?: string;
  pubDate?: string;
  isoDate?: string;
  guid?: string;
  id?: string;
  content?: string;
  contentSnippet?: string;
  summary?: string;
}

export interface FetchFeedOptions {
  timeoutMs?: number;
  retries?: number;
  userAgent?: string;
  // Backoff floor between attempts, mainly lowered in tests
  minRetryDelayMs?: number;
}

export interface ParsedFeed {
  entries: FeedEntry[];
  skipped: number;
}

const DEFAULT_FETCH_OPTIONS: Required<FetchFeedOptions> = {
  timeoutMs: 10000,
  retries: 3,
  userAgent: 'status-feed-monitor/1.0',
  minRetryDelayMs: 1000
};

function normalizeText(value: string): string {
  return value
    .replace(/&nbsp;/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Statuspage descriptions open each update with the phase in bold,
 * e.g. `<strong>Resolved</strong> - This incident has been resolved.`
 */
function extractPhase(html: string | undefined): string | undefined {
  const match = html?.match(/<strong>\s*([^<]+?)\s*<\/strong>/i);
  return match ? match[1] : undefined;
}

export function validateAndNormalizeEntry(item: RSSItem): FeedEntry | null {
  const title = item.title?.trim();
  const entryId = (item.guid || item.id || item.link)?.trim();
  const published = parseDate(item.isoDate) ?? parseDate(item.pubDate);

  if (!title || !entryId || !published) {
    return null;
  }

  const summary = normalizeText(item.contentSnippet || item.summary || '');

  return {
    entry_id: entryId,
    title,
    summary,
    phase: extractPhase(item.content),
    url: item.link?.trim() || undefined,
    published_at: published.toISOString()
  };
}

/**
 * Parse an RSS or Atom document into normalized entries, newest first.
 * Entries without a title, identifier or publish date are dropped.
 */
export async function parseFeedDocument(xml: string): Promise<ParsedFeed> {
  const parser = new Parser<Record<string, unknown>, RSSItem>();
  const feed = await parser.parseString(xml);

  const entries: FeedEntry[] = [];
  let skipped = 0;

  for (const item of feed.items || []) {
    const entry = validateAndNormalizeEntry(item);
    if (entry) {
      entries.push(entry);
    } else {
      skipped++;
      logger.debug('Skipping malformed feed entry', { title: item.title, guid: item.guid });
    }
  }

  entries.sort((a, b) => new Date(b.published_at).getTime() - new Date(a.published_at).getTime());

  return { entries, skipped };
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * GET the feed document, retrying network errors, timeouts, 429 and 5xx
 */
export async function fetchFeedDocument(feedUrl: string, options: FetchFeedOptions = {}): Promise<string> {
  const { timeoutMs, retries, userAgent, minRetryDelayMs } = { ...DEFAULT_FETCH_OPTIONS, ...options };

  return pRetry(async () => {
    const response = await fetch(feedUrl, {
      headers: {
        'User-Agent': userAgent,
        'Accept': 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8'
      },
      signal: AbortSignal.timeout(timeoutMs)
    });

    if (!response.ok) {
      const error = new Error(`HTTP ${response.status}: ${response.statusText}`);
      if (!isRetryableStatus(response.status)) {
        throw new AbortError(error);
      }
      throw error;
    }

    return response.text();
  }, {
    retries,
    factor: 2,
    minTimeout: minRetryDelayMs,
    maxTimeout: Math.max(minRetryDelayMs, 5000),
    onFailedAttempt: error => {
      logger.warn(`Feed fetch attempt ${error.attemptNumber} failed (${error.retriesLeft} retries left): ${error.message}`);
    }
  });
}

export async function fetchAndParse(
  feedUrl: string = DEFAULT_FEED_URL,
  options: FetchFeedOptions = {}
): Promise<ParsedFeed> {
  const xml = await fetchFeedDocument(feedUrl, options);
  const feed = await parseFeedDocument(xml);

  logger.debug(`Parsed ${feed.entries.length} entries from ${feedUrl} (${feed.skipped} skipped)`);

  return feed;
}

export const openaiStatusAdapter = {
  name: 'OpenAI Status',
  feedUrl: DEFAULT_FEED_URL,
  fetchAndParse
};

export default openaiStatusAdapter;
