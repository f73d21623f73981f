/**
 * StatusMonitor - polls the status feed and keeps the incident log current
 *
 * Each poll runs one sequential pass:
 * 1. Fetch and parse the feed (with retries)
 * 2. Drop entries at or before the startup baseline, unless history is included
 * 3. Match products and append new incidents to the JSON log
 *
 * A failed poll is logged and reported in the result; it never throws, so the
 * loop keeps running through network outages.
 */

import { fetchAndParse, type FetchFeedOptions, type ParsedFeed } from '../adapters/openai-status';
import type { IncidentLog } from '../storage/incident-log';
import type { FeedEntry, IncidentRecord } from '../types/incident';
import { logger } from '../utils/logger';
import { processEntries, type ProcessOptions, type ProcessStats } from './process-entries';

export const DEFAULT_POLL_INTERVAL_SECONDS = 30;

export type FeedFetcher = (feedUrl: string, options: FetchFeedOptions) => Promise<ParsedFeed>;

export interface StatusMonitorOptions {
  feedUrl: string;
  log: IncidentLog;
  intervalSeconds?: number;
  // When false, entries already in the feed at startup are treated as seen
  includeHistory?: boolean;
  fetchOptions?: FetchFeedOptions;
  fetchFeed?: FeedFetcher;
  process?: ProcessOptions;
}

export type PollOutcome = 'processed' | 'initialized' | 'empty' | 'failed';

export interface PollResult {
  success: boolean;
  outcome: PollOutcome;
  stats: ProcessStats & { fetched: number; malformed: number; beforeBaseline: number };
  records: IncidentRecord[];
  error?: string;
}

function emptyStats(): PollResult['stats'] {
  return { fetched: 0, malformed: 0, beforeBaseline: 0, processed: 0, created: 0, duplicates: 0, unmatched: 0 };
}

function newestPublished(entries: FeedEntry[]): Date | null {
  let newest: Date | null = null;
  for (const entry of entries) {
    const published = new Date(entry.published_at);
    if (!newest || published > newest) {
      newest = published;
    }
  }
  return newest;
}

export class StatusMonitor {
  private timeout: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private inFlight: Promise<PollResult> | null = null;
  private lastSeen: Date | null = null;
  private readonly intervalMs: number;
  private readonly fetchFeed: FeedFetcher;

  constructor(private readonly options: StatusMonitorOptions) {
    this.intervalMs = (options.intervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS) * 1000;
    this.fetchFeed = options.fetchFeed ?? fetchAndParse;
  }

  /** Newest publish time already accounted for, if a baseline is set. */
  get baseline(): Date | null {
    return this.lastSeen;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run a single fetch → parse → filter → append pass.
   */
  async poll(): Promise<PollResult> {
    const stats = emptyStats();

    let feed: ParsedFeed;
    try {
      feed = await this.fetchFeed(this.options.feedUrl, this.options.fetchOptions ?? {});
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to fetch status feed ${this.options.feedUrl}`, message);
      return { success: false, outcome: 'failed', stats, records: [], error: message };
    }

    stats.fetched = feed.entries.length;
    stats.malformed = feed.skipped;

    if (feed.entries.length === 0) {
      logger.warn('Feed empty, retrying on next poll');
      return { success: true, outcome: 'empty', stats, records: [] };
    }

    const newest = newestPublished(feed.entries);

    if (!this.options.includeHistory && this.lastSeen === null) {
      this.lastSeen = newest;
      stats.beforeBaseline = feed.entries.length;
      logger.info('Initialized. Waiting for future updates...');
      return { success: true, outcome: 'initialized', stats, records: [] };
    }

    const baseline = this.lastSeen;
    const candidates = baseline
      ? feed.entries.filter(entry => new Date(entry.published_at) > baseline)
      : feed.entries;
    stats.beforeBaseline = feed.entries.length - candidates.length;

    try {
      const result = await processEntries(candidates, this.options.log, this.options.process);
      Object.assign(stats, result.stats);

      if (newest && (!this.lastSeen || newest > this.lastSeen)) {
        this.lastSeen = newest;
      }

      return { success: true, outcome: 'processed', stats, records: result.records };
    } catch (error) {
      // Baseline stays put so the same entries are retried next poll
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to record incidents', message);
      return { success: false, outcome: 'failed', stats, records: [], error: message };
    }
  }

  /**
   * Poll immediately, then every interval until stopped. Uses a setTimeout
   * chain so a slow poll never overlaps the next one.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    void this.runAndSchedule();
  }

  /**
   * Stop the loop and wait for an in-flight poll to settle.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private async runAndSchedule(): Promise<void> {
    this.inFlight = this.poll();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
    if (this.running) {
      this.timeout = setTimeout(() => {
        this.timeout = null;
        void this.runAndSchedule();
      }, this.intervalMs);
    }
  }
}
