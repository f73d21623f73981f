/**
 * Turns feed entries into incident records: dedup, product match, append.
 */

import type { FeedEntry, IncidentRecord } from '../types/incident';
import type { IncidentLog } from '../storage/incident-log';
import { detectProduct } from '../detection/product-detector';
import { logger } from '../utils/logger';
import { formatTimestamp } from '../utils/time';

export interface ProcessStats {
  processed: number;
  created: number;
  duplicates: number;
  unmatched: number;
}

export interface ProcessResult {
  stats: ProcessStats;
  records: IncidentRecord[];
}

export interface ProcessOptions {
  detect?: (text: string) => string | null;
  now?: () => Date;
}

export function buildIncidentRecord(entry: FeedEntry, product: string, detectedAt: Date): IncidentRecord {
  return {
    entry_id: entry.entry_id,
    timestamp: formatTimestamp(new Date(entry.published_at)),
    product,
    event: entry.title,
    status: entry.summary,
    phase: entry.phase,
    url: entry.url,
    published_at: entry.published_at,
    detected_at: detectedAt.toISOString(),
    source: 'rss'
  };
}

export function formatIncidentBlock(record: IncidentRecord): string {
  return [
    `[${record.timestamp}] NEW INCIDENT DETECTED`,
    `Product: ${record.product}`,
    `Event: ${record.event}`,
    `Status: ${record.status}`,
    '-'.repeat(80)
  ].join('\n');
}

/**
 * Record every entry that names a known product and is not logged yet.
 * Entries are handled oldest first so the log reads chronologically.
 */
export async function processEntries(
  entries: FeedEntry[],
  log: IncidentLog,
  options: ProcessOptions = {}
): Promise<ProcessResult> {
  const detect = options.detect ?? detectProduct;
  const now = options.now ?? (() => new Date());

  const stats: ProcessStats = { processed: 0, created: 0, duplicates: 0, unmatched: 0 };
  const records: IncidentRecord[] = [];

  const chronological = [...entries].sort(
    (a, b) => new Date(a.published_at).getTime() - new Date(b.published_at).getTime()
  );

  for (const entry of chronological) {
    stats.processed++;

    if (log.has(entry.entry_id)) {
      stats.duplicates++;
      continue;
    }

    const product = detect(`${entry.title} ${entry.summary}`);
    if (!product) {
      stats.unmatched++;
      logger.debug(`No known product in entry: ${entry.title}`);
      continue;
    }

    const record = buildIncidentRecord(entry, product, now());
    const appended = await log.append(record);
    if (!appended) {
      stats.duplicates++;
      continue;
    }

    stats.created++;
    records.push(record);
    logger.info(formatIncidentBlock(record));
  }

  return { stats, records };
}
