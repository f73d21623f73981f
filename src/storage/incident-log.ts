/**
 * Append-only JSON history of detected incidents.
 *
 * The file holds a single pretty-printed JSON array. Records are keyed by
 * `entry_id`; appending an id that is already present is a no-op. Each
 * append re-reads the file first, so several processes can share it.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { IncidentRecord } from '../types/incident';
import { logger } from '../utils/logger';

const incidentRecordSchema = z.object({
  entry_id: z.string().min(1),
  timestamp: z.string(),
  product: z.string(),
  event: z.string(),
  status: z.string(),
  phase: z.string().optional(),
  url: z.string().optional(),
  published_at: z.string(),
  detected_at: z.string(),
  source: z.enum(['rss', 'webhook'])
});

const incidentLogSchema = z.array(incidentRecordSchema);

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Union of two record lists keyed by entry_id; `primary` order comes first.
 */
function mergeRecords(primary: IncidentRecord[], secondary: IncidentRecord[]): IncidentRecord[] {
  const ids = new Set(primary.map(record => record.entry_id));
  return [...primary, ...secondary.filter(record => !ids.has(record.entry_id))];
}

export class IncidentLog {
  private records: IncidentRecord[] = [];
  private seen = new Set<string>();
  private loading: Promise<IncidentRecord[]> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /**
   * Read the history from disk. A missing file is an empty log; a file that
   * is not a valid incident array is an error and is left untouched.
   */
  load(): Promise<IncidentRecord[]> {
    this.loading = this.readRecords().then(records => {
      this.replaceState(records);
      logger.debug(`Loaded ${records.length} incident records from ${this.filePath}`);
      return this.list();
    });
    return this.loading;
  }

  has(entryId: string): boolean {
    return this.seen.has(entryId);
  }

  list(): IncidentRecord[] {
    return [...this.records];
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Append a record and persist the whole log.
   * Returns false when a record with the same entry_id already exists, in
   * memory or in the file as another process left it.
   */
  async append(record: IncidentRecord): Promise<boolean> {
    // Concurrent first appends share one read of the file
    await (this.loading ?? this.load());

    // Appends run one at a time within the process
    const task = this.writeQueue.then(() => this.appendToDisk(record));
    this.writeQueue = task.then(() => undefined, () => undefined);
    return task;
  }

  private async appendToDisk(record: IncidentRecord): Promise<boolean> {
    // Other processes (the poller, the webhook listener) may share the file
    const current = mergeRecords(await this.readRecords(), this.records);

    if (current.some(existing => existing.entry_id === record.entry_id)) {
      this.replaceState(current);
      return false;
    }

    const next = [...current, record];
    await this.writeRecords(next);
    // Only a written record counts as logged
    this.replaceState(next);
    return true;
  }

  private replaceState(records: IncidentRecord[]) {
    this.records = records;
    this.seen = new Set(records.map(record => record.entry_id));
  }

  private async readRecords(): Promise<IncidentRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      return [];
    }

    if (!raw.trim()) {
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Incident log ${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = incidentLogSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Incident log ${this.filePath} has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }

  private async writeRecords(records: IncidentRecord[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, `${JSON.stringify(records, null, 2)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
