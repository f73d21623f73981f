#!/usr/bin/env tsx

/**
 * Poll the status feed and append new incidents to the JSON log
 * Run with: npx tsx scripts/monitor/run-monitor.ts [--once]
 */

// Environment must be loaded before anything reads process.env
import '../load-env';

import { loadEnvironmentConfig } from '../../src/config/environment';
import { StatusMonitor } from '../../src/monitor/status-monitor';
import { IncidentLog } from '../../src/storage/incident-log';
import { logger } from '../../src/utils/logger';

async function main() {
  const config = loadEnvironmentConfig();
  logger.setLevel(config.logging.level);

  const log = new IncidentLog(config.incidentLog.file);
  await log.load();

  const once = process.argv.includes('--once');
  const monitor = new StatusMonitor({
    feedUrl: config.feed.url,
    log,
    intervalSeconds: config.monitor.intervalSeconds,
    // A single pass has no later poll to wait for, so it always looks at the whole feed
    includeHistory: once || config.monitor.includeHistory,
    fetchOptions: {
      timeoutMs: config.feed.timeoutMs,
      retries: config.feed.retries,
      userAgent: config.feed.userAgent
    }
  });

  console.log(`Monitoring status feed: ${config.feed.url}`);
  console.log(`Logs at: ${config.incidentLog.file} (${log.size} incidents recorded)`);

  if (once) {
    const result = await monitor.poll();
    console.log('═'.repeat(80));
    console.log(`   • Entries fetched: ${result.stats.fetched}`);
    console.log(`   • New incidents: ${result.stats.created}`);
    console.log(`   • Already logged: ${result.stats.duplicates}`);
    console.log(`   • No known product: ${result.stats.unmatched}`);
    console.log(`   • Malformed entries: ${result.stats.malformed}`);
    if (!result.success) {
      // A failed fetch is logged above; it is not a fatal error
      console.log(`   • Poll failed: ${result.error}`);
    }
    return;
  }

  console.log(`Polling every ${config.monitor.intervalSeconds}s. Press Ctrl+C to stop\n`);

  const shutdown = () => {
    console.log('\nStopping monitor...');
    monitor.stop().then(
      () => process.exit(0),
      error => {
        console.error('Error while stopping:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  monitor.start();
}

main().catch(error => {
  console.error('\nSTATUS MONITOR FAILED TO START');
  console.error('═'.repeat(80));
  console.error('Error:', error);
  process.exit(1);
});
