#!/usr/bin/env tsx
// Fetch the status feed once and show how each entry would be tagged.
// Nothing is written to the incident log.
// Run with: npx tsx scripts/check-feed.ts [feed-url]

import './load-env';

import { fetchAndParse } from '../src/adapters/openai-status';
import { loadEnvironmentConfig } from '../src/config/environment';
import { matchProduct } from '../src/detection/product-detector';

async function checkFeed(feedUrl: string) {
  console.log(`🚀 Checking ${feedUrl}`);
  console.log('='.repeat(50));

  const startTime = Date.now();
  const feed = await fetchAndParse(feedUrl, { retries: 1 });
  const endTime = Date.now();

  console.log(`\n📊 Results Summary:`);
  console.log(`- Entries parsed: ${feed.entries.length}`);
  console.log(`- Malformed entries skipped: ${feed.skipped}`);
  console.log(`- Execution time: ${endTime - startTime}ms`);

  if (feed.entries.length === 0) {
    console.log('❌ No entries were parsed. Check the feed URL.');
    return;
  }

  const productCounts: Record<string, number> = {};
  console.log(`\n🔍 Entries:`);
  console.log('='.repeat(50));

  for (const entry of feed.entries) {
    const match = matchProduct(`${entry.title} ${entry.summary}`);
    const product = match?.product ?? '(no known product)';
    productCounts[product] = (productCounts[product] || 0) + 1;

    console.log(`\n📄 ${entry.title}`);
    console.log(`  entry_id: ${entry.entry_id}`);
    console.log(`  published_at: ${entry.published_at}`);
    console.log(`  phase: ${entry.phase || 'N/A'}`);
    console.log(`  product: ${product}${match ? ` (matched: ${match.matchedKeywords.join(', ')})` : ''}`);
    console.log(`  summary: ${entry.summary.substring(0, 200)}${entry.summary.length > 200 ? '...' : ''}`);
  }

  console.log(`\n📈 Product breakdown:`, productCounts);
}

const config = loadEnvironmentConfig();
const feedUrl = process.argv[2] || config.feed.url;

checkFeed(feedUrl).catch(error => {
  console.error('❌ Feed check failed with error:', error);
  process.exit(1);
});
