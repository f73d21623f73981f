#!/usr/bin/env tsx

/**
 * Start the Statuspage webhook listener
 * Run with: npx tsx scripts/webhook/run-webhook.ts
 */

import '../load-env';

import { loadEnvironmentConfig } from '../../src/config/environment';
import { IncidentLog } from '../../src/storage/incident-log';
import { logger } from '../../src/utils/logger';
import { createFetchServer } from '../../src/webhook/node-server';
import { routeRequest, WEBHOOK_PATH } from '../../src/webhook/status-webhook';

async function main() {
  const config = loadEnvironmentConfig();
  logger.setLevel(config.logging.level);

  const log = new IncidentLog(config.incidentLog.file);
  await log.load();

  const server = createFetchServer(request => routeRequest(request, {
    log,
    secret: config.webhook.secret
  }));

  server.listen(config.webhook.port, () => {
    logger.info(`Webhook listener on http://localhost:${config.webhook.port}${WEBHOOK_PATH}`);
    if (!config.webhook.secret) {
      logger.warn('WEBHOOK_SECRET is not set; accepting unauthenticated requests');
    }
  });

  const shutdown = () => {
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch(error => {
  console.error('Webhook listener failed to start:', error);
  process.exit(1);
});
