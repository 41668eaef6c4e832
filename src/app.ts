#!/usr/bin/env node
import { ConfigError, loadConfig } from './config';
import type { Config } from './config';
import { createLogger } from './lib/logger';
import { buildServer } from './server';

const pkg = require('../package.json') as { version?: string };

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`rbd-mirror-exporter: ${err.message}`);
      process.exit(2);
    }
    throw err;
  }
}

async function start(): Promise<void> {
  const config = readConfig();
  if (config.showVersion) {
    console.log(pkg.version ?? 'unknown');
    return;
  }

  const logger = createLogger({
    enabled: process.env.LOG_ENABLED !== '0',
    level: config.log.level,
    json: config.log.json,
    service: process.env.LOG_SERVICE_NAME || '',
  });

  const app = await buildServer({ config, logger });
  const host = config.http.address || '0.0.0.0';

  try {
    await app.listen({ host, port: config.http.port });
  } catch (err) {
    logger.error('HTTP server failed', { err, host, port: config.http.port });
    process.exit(1);
  }
  logger.info(`Starting rbd-mirror-exporter on http://${host}:${config.http.port}`, {
    version: pkg.version ?? 'unknown',
    pool: config.pool,
    shape: config.metrics.shape,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('shutting down', { signal });
    app
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error('Failed to close HTTP server', { err });
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
