import Fastify, { type FastifyError } from 'fastify';

import { MirrorCollector } from './collectors/mirror.collector';
import type { Config } from './config';
import defaultLogger from './lib/logger';
import type { Logger } from './lib/logger';
import { MetricSchema } from './metrics/schema';
import { metricsRoutes } from './routes/metrics';
import { RbdCli } from './services/rbd-cli';
import type { StatusFetcher } from './services/rbd-cli';

export type BuildServerOptions = {
  config: Config;
  logger?: Logger;
  /** Override the rbd runner (for testing) */
  fetcher?: StatusFetcher;
};

/**
 * Build the Fastify app serving the scrape endpoint.
 * Exported separately from the listener so tests can use `app.inject()`.
 */
export async function buildServer(opts: BuildServerOptions) {
  const { config } = opts;
  const logger = opts.logger ?? defaultLogger;

  const schema = new MetricSchema({
    prefix: config.metrics.prefix,
    clusterLabel: config.metrics.clusterLabel,
    shape: config.metrics.shape,
  });
  const fetcher =
    opts.fetcher ?? new RbdCli({ binary: config.rbd.binary, debug: config.debug, logger });
  const collector = new MirrorCollector({
    pool: config.pool,
    fetcher,
    schema,
    shape: config.metrics.shape,
    timeoutMs: config.rbd.timeoutMs,
    defaultCluster: config.rbd.cluster,
    debug: config.debug,
    logger,
  });

  const app = Fastify({ logger: false });

  // ---------------------------------------------------------------------------
  // Validation failures are the only expected errors
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || 'querystring',
        message: v.message ?? 'Invalid value',
      }));
      reply.status(400).send({ error: 'Validation failed', details });
      return;
    }

    logger.error('request failed', { err: error });
    reply.status(error.statusCode ?? 500).send({ error: 'Internal server error' });
  });

  await app.register(metricsRoutes, { collector, schema, logger });

  return app;
}
