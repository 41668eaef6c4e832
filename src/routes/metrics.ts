/**
 * Scrape endpoint. Every request runs a fresh collection; nothing is cached between scrapes.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { MirrorCollector } from '../collectors/mirror.collector';
import type { Logger } from '../lib/logger';
import { ScrapeExposition } from '../metrics/exposition';
import type { MetricSchema } from '../metrics/schema';
import { ScrapeQuery } from './metrics.schemas';

export type MetricsRouteOptions = {
  collector: MirrorCollector;
  schema: MetricSchema;
  logger: Logger;
};

export const metricsRoutes: FastifyPluginAsync<MetricsRouteOptions> = async (app, opts) => {
  const log = opts.logger.child('http');

  // -------------------------------------------------------------------------
  // GET /metrics?cluster=<name>
  // -------------------------------------------------------------------------
  app.get<{ Querystring: ScrapeQuery }>(
    '/metrics',
    { schema: { querystring: ScrapeQuery } },
    async (request, reply) => {
      const exposition = new ScrapeExposition(opts.schema);
      const started = Date.now();
      const result = await opts.collector.collect(exposition, { cluster: request.query.cluster });

      log.debug('scrape finished', {
        outcome: result.outcome,
        resources: result.resources,
        emitted: result.emitted,
        skipped: result.skipped,
        ignored: result.ignored,
        durationMs: Date.now() - started,
      });

      // An aborted scrape is still a successful response; the missing series tell the story.
      const body = await exposition.render();
      return reply.type(exposition.contentType).send(body);
    },
  );

  app.get('/', async (_request, reply) => {
    return reply
      .type('text/html; charset=utf-8')
      .send(
        '<html><head><title>RBD Mirror Exporter</title></head>' +
          '<body><h1>RBD Mirror Exporter</h1><p><a href="/metrics">Metrics</a></p></body></html>',
      );
  });
};
