import { Gauge, Registry } from 'prom-client';
import type { MetricSample, MetricSink } from './samples';
import type { MetricKey, MetricSchema } from './schema';

/**
 * Per-scrape prom-client registry. A fresh one is created for every request so concurrent
 * scrapes never see each other's series.
 */
export class ScrapeExposition implements MetricSink {
  private readonly registry = new Registry();
  private readonly gauges = new Map<MetricKey, Gauge<string>>();

  constructor(schema: MetricSchema) {
    for (const descriptor of schema.list()) {
      this.gauges.set(
        descriptor.key,
        new Gauge({
          name: descriptor.name,
          help: descriptor.help,
          labelNames: [...descriptor.labelNames],
          registers: [this.registry],
        })
      );
    }
  }

  emit(sample: MetricSample): void {
    const gauge = this.gauges.get(sample.key);
    if (!gauge) {
      throw new Error(`metric ${sample.key} is not registered`);
    }
    gauge.set({ ...sample.labels }, sample.value);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
