import type { MetricsRegistry } from '../metrics/registry.js';

export interface MetricsContext {
  registry: MetricsRegistry;
  now: () => number;
}
