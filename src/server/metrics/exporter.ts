import { HISTOGRAM_BUCKETS, bucketUpperBound } from './connection-stats.js';
import type { ConnectionStats } from './connection-stats.js';
import type { MetricsSnapshot } from '../types.js';

export const METRICS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

type MetricType = 'counter' | 'gauge' | 'histogram';

interface Population {
  prefix: 'client' | 'former' | 'total';
  /** Trailing phrase of every HELP line, e.g. "by current clients". */
  scope: string;
  stats: ConnectionStats;
}

function formatValue(value: number): string {
  if (value === Number.POSITIVE_INFINITY) return '+Inf';
  return String(value);
}

function header(name: string, type: MetricType, help: string): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

function metric(name: string, type: MetricType, help: string, value: number): string[] {
  return [...header(name, type, help), `${name} ${formatValue(value)}`];
}

function histogram(name: string, help: string, buckets: readonly number[]): string[] {
  const lines = header(name, 'histogram', help);
  let cumulative = 0;
  for (let i = 0; i < HISTOGRAM_BUCKETS; i += 1) {
    cumulative += buckets[i];
    lines.push(`${name}{le="${bucketUpperBound(i)}s"} ${cumulative}`);
  }
  return lines;
}

function populationSections({ prefix, scope, stats }: Population): string[][] {
  return [
    metric(`${prefix}_maximum_connection_time_seconds`, 'counter', `Length in seconds of longest connection ${scope}.`, stats.maximumConnectionTime),
    metric(`${prefix}_minimum_connection_time_seconds`, 'counter', `Length in seconds of shortest connection ${scope}.`, stats.minimumConnectionTime),
    metric(`${prefix}_sent_chunks_sum`, 'counter', `Sum of sent chunks ${scope}.`, stats.sentChunksSum),
    metric(`${prefix}_sent_eastereggs_sum`, 'counter', `Sum of sent eastereggs ${scope}.`, stats.sentEastereggsSum),
    metric(`${prefix}_sent_banners_sum`, 'counter', `Sum of sent banners ${scope}.`, stats.sentBannersSum),
    metric(`${prefix}_connection_time_seconds_sum`, 'counter', `Sum of connection time ${scope}.`, stats.connectionTime),
    histogram(`${prefix}_connection_time_seconds_bucket`, `A histogram of the connection time ${scope}.`, stats.connectionTimeTill)
  ];
}

/**
 * Renders a snapshot in the Prometheus text format. Metric names, label sets
 * and ordering are fixed; only the values change between calls.
 */
export function renderMetrics(snapshot: MetricsSnapshot): string {
  const sections: string[][] = [
    metric('uptime_seconds', 'gauge', 'Number of seconds since startup.', snapshot.uptimeSeconds),
    metric('connections_count', 'counter', 'Number of current connections.', snapshot.connectionsCount),
    metric('connections_total', 'counter', 'Total number of connections.', snapshot.connectionsTotal),
    ...populationSections({ prefix: 'client', scope: 'by current clients', stats: snapshot.current }),
    ...populationSections({ prefix: 'former', scope: 'by former clients', stats: snapshot.former }),
    ...populationSections({ prefix: 'total', scope: 'overall', stats: snapshot.total })
  ];
  return sections.map((lines) => `${lines.join('\n')}\n`).join('\n');
}
