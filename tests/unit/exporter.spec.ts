import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../../src/server/metrics/registry.js';

function admit(r: MetricsRegistry, now: number) {
  const res = r.connect(undefined, now);
  if (!res.ok) throw new Error('unexpected rejection');
  return res.token;
}

describe('exporter', () => {
  it('opens with uptime and connection counters', () => {
    const r = new MetricsRegistry(1_000);
    admit(r, 1_000);
    r.connect(1, 1_000);
    const text = r.export(8_500);
    expect(text.startsWith([
      '# HELP uptime_seconds Number of seconds since startup.',
      '# TYPE uptime_seconds gauge',
      'uptime_seconds 7',
      '',
      '# HELP connections_count Number of current connections.',
      '# TYPE connections_count counter',
      'connections_count 1',
      '',
      '# HELP connections_total Total number of connections.',
      '# TYPE connections_total counter',
      'connections_total 2',
      '',
      '# HELP client_maximum_connection_time_seconds Length in seconds of longest connection by current clients.',
      '# TYPE client_maximum_connection_time_seconds counter',
      'client_maximum_connection_time_seconds 7',
      ''
    ].join('\n'))).toBe(true);
  });

  it('has a fixed layout of sections', () => {
    const lines = new MetricsRegistry(0).export(0).split('\n');
    expect(lines).toHaveLength(189);
    expect(lines.filter((l) => l.startsWith('# TYPE ')).map((l) => l.split(' ')[2])).toEqual([
      'uptime_seconds', 'connections_count', 'connections_total',
      ...['client', 'former', 'total'].flatMap((p) => [
        `${p}_maximum_connection_time_seconds`,
        `${p}_minimum_connection_time_seconds`,
        `${p}_sent_chunks_sum`,
        `${p}_sent_eastereggs_sum`,
        `${p}_sent_banners_sum`,
        `${p}_connection_time_seconds_sum`,
        `${p}_connection_time_seconds_bucket`
      ])
    ]);
    expect(lines.at(-2)).toBe('total_connection_time_seconds_bucket{le="2147483647s"} 0');
    expect(lines.at(-1)).toBe('');
  });

  it('renders an empty population minimum as +Inf', () => {
    const text = new MetricsRegistry(0).export(0);
    expect(text).toContain('\nclient_minimum_connection_time_seconds +Inf\n');
    expect(text).toContain('\nformer_minimum_connection_time_seconds +Inf\n');
    expect(text).toContain('\ntotal_minimum_connection_time_seconds +Inf\n');
  });

  it('renders the histogram cumulatively with doubling bounds', () => {
    const r = new MetricsRegistry(0);
    const tokens = [admit(r, 0), admit(r, 0), admit(r, 0), admit(r, 0)];
    [0, 1_000, 3_000, 1_000_000].forEach((at, i) => r.disconnect(tokens[i], at));
    const former = r.export(1_000_000).split('\n').filter((l) => l.startsWith('former_connection_time_seconds_bucket{'));
    expect(former).toHaveLength(32);
    expect(former.slice(0, 4)).toEqual([
      'former_connection_time_seconds_bucket{le="0s"} 1',
      'former_connection_time_seconds_bucket{le="1s"} 2',
      'former_connection_time_seconds_bucket{le="3s"} 3',
      'former_connection_time_seconds_bucket{le="7s"} 3'
    ]);
    expect(former[9]).toBe('former_connection_time_seconds_bucket{le="511s"} 3');
    expect(former[10]).toBe('former_connection_time_seconds_bucket{le="1023s"} 4');
    expect(former[31]).toBe('former_connection_time_seconds_bucket{le="2147483647s"} 4');
  });

  it('reports former, current and total sums', () => {
    const r = new MetricsRegistry(0);
    const a = admit(r, 0);
    const b = admit(r, 0);
    r.sentChunk(a);
    r.sentBanner(a);
    r.disconnect(a, 5_000);
    r.sentEasteregg(b);
    const text = r.export(12_000);
    expect(text).toContain('\nclient_connection_time_seconds_sum 12\n');
    expect(text).toContain('\nformer_connection_time_seconds_sum 5\n');
    expect(text).toContain('\ntotal_connection_time_seconds_sum 17\n');
    expect(text).toContain('\nformer_sent_banners_sum 1\n');
    expect(text).toContain('\nclient_sent_eastereggs_sum 1\n');
    expect(text).toContain('\ntotal_sent_chunks_sum 1\n');
    expect(text).toContain('\ntotal_maximum_connection_time_seconds 12\n');
    expect(text).toContain('\ntotal_minimum_connection_time_seconds 5\n');
  });

  it('is stable across calls apart from time-dependent values', () => {
    const r = new MetricsRegistry(0);
    const a = admit(r, 0);
    r.disconnect(a, 3_000);
    expect(r.export(10_000)).toBe(r.export(10_000));
    const withoutUptime = (text: string) => text.replace(/^uptime_seconds \d+$/m, '');
    expect(withoutUptime(r.export(10_000))).toBe(withoutUptime(r.export(50_000)));
    expect(r.export(50_000)).toContain('\nuptime_seconds 50\n');
  });
});
