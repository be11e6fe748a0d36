import type { ClientRecord } from '../types.js';

export const HISTOGRAM_BUCKETS = 32;

/**
 * Histogram bucket for a duration in whole seconds: the 1-based position of
 * its highest set bit, so bucket `i` holds `[2^(i-1), 2^i - 1]`.
 *
 * `Math.clz32(0)` is 32, which would put zero in bucket 0 only by accident of
 * the arithmetic; zero is mapped explicitly instead.
 */
export function bucketFor(durationSeconds: number): number {
  if (durationSeconds <= 0) return 0;
  if (durationSeconds >= 2 ** (HISTOGRAM_BUCKETS - 1)) return HISTOGRAM_BUCKETS - 1;
  return 32 - Math.clz32(durationSeconds);
}

/** Upper bound in seconds of bucket `i`, as used in the `le` label. */
export function bucketUpperBound(index: number): number {
  return 2 ** index - 1;
}

type EventCounters = Pick<ClientRecord, 'sentChunks' | 'sentEastereggs' | 'sentBanners'>;

export class ConnectionStats {
  maximumConnectionTime = 0;
  minimumConnectionTime = Number.POSITIVE_INFINITY;
  readonly connectionTimeTill: number[] = new Array<number>(HISTOGRAM_BUCKETS).fill(0);
  connectionTime = 0;
  sentChunksSum = 0;
  sentEastereggsSum = 0;
  sentBannersSum = 0;

  record(durationSeconds: number, counters: EventCounters): void {
    this.maximumConnectionTime = Math.max(this.maximumConnectionTime, durationSeconds);
    this.minimumConnectionTime = Math.min(this.minimumConnectionTime, durationSeconds);
    this.connectionTimeTill[bucketFor(durationSeconds)] += 1;
    this.connectionTime += durationSeconds;
    this.sentChunksSum += counters.sentChunks;
    this.sentEastereggsSum += counters.sentEastereggs;
    this.sentBannersSum += counters.sentBanners;
  }

  get samples(): number {
    return this.connectionTimeTill.reduce((sum, n) => sum + n, 0);
  }

  static combine(a: ConnectionStats, b: ConnectionStats): ConnectionStats {
    const out = new ConnectionStats();
    out.maximumConnectionTime = Math.max(a.maximumConnectionTime, b.maximumConnectionTime);
    out.minimumConnectionTime = Math.min(a.minimumConnectionTime, b.minimumConnectionTime);
    for (let i = 0; i < HISTOGRAM_BUCKETS; i += 1) {
      out.connectionTimeTill[i] = a.connectionTimeTill[i] + b.connectionTimeTill[i];
    }
    out.connectionTime = a.connectionTime + b.connectionTime;
    out.sentChunksSum = a.sentChunksSum + b.sentChunksSum;
    out.sentEastereggsSum = a.sentEastereggsSum + b.sentEastereggsSum;
    out.sentBannersSum = a.sentBannersSum + b.sentBannersSum;
    return out;
  }
}
