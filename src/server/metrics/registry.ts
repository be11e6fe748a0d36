import { ConnectionStats } from './connection-stats.js';
import { renderMetrics } from './exporter.js';
import { SlotTable } from './slot-table.js';
import { Token } from '../types.js';
import type { ClientRecord, ConnectResult, DisconnectResult, EventKind, EventResult, MetricsSnapshot } from '../types.js';

const counterFor: Record<EventKind, keyof Omit<ClientRecord, 'start'>> = {
  chunk: 'sentChunks',
  easteregg: 'sentEastereggs',
  banner: 'sentBanners'
};

function elapsedSeconds(since: number, now: number): number {
  return Math.max(0, Math.floor((now - since) / 1000));
}

/**
 * Connection statistics for the whole process, and the admission policy on
 * top of them. `connectionsCount` is the only live-connection counter.
 *
 * Every method runs to completion synchronously, so a mutation is never
 * interleaved with another session's and is visible to the next `export`.
 */
export class MetricsRegistry {
  private readonly clients = new SlotTable<ClientRecord>();
  private readonly formerMetrics = new ConnectionStats();
  private connectionsCount = 0;
  private connectionsTotal = 0;

  constructor(private readonly startup: number) {}

  connections(): number { return this.connectionsCount; }
  totalConnections(): number { return this.connectionsTotal; }
  slotCount(): number { return this.clients.length; }

  connect(maxClients: number | undefined, now: number): ConnectResult {
    this.connectionsTotal += 1;
    this.connectionsCount += 1;
    const connected = this.connectionsCount;
    if (maxClients !== undefined && connected > maxClients) {
      this.connectionsCount -= 1;
      return { ok: false, connected };
    }
    const slot = this.clients.insert({ start: now, sentChunks: 0, sentEastereggs: 0, sentBanners: 0 });
    return { ok: true, token: new Token(slot), connected };
  }

  disconnect(token: Token, now: number): DisconnectResult {
    const found = this.clients.lookup(token.slot);
    if (found.state === 'unallocated') return { ok: false, error: 'invalid_token' };
    if (found.state === 'vacant') return { ok: false, error: 'already_disconnected' };

    const client = found.value;
    const durationSeconds = elapsedSeconds(client.start, now);
    this.formerMetrics.record(durationSeconds, client);
    this.clients.clear(token.slot);
    this.connectionsCount -= 1;
    return { ok: true, connected: this.connectionsCount, durationSeconds };
  }

  recordEvent(token: Token, kind: EventKind): EventResult {
    const found = this.clients.lookup(token.slot);
    if (found.state === 'unallocated') return { ok: false, error: 'invalid_token' };
    if (found.state === 'vacant') return { ok: false, error: 'already_disconnected' };
    found.value[counterFor[kind]] += 1;
    return { ok: true };
  }

  sentChunk(token: Token): EventResult { return this.recordEvent(token, 'chunk'); }
  sentEasteregg(token: Token): EventResult { return this.recordEvent(token, 'easteregg'); }
  sentBanner(token: Token): EventResult { return this.recordEvent(token, 'banner'); }

  snapshot(now: number): MetricsSnapshot {
    const current = new ConnectionStats();
    for (const client of this.clients.occupied()) {
      current.record(elapsedSeconds(client.start, now), client);
    }
    // copy, so a held snapshot does not move with later disconnects
    const former = ConnectionStats.combine(this.formerMetrics, new ConnectionStats());
    return {
      uptimeSeconds: elapsedSeconds(this.startup, now),
      connectionsCount: this.connectionsCount,
      connectionsTotal: this.connectionsTotal,
      current,
      former,
      total: ConnectionStats.combine(former, current)
    };
  }

  export(now: number): string {
    return renderMetrics(this.snapshot(now));
  }
}
