import type { ConnectionStats } from './metrics/connection-stats.js';

export type EventKind = 'chunk' | 'easteregg' | 'banner';
export type RegistryError = 'invalid_token' | 'already_disconnected';

export interface ClientRecord {
  start: number;
  sentChunks: number;
  sentEastereggs: number;
  sentBanners: number;
}

export interface ListenAddress {
  host: string;
  port: number;
}

export type ConnectResult =
  | { ok: true; token: Token; connected: number }
  | { ok: false; connected: number };

export type DisconnectResult =
  | { ok: true; connected: number; durationSeconds: number }
  | { ok: false; error: RegistryError };

export type EventResult = { ok: true } | { ok: false; error: RegistryError };

export interface MetricsSnapshot {
  uptimeSeconds: number;
  connectionsCount: number;
  connectionsTotal: number;
  current: ConnectionStats;
  former: ConnectionStats;
  total: ConnectionStats;
}

/** Handle for one admitted connection; dangling once it has been disconnected. */
export class Token {
  constructor(readonly slot: number) {}
}
