import type { Socket } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import { MAX_TIMER_MS, monotonicNow } from '../clock.js';
import type { Logger } from '../logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import type { EventResult, Token } from '../types.js';

export const BANNER = 'bleep bloop\r\n';

export interface SessionContext {
  registry: MetricsRegistry;
  logger: Logger;
  delayMs: number;
  banner?: string;
  /** Bytes per write; a banner longer than this goes out as several chunks. */
  chunkBytes?: number;
  now?: () => number;
}

export interface SessionOutcome {
  peer: string;
  durationSeconds: number;
  error: string;
}

class ConnectionClosed extends Error {
  constructor() {
    super('connection closed');
    this.name = 'ConnectionClosed';
  }
}

/** OS error code when there is one (`ECONNRESET`, `EPIPE`), else the message. */
export function describeSocketError(err: unknown): string {
  if (err instanceof Error) {
    return 'code' in err && typeof err.code === 'string' ? err.code : err.message;
  }
  return String(err);
}

/** Waits `ms` even past the timer limit, in slices of at most `MAX_TIMER_MS`. */
export async function wait(ms: number, signal: AbortSignal): Promise<void> {
  let remaining = ms;
  do {
    const slice = Math.min(remaining, MAX_TIMER_MS);
    await sleep(slice, undefined, { signal });
    remaining -= slice;
  } while (remaining > 0);
}

export function splitChunks(banner: string, chunkBytes: number | undefined): string[] {
  if (chunkBytes === undefined || chunkBytes <= 0 || chunkBytes >= banner.length) return [banner];
  const chunks: string[] = [];
  for (let i = 0; i < banner.length; i += chunkBytes) chunks.push(banner.slice(i, i + chunkBytes));
  return chunks;
}

function writeAll(socket: Socket, data: string, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    // the callback fires once the data has been handed to the kernel
    socket.write(data, (err) => {
      signal.removeEventListener('abort', onAbort);
      if (err) reject(err);
      else resolve();
    });
  });
}

/**
 * Holds one admitted connection open: wait, write the banner, flush, repeat.
 * Each write is one chunk; a banner is counted once all of its chunks are out.
 * Ends only when the socket fails or is closed, then releases the token.
 * Always resolves.
 */
export async function runTarpitSession(socket: Socket, token: Token, peer: string, ctx: SessionContext): Promise<SessionOutcome> {
  const now = ctx.now ?? monotonicNow;
  const chunks = splitChunks(ctx.banner ?? BANNER, ctx.chunkBytes);
  const startedAt = now();
  const teardown = new AbortController();
  let cause: unknown;

  const onError = (err: Error) => {
    cause ??= err;
    teardown.abort(err);
  };
  const onClose = () => teardown.abort(new ConnectionClosed());
  const record = (result: EventResult) => {
    if (!result.ok) ctx.logger.error('record event failed', { peer, error: result.error });
  };
  socket.on('error', onError);
  socket.once('close', onClose);
  if (socket.destroyed) onClose();

  try {
    for (;;) {
      await wait(ctx.delayMs, teardown.signal);
      for (const chunk of chunks) {
        await writeAll(socket, chunk, teardown.signal);
        record(ctx.registry.sentChunk(token));
      }
      record(ctx.registry.sentBanner(token));
      ctx.logger.debug('banner', { peer });
    }
  } catch (err) {
    cause ??= teardown.signal.aborted ? teardown.signal.reason : err;
  } finally {
    socket.off('error', onError);
    socket.off('close', onClose);
    socket.destroy();
  }

  const error = describeSocketError(cause);
  const elapsedMs = now() - startedAt;
  const released = ctx.registry.disconnect(token, now());
  if (!released.ok) {
    ctx.logger.error('disconnect failed', { peer, error: released.error });
    return { peer, durationSeconds: Math.floor(elapsedMs / 1000), error };
  }
  ctx.logger.info('disconnect', {
    peer,
    duration: `${(elapsedMs / 1000).toFixed(2)}s`,
    error,
    clients: released.connected
  });
  return { peer, durationSeconds: released.durationSeconds, error };
}
