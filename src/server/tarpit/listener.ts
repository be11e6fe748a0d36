import net from 'node:net';
import type { Server, ServerOpts, Socket } from 'node:net';
import { monotonicNow } from '../clock.js';
import { formatAddress } from '../config.js';
import type { Logger } from '../logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import type { ListenAddress } from '../types.js';
import { describeSocketError, runTarpitSession } from './session.js';
import type { SessionOutcome } from './session.js';

export const SEND_BUFFER_BYTES = 64;

export class BindError extends Error {
  constructor(readonly address: ListenAddress, cause: unknown) {
    super(`bind(${formatAddress(address)}) failed: ${describeSocketError(cause)}`, { cause });
    this.name = 'BindError';
  }
}

export interface ListenerContext {
  registry: MetricsRegistry;
  logger: Logger;
  maxClients?: number;
  delayMs: number;
  banner?: string;
  sendBufferBytes?: number;
  now?: () => number;
}

/**
 * Best-effort socket setup for a held connection. Problems are logged as
 * warnings and never stop the session.
 */
export function configureTarpitSocket(socket: Socket, sendBufferBytes: number, logger: Logger): void {
  try {
    // never read: the kernel receive buffer fills and the peer's window closes
    socket.pause();
  } catch (err) {
    logger.warn('pause() failed', { error: describeSocketError(err) });
  }
  try {
    socket.setNoDelay(true);
  } catch (err) {
    logger.warn('setNoDelay() failed', { error: describeSocketError(err) });
  }
  if (socket.writableHighWaterMark !== sendBufferBytes) {
    logger.warn('send buffer not applied', { expected: sendBufferBytes, actual: socket.writableHighWaterMark });
  }
}

export class TarpitListener {
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();
  private readonly sessions = new Set<Promise<SessionOutcome>>();
  private readonly logger: Logger;

  constructor(private readonly ctx: ListenerContext) {
    this.logger = ctx.logger.child('listener');
    // highWaterMark on the server applies to every accepted socket (Node >= 20.1);
    // configureTarpitSocket reports a socket where it did not take
    const options: ServerOpts & { highWaterMark?: number; noDelay?: boolean } = {
      pauseOnConnect: true,
      noDelay: true,
      highWaterMark: ctx.sendBufferBytes ?? SEND_BUFFER_BYTES
    };
    this.server = net.createServer(options, (socket) => this.accept(socket));
  }

  start(address: ListenAddress): Promise<ListenAddress> {
    return new Promise((resolve, reject) => {
      const onBindError = (err: Error) => reject(new BindError(address, err));
      this.server.once('error', onBindError);
      this.server.listen(address.port, address.host, () => {
        this.server.off('error', onBindError);
        this.server.on('error', (err) => this.logger.error('accept failed', { error: describeSocketError(err) }));
        const bound = this.server.address();
        if (bound === null || typeof bound === 'string') {
          reject(new BindError(address, new Error(`unexpected address ${String(bound)}`)));
          return;
        }
        this.logger.info('listen', { addr: formatAddress({ host: bound.address, port: bound.port }) });
        resolve({ host: bound.address, port: bound.port });
      });
    });
  }

  /** Stops accepting, tears down every live session and waits for them to be released. */
  async stop(): Promise<void> {
    const closed = new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });
    for (const socket of this.sockets) socket.destroy();
    await this.settled();
    await closed;
  }

  async settled(): Promise<SessionOutcome[]> {
    return Promise.all([...this.sessions]);
  }

  activeSessions(): number { return this.sessions.size; }

  private accept(socket: Socket): void {
    const { remoteAddress, remotePort } = socket;
    if (remoteAddress === undefined || remotePort === undefined) {
      this.logger.error('peer address unavailable');
      socket.destroy();
      return;
    }
    const peer = formatAddress({ host: remoteAddress, port: remotePort });
    const now = this.ctx.now ?? monotonicNow;

    const admitted = this.ctx.registry.connect(this.ctx.maxClients, now());
    if (!admitted.ok) {
      this.logger.info('reject', { peer, clients: admitted.connected });
      socket.destroy();
      return;
    }
    this.logger.info('connect', { peer, clients: admitted.connected });

    configureTarpitSocket(socket, this.ctx.sendBufferBytes ?? SEND_BUFFER_BYTES, this.logger);
    this.sockets.add(socket);
    const session = runTarpitSession(socket, admitted.token, peer, {
      registry: this.ctx.registry,
      logger: this.logger,
      delayMs: this.ctx.delayMs,
      banner: this.ctx.banner,
      now
    }).finally(() => {
      this.sockets.delete(socket);
      this.sessions.delete(session);
    });
    this.sessions.add(session);
  }
}
