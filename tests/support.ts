import net from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';
import type { Socket } from 'node:net';
import { Logger } from '../src/server/logger.js';
import type { LogLevel } from '../src/server/logger.js';

export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger(level, 'tarpit', (_level, line) => lines.push(line)), lines };
}

export interface SocketPair {
  server: Socket;
  client: Socket;
  received: () => string;
  close: () => Promise<void>;
}

/** A connected loopback pair; the server end starts paused, as the listener leaves it. */
export async function socketPair(): Promise<SocketPair> {
  const srv = net.createServer({ pauseOnConnect: true });
  const accepted = new Promise<Socket>((resolve) => srv.once('connection', resolve));
  await new Promise<void>((resolve) => srv.listen(0, '127.0.0.1', () => resolve()));
  const address = srv.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

  const client = net.connect(address.port, '127.0.0.1');
  let data = '';
  client.setEncoding('utf8');
  client.on('data', (chunk: string) => { data += chunk; });
  client.on('error', () => undefined);
  const server = await accepted;

  return {
    server,
    client,
    received: () => data,
    close: async () => {
      client.destroy();
      server.destroy();
      await new Promise<void>((resolve) => srv.close(() => resolve()));
    }
  };
}

export async function waitFor(check: () => boolean, timeoutMs = 5_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await delay(5);
  }
}

export function closed(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    if (socket.destroyed) resolve();
    else socket.once('close', () => resolve());
  });
}
