#!/usr/bin/env node
import express from 'express';
import http from 'node:http';
import { monotonicNow } from './clock.js';
import { ConfigError, formatAddress, loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { EX_OK, EX_OSERR, EX_USAGE } from './exit-codes.js';
import { Logger } from './logger.js';
import { MetricsRegistry } from './metrics/registry.js';
import { makeMetricsRoute } from './api/metrics-route.js';
import { makeStatusRoute } from './api/status-route.js';
import { BindError, TarpitListener } from './tarpit/listener.js';
import type { ListenAddress } from './types.js';

function listenHttp(server: http.Server, address: ListenAddress): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(new BindError(address, err));
    server.once('error', onError);
    server.listen(address.port, address.host, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

function readConfig(logger: Logger): AppConfig {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      process.exit(EX_USAGE);
    }
    throw err;
  }
}

const config = readConfig(new Logger('error'));
const logger = new Logger(config.logLevel);
const registry = new MetricsRegistry(monotonicNow());

const tarpit = new TarpitListener({
  registry,
  logger,
  maxClients: config.maxClients,
  delayMs: config.delaySeconds * 1000
});

let metricsServer: http.Server | undefined;

try {
  await tarpit.start(config.listen);
  if (config.metrics) {
    const app = express();
    const ctx = { registry, now: monotonicNow };
    app.use(makeMetricsRoute(ctx));
    app.use(makeStatusRoute(ctx));
    metricsServer = http.createServer(app);
    await listenHttp(metricsServer, config.metrics);
    logger.info('metrics', { addr: formatAddress(config.metrics) });
  }
} catch (err) {
  if (err instanceof BindError) {
    logger.error(err.message);
    process.exit(EX_OSERR);
  }
  throw err;
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info('shutdown', { signal, clients: registry.connections() });
    metricsServer?.close();
    void tarpit.stop().then(
      () => process.exit(EX_OK),
      (err: unknown) => {
        logger.error('shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      }
    );
  });
}
