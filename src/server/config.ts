import { parseArgs } from 'node:util';
import { z } from 'zod';
import { MAX_TIMER_MS } from './clock.js';
import { levelFromVerbosity } from './logger.js';
import type { LogLevel } from './logger.js';
import type { ListenAddress } from './types.js';

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
  }
}

export interface AppConfig {
  listen: ListenAddress;
  maxClients?: number;
  delaySeconds: number;
  logLevel: LogLevel;
  /** Address of the `/metrics` endpoint; absent when disabled. */
  metrics?: ListenAddress;
}

export function parseListenAddress(value: string): ListenAddress | null {
  const match = /^\[([^\]]+)\]:(\d{1,5})$/.exec(value) ?? /^([^:[\]]+):(\d{1,5})$/.exec(value);
  if (!match) return null;
  const port = Number(match[2]);
  if (port > 65_535) return null;
  return { host: match[1], port };
}

export function formatAddress({ host, port }: ListenAddress): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

/** Longest delay that still fits in a single Node timer. */
export const MAX_DELAY_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

const addressSchema = z.string().trim().transform((value, ctx) => {
  const parsed = parseListenAddress(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected host:port, got "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

const configSchema = z.object({
  listen: addressSchema.default('0.0.0.0:2222'),
  maxClients: z.coerce.number().int().nonnegative().optional(),
  delaySeconds: z.coerce.number().int().positive().max(MAX_DELAY_SECONDS).default(10),
  verbose: z.coerce.number().int().nonnegative().default(0),
  metricsListen: addressSchema.default('127.0.0.1:9222'),
  metrics: z.boolean().default(true)
});

export interface EnvBindings {
  TARPIT_LISTEN?: string;
  TARPIT_MAX_CLIENTS?: string;
  TARPIT_DELAY?: string;
  TARPIT_VERBOSE?: string;
  TARPIT_METRICS_LISTEN?: string;
  TARPIT_METRICS?: string;
}

function present(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        listen: { type: 'string', short: 'l' },
        'max-clients': { type: 'string', short: 'c' },
        delay: { type: 'string', short: 'd' },
        verbose: { type: 'boolean', short: 'v', multiple: true },
        'metrics-listen': { type: 'string' },
        'no-metrics': { type: 'boolean' }
      }
    }).values;
  } catch (err) {
    throw new ConfigError([err instanceof Error ? err.message : String(err)]);
  }
}

/** Command-line flags take precedence over the environment. */
export function loadConfig(argv: string[], env: EnvBindings): AppConfig {
  const values = readArgv(argv);
  const parsed = configSchema.safeParse({
    listen: present(values.listen) ?? present(env.TARPIT_LISTEN),
    maxClients: present(values['max-clients']) ?? present(env.TARPIT_MAX_CLIENTS),
    delaySeconds: present(values.delay) ?? present(env.TARPIT_DELAY),
    verbose: values.verbose?.length ?? present(env.TARPIT_VERBOSE),
    metricsListen: present(values['metrics-listen']) ?? present(env.TARPIT_METRICS_LISTEN),
    metrics: values['no-metrics'] === true ? false : env.TARPIT_METRICS?.trim().toLowerCase() !== 'off'
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`));
  }

  const data = parsed.data;
  return {
    listen: data.listen,
    maxClients: data.maxClients,
    delaySeconds: data.delaySeconds,
    logLevel: levelFromVerbosity(data.verbose),
    metrics: data.metrics ? data.metricsListen : undefined
  };
}
