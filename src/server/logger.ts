export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type EmitLevel = Exclude<LogLevel, 'silent'>;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export type LogSink = (level: EmitLevel, line: string) => void;

// eslint-disable-next-line no-console
const consoleSink: LogSink = (level, line) => console[level](line);

function normalize(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? value.message : value;
  }
  return out;
}

/** `-v` count to level: none → warn, one → info, more → debug. */
export function levelFromVerbosity(verbose: number): LogLevel {
  if (verbose <= 0) return 'warn';
  if (verbose === 1) return 'info';
  return 'debug';
}

export class Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly prefix = 'tarpit',
    private readonly sink: LogSink = consoleSink
  ) {}

  child(prefix: string): Logger {
    return new Logger(this.level, `${this.prefix}:${prefix}`, this.sink);
  }

  enabled(level: EmitLevel): boolean {
    return levelOrder[level] >= levelOrder[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void { this.log('debug', message, data); }
  info(message: string, data?: Record<string, unknown>): void { this.log('info', message, data); }
  warn(message: string, data?: Record<string, unknown>): void { this.log('warn', message, data); }
  error(message: string, data?: Record<string, unknown>): void { this.log('error', message, data); }

  private log(level: EmitLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;
    const fields = data ? ` ${JSON.stringify(normalize(data))}` : '';
    this.sink(level, `[${this.prefix}] ${level.toUpperCase()} ${message}${fields}`);
  }
}
