/**
 * Observability utilities for the Slack clients.
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Console logger options
 */
export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Shown in brackets on every line */
  name?: string;
  /** Fields added to the context of every line */
  context?: Record<string, unknown>;
}

const CONSOLE_METHODS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/** Bot, user and app tokens */
const TOKEN_PATTERN = /\b(xox[bpa]|xapp)-[A-Za-z0-9-]+/g;

/**
 * Mask platform tokens inside a string, keeping their prefix
 */
export function maskTokens(text: string): string {
  return text.replace(TOKEN_PATTERN, (_token, prefix: string) => `${prefix}-***`);
}

/**
 * Logger writing one line per entry to the console, tokens masked
 */
export class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private readonly name: string;
  private readonly context: Record<string, unknown>;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.name = options.name ?? 'slack-sdk';
    this.context = options.context ?? {};
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const fields = { ...this.context, ...context };
    let line = `${new Date().toISOString()} [${this.name}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(fields).length > 0) {
      line += ` ${JSON.stringify(fields)}`;
    }
    CONSOLE_METHODS[level](maskTokens(line));
  }
}

/**
 * No-op logger
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Replace credentials in headers before they reach a log line
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    redacted[name] = name.toLowerCase() === 'authorization' ? '(redacted)' : value;
  }
  return redacted;
}

/**
 * Metrics collector interface
 */
export interface MetricsCollector {
  increment(name: string, value?: number, tags?: Record<string, string>): void;
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

/**
 * Well-known metric names
 */
export const METRICS = {
  HTTP_REQUESTS: 'slack.http.requests',
  HTTP_RETRIES: 'slack.http.retries',
  HTTP_DURATION: 'slack.http.duration',
  REALTIME_RECONNECTS: 'slack.realtime.reconnects',
  REALTIME_MESSAGES: 'slack.realtime.messages',
} as const;

/**
 * In-memory metrics collector
 */
export class InMemoryMetrics implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private timings: Map<string, number[]> = new Map();

  private getKey(name: string, tags?: Record<string, string>): string {
    if (!tags || Object.keys(tags).length === 0) {
      return name;
    }
    const tagStr = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}[${tagStr}]`;
  }

  increment(name: string, value = 1, tags?: Record<string, string>): void {
    const key = this.getKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    const key = this.getKey(name, tags);
    const values = this.timings.get(key) ?? [];
    values.push(durationMs);
    this.timings.set(key, values);
  }

  /**
   * Read a counter (0 when never incremented)
   */
  getCounter(name: string, tags?: Record<string, string>): number {
    return this.counters.get(this.getKey(name, tags)) ?? 0;
  }

  /**
   * Get all metrics
   */
  getMetrics(): {
    counters: Record<string, number>;
    timings: Record<string, { count: number; min: number; max: number; avg: number; p95: number }>;
  } {
    const timingStats = (values: number[]) => {
      const sorted = [...values].sort((a, b) => a - b);
      const p95Index = Math.floor(sorted.length * 0.95);
      return {
        count: values.length,
        min: sorted[0] ?? 0,
        max: sorted[sorted.length - 1] ?? 0,
        avg: values.reduce((a, b) => a + b, 0) / values.length,
        p95: sorted[p95Index] ?? sorted[sorted.length - 1] ?? 0,
      };
    };

    return {
      counters: Object.fromEntries(this.counters),
      timings: Object.fromEntries(
        Array.from(this.timings.entries()).map(([k, v]) => [k, timingStats(v)])
      ),
    };
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.counters.clear();
    this.timings.clear();
  }
}

/**
 * No-op metrics collector
 */
export class NoopMetrics implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

/**
 * Logger and metrics handed to every client
 */
export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
}

/**
 * Create default observability
 */
export function createObservability(options?: {
  logLevel?: LogLevel;
  enableMetrics?: boolean;
}): Observability {
  return {
    logger: new ConsoleLogger({ level: options?.logLevel ?? 'info' }),
    metrics: options?.enableMetrics === false ? new NoopMetrics() : new InMemoryMetrics(),
  };
}

/**
 * Create silent observability (for testing)
 */
export function createSilentObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetrics(),
  };
}
