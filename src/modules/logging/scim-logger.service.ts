import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import {
  LogCategory,
  LogConfig,
  LogLevel,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/**
 * Correlation context attached to every log entry within a single request.
 */
export interface CorrelationContext {
  /** Propagated from X-Request-Id or generated. */
  requestId: string;
  method?: string;
  path?: string;
  /** Protocol dialect of the request (`v1` / `v2`), when it targets a SCIM route. */
  dialect?: string;
  /** Start timestamp for duration tracking */
  startTime?: number;
}

/**
 * A single structured log entry. In JSON mode each entry is one output line.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  requestId?: string;
  dialect?: string;
  method?: string;
  path?: string;
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

export interface RecentLogQuery {
  limit?: number;
  /** Minimum level */
  level?: LogLevel;
  category?: LogCategory;
  requestId?: string;
}

const SENSITIVE_KEY = /secret|password|token|authorization|bearer/i;

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * ScimLogger: structured, leveled, correlation-aware logger.
 *
 * - Levels TRACE → FATAL with a global threshold and per-category overrides
 * - Request correlation carried across async boundaries
 * - JSON output for production, pretty output for development
 * - Secret redaction and payload truncation in `data`
 * - Ring buffer of recent entries, served by the admin API
 *
 * Usage:
 *   this.logger.info(LogCategory.SCIM_USER, 'User created', { id });
 *   this.logger.trace(LogCategory.SCIM_PATCH, 'Normalized patch', { update });
 */
@Injectable()
export class ScimLogger {
  private config: LogConfig;

  private readonly ringBuffer: StructuredLogEntry[] = [];
  private readonly maxRingBufferSize = 500;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return correlationStorage.run(ctx, fn);
  }

  getContext(): CorrelationContext | undefined {
    return correlationStorage.getStore();
  }

  enrichContext(partial: Partial<CorrelationContext>): void {
    const current = correlationStorage.getStore();
    if (current) {
      Object.assign(current, partial);
    }
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return { ...this.config, categoryLevels: { ...this.config.categoryLevels } };
  }

  updateConfig(partial: Partial<LogConfig>): void {
    this.config = { ...this.config, ...partial };
  }

  setGlobalLevel(level: LogLevel | string): void {
    this.config.globalLevel = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  setCategoryLevel(category: LogCategory, level: LogLevel | string): void {
    this.config.categoryLevels[category] = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, category, message, data, this.formatError(error));
  }

  // ─── Ring buffer access (admin API) ───────────────────────────────

  getRecentLogs(query: RecentLogQuery = {}): StructuredLogEntry[] {
    let entries = [...this.ringBuffer];

    const { level, category, requestId } = query;
    if (level !== undefined) {
      entries = entries.filter((e) => parseLogLevel(e.level) >= level);
    }
    if (category) {
      entries = entries.filter((e) => e.category === category);
    }
    if (requestId) {
      entries = entries.filter((e) => e.requestId === requestId);
    }

    const limit = query.limit ?? 100;
    return limit > 0 ? entries.slice(-limit) : [];
  }

  clearRecentLogs(): void {
    this.ringBuffer.length = 0;
  }

  /** Whether a log at the given level + category would be emitted. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    const categoryLevel = category ? this.config.categoryLevels[category] : undefined;
    return level >= (categoryLevel ?? this.config.globalLevel);
  }

  // ─── Core logging logic ───────────────────────────────────────────

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (level >= LogLevel.OFF || !this.isEnabled(level, category)) return;

    const ctx = correlationStorage.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      requestId: ctx?.requestId,
      dialect: ctx?.dialect,
      method: ctx?.method,
      path: ctx?.path,
    };

    if (ctx?.startTime) {
      entry.durationMs = Date.now() - ctx.startTime;
    }

    if (errorInfo) {
      entry.error = this.config.includeStackTraces
        ? errorInfo
        : { message: errorInfo.message, name: errorInfo.name };
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.ringBuffer.push(entry);
    if (this.ringBuffer.length > this.maxRingBufferSize) {
      this.ringBuffer.shift();
    }

    if (this.config.format === 'json') {
      this.emitJson(level, entry);
    } else {
      this.emitPretty(level, entry);
    }
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return { message: error.message, name: error.name, stack: error.stack };
    }
    return { message: String(error) };
  }

  /** Truncate large payloads, redact secrets (recursively for nested objects). */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const limit = this.config.maxPayloadSizeBytes;
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEY.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }
      if (typeof value === 'string' && value.length > limit) {
        result[key] = value.slice(0, limit) + `...[truncated ${value.length - limit}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const redacted: unknown = JSON.parse(
          JSON.stringify(value, (k: string, v: unknown) => (k !== '' && SENSITIVE_KEY.test(k) ? '[REDACTED]' : v)),
        );
        const serialized = JSON.stringify(redacted);
        result[key] = serialized.length > limit ? serialized.slice(0, limit) + '...[truncated]' : redacted;
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  /** One JSON line per entry; WARN and above go to stderr. */
  private emitJson(level: LogLevel, entry: StructuredLogEntry): void {
    const line = JSON.stringify(entry) + '\n';
    if (level >= LogLevel.WARN) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  }

  private emitPretty(level: LogLevel, entry: StructuredLogEntry): void {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = entry.level.padEnd(5);
    const cat = entry.category.padEnd(12);
    const reqId = entry.requestId ? ` [${entry.requestId.slice(0, 8)}]` : '';
    const dialect = entry.dialect ? ` ${entry.dialect}` : '';
    const dur = entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '';
    const method = entry.method ? ` ${entry.method}` : '';
    const path = entry.path ? ` ${entry.path}` : '';

    let line = `${ts} ${this.colorize(level, lvl)} ${cat}${reqId}${dialect}${method}${path}${dur} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }

    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else if (level === LogLevel.INFO) {
      console.log(line);
    } else {
      console.debug(line);
    }
  }

  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;
      case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;
      default: return text;
    }
  }
}
