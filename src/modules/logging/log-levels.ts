/**
 * Structured Log Levels: RFC 5424 / OpenTelemetry severity ordering.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE  Full request/response bodies, normalized patch mutations.
 *   DEBUG  Filter parsing, member resolution, policy lookups.
 *   INFO   Directory events: user created, group patched, profile switched.
 *   WARN   Recoverable anomalies: blocked verb, rejected bearer token.
 *   ERROR  Unexpected failures surfaced as 500.
 *   FATAL  Unrecoverable start-up problems (e.g. invalid SCIM_PROFILE).
 *   OFF    Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  TRACE: LogLevel.TRACE,
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  FATAL: LogLevel.FATAL,
  OFF: LogLevel.OFF,
};

/** String → enum mapping (case-insensitive, numeric strings accepted). Falls back to INFO. */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  if (upper === '') return LogLevel.INFO;
  const named = LEVEL_NAMES[upper];
  if (named !== undefined) return named;
  const num = Number(upper);
  const byNumber = Object.values(LEVEL_NAMES).find((level) => level === num);
  return byNumber ?? LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/**
 * Log categories allow filtering by subsystem.
 */
export enum LogCategory {
  /** HTTP request/response lifecycle */
  HTTP = 'http',
  /** Bearer-token check */
  AUTH = 'auth',
  /** User CRUD */
  SCIM_USER = 'scim.user',
  /** Group CRUD and membership */
  SCIM_GROUP = 'scim.group',
  /** Patch normalization */
  SCIM_PATCH = 'scim.patch',
  /** Filter parsing */
  SCIM_FILTER = 'scim.filter',
  /** Profile / override changes and verb gating */
  POLICY = 'policy',
  /** Seed, clear, status */
  ADMIN = 'admin',
  /** General / uncategorized */
  GENERAL = 'general',
}

const CATEGORY_VALUES: readonly LogCategory[] = Object.values(LogCategory);

export function parseLogCategory(value: string): LogCategory | undefined {
  return CATEGORY_VALUES.find((category) => category === value);
}

export type LogFormat = 'json' | 'pretty';

/**
 * Runtime-configurable log configuration: global level plus per-category overrides.
 */
export interface LogConfig {
  /** Global minimum log level (LOG_LEVEL, default INFO). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'scim.patch': LogLevel.TRACE, 'auth': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include full request/response bodies in TRACE/DEBUG output. */
  includePayloads: boolean;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum payload size to log in bytes (default: 8KB). Larger bodies are truncated. */
  maxPayloadSizeBytes: number;

  /** 'json' for structured (production), 'pretty' for human-readable (dev). */
  format: LogFormat;
}

/** Environment variables the logger reads. */
export interface LogEnvironment {
  NODE_ENV?: string;
  LOG_LEVEL?: string;
  LOG_CATEGORY_LEVELS?: string;
  LOG_INCLUDE_PAYLOADS?: string;
  LOG_INCLUDE_STACKS?: string;
  LOG_MAX_PAYLOAD_SIZE?: string;
  LOG_FORMAT?: string;
}

/** Build the default log configuration from environment variables. */
export function buildDefaultLogConfig(env: LogEnvironment = process.env): LogConfig {
  const isProd = env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(env.LOG_CATEGORY_LEVELS),
    includePayloads: env.LOG_INCLUDE_PAYLOADS === 'true' || (!isProd && env.LOG_INCLUDE_PAYLOADS !== 'false'),
    includeStackTraces: env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd || env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  };
}

/**
 * Parse LOG_CATEGORY_LEVELS.
 * Format: "scim.patch=TRACE,auth=WARN,http=DEBUG"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = parseLogCategory(cat.trim());
      if (category) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
