/**
 * Structured Logging Module
 *
 * JSON-line logging with correlation ids, masking of sensitive values in
 * logged text, and an optional telemetry sink.
 *
 * @tested tests/property/logging.property.test.ts
 */

import { z } from 'zod';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Patterns masked in any logged string. Classifier inputs are free text
 * typed by users and may carry contact details or credentials.
 */
export const SENSITIVE_PATTERNS = {
  email: /[a-zA-Z0-9][a-zA-Z0-9._%+-]*@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  bearer: /\bBearer\s+[A-Za-z0-9._~+/=-]+/g,
  secretAssignment: /\b(api[_-]?key|token|secret|password)\s*[:=]\s*\S+/gi,
} as const;

/**
 * Metadata keys whose values are never logged
 */
export const SENSITIVE_FIELD_NAMES = ['password', 'secret', 'token', 'apiKey', 'authorization'] as const;

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: LogLevelSchema,
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Sink for forwarding traces to an external telemetry backend
 */
export interface TelemetryClient {
  trackTrace(message: string, severity: number, properties?: Record<string, string>): void;
  trackException(exception: Error, properties?: Record<string, string>): void;
  trackMetric(name: string, value: number, properties?: Record<string, string>): void;
  flush(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
  telemetryClient?: TelemetryClient;
  maskSensitive: boolean;
  /** Most recent entries kept for `getLogEntries`; 0 keeps none */
  maxEntries: number;
}

export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'classifier-runtime',
  minLevel: LogLevel.INFO,
  enableConsole: true,
  maskSensitive: true,
  maxEntries: 1000,
};

/**
 * Masks sensitive values in a string
 */
export function maskSensitiveString(value: string): string {
  return value
    .replace(SENSITIVE_PATTERNS.email, '[EMAIL_MASKED]')
    .replace(SENSITIVE_PATTERNS.bearer, 'Bearer [TOKEN_MASKED]')
    .replace(SENSITIVE_PATTERNS.secretAssignment, '$1=[SECRET_MASKED]');
}

export function isSensitiveFieldName(fieldName: string): boolean {
  const lower = fieldName.toLowerCase();
  return SENSITIVE_FIELD_NAMES.some((name) => lower.includes(name.toLowerCase()));
}

/**
 * Masks sensitive values in an object recursively
 */
export function maskSensitiveObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (typeof obj === 'string') {
    return maskSensitiveString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveObject(item, depth + 1));
  }

  if (obj !== null && typeof obj === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      masked[key] =
        isSensitiveFieldName(key) && value !== null && value !== undefined
          ? '[MASKED]'
          : maskSensitiveObject(value, depth + 1);
    }
    return masked;
  }

  return obj;
}

function logLevelToSeverity(level: LogLevel): number {
  switch (level) {
    case LogLevel.DEBUG:
      return 0;
    case LogLevel.INFO:
      return 1;
    case LogLevel.WARN:
      return 2;
    case LogLevel.ERROR:
      return 3;
    default:
      return 1;
  }
}

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
  return levels.indexOf(level) >= levels.indexOf(minLevel);
}

/**
 * Structured Logger
 */
export class Logger {
  private config: LoggerConfig;
  private correlationId?: string;
  private logEntries: LogEntry[] = [];

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...defaultLoggerConfig, ...config };
  }

  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  getCorrelationId(): string | undefined {
    return this.correlationId;
  }

  /**
   * Creates a child logger with a specific correlation ID. Entries written
   * by the child are also visible through the parent's `getLogEntries`.
   */
  child(correlationId: string): Logger {
    const childLogger = new Logger(this.config);
    childLogger.logEntries = this.logEntries;
    childLogger.setCorrelationId(correlationId);
    return childLogger;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.config.minLevel);
  }

  /**
   * Gets the retained log entries, oldest first (for testing)
   */
  getLogEntries(): LogEntry[] {
    return [...this.logEntries];
  }

  clearLogEntries(): void {
    this.logEntries.length = 0;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const mask = this.config.maskSensitive;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: mask ? maskSensitiveString(message) : message,
      service: this.config.serviceName,
      correlationId: this.correlationId,
    };

    if (metadata) {
      const masked = mask ? maskSensitiveObject(metadata) : metadata;
      entry.metadata = z.record(z.unknown()).parse(masked);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: mask ? maskSensitiveString(error.message) : error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  // Trims in place: children share the array
  private retain(entry: LogEntry): void {
    const { maxEntries } = this.config;
    if (maxEntries <= 0) {
      return;
    }
    this.logEntries.push(entry);
    if (this.logEntries.length > maxEntries) {
      this.logEntries.splice(0, this.logEntries.length - maxEntries);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, metadata, error);
    this.retain(entry);

    if (this.config.enableConsole) {
      const logFn = level === LogLevel.ERROR ? console.error : console.log;
      logFn(JSON.stringify(entry));
    }

    const telemetry = this.config.telemetryClient;
    if (telemetry) {
      const properties: Record<string, string> = { service: this.config.serviceName };
      if (this.correlationId) {
        properties.correlationId = this.correlationId;
      }
      if (entry.metadata) {
        properties.metadata = JSON.stringify(entry.metadata);
      }

      if (error) {
        telemetry.trackException(error, properties);
      } else {
        telemetry.trackTrace(entry.message, logLevelToSeverity(level), properties);
      }
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }

  flush(): void {
    this.config.telemetryClient?.flush();
  }
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

/**
 * In-memory telemetry client for testing
 */
export class InMemoryTelemetryClient implements TelemetryClient {
  public traces: Array<{ message: string; severity: number; properties?: Record<string, string> }> =
    [];
  public exceptions: Array<{ exception: Error; properties?: Record<string, string> }> = [];
  public metrics: Array<{ name: string; value: number; properties?: Record<string, string> }> = [];
  public flushCount = 0;

  trackTrace(message: string, severity: number, properties?: Record<string, string>): void {
    this.traces.push({ message, severity, properties });
  }

  trackException(exception: Error, properties?: Record<string, string>): void {
    this.exceptions.push({ exception, properties });
  }

  trackMetric(name: string, value: number, properties?: Record<string, string>): void {
    this.metrics.push({ name, value, properties });
  }

  flush(): void {
    this.flushCount++;
  }
}

let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger): void {
  globalLogger = logger;
}

/**
 * Resets the global logger (for testing)
 */
export function resetLogger(): void {
  globalLogger = null;
}
