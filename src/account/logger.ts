// src/account/logger.ts — Structured account-state logger
//
// Writes one JSON object per line. Callers pass an event name and flat fields;
// phone numbers must be redacted by the caller (see redactPhoneNumber).

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

/** Structured log entry shape */
export interface AccountLogEntry {
  timestamp: string
  level: LogLevel
  component: string
  event: string
  error?: string
  error_name?: string
  [key: string]: unknown
}

export interface AccountLogger {
  debug(event: string, fields?: Record<string, unknown>): void
  info(event: string, fields?: Record<string, unknown>): void
  warn(event: string, fields?: Record<string, unknown>): void
  /** Log a failure; error message and name are lifted into the entry */
  error(event: string, error: unknown, fields?: Record<string, unknown>): void
  /** Logger that stamps a different component name on every entry */
  child(component: string): AccountLogger
}

export type LogSink = (line: string, level: LogLevel) => void

export interface AccountLoggerOptions {
  level?: LogLevel
  component?: string
  sink?: LogSink
  now?: () => Date
}

// ---------------------------------------------------------------------------
// Default Implementation
// ---------------------------------------------------------------------------

class JsonLineAccountLogger implements AccountLogger {
  private readonly threshold: number

  constructor(
    private readonly level: LogLevel,
    private readonly component: string,
    private readonly sink: LogSink,
    private readonly now: () => Date,
  ) {
    this.threshold = LOG_LEVELS.indexOf(level)
  }

  debug(event: string, fields?: Record<string, unknown>): void {
    this.write("debug", event, fields)
  }

  info(event: string, fields?: Record<string, unknown>): void {
    this.write("info", event, fields)
  }

  warn(event: string, fields?: Record<string, unknown>): void {
    this.write("warn", event, fields)
  }

  error(event: string, error: unknown, fields?: Record<string, unknown>): void {
    this.write("error", event, {
      ...(fields ?? {}),
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof Error ? { error_name: error.name } : {}),
    })
  }

  child(component: string): AccountLogger {
    return new JsonLineAccountLogger(this.level, component, this.sink, this.now)
  }

  private write(level: LogLevel, event: string, fields?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return
    const entry: AccountLogEntry = {
      ...(fields ?? {}),
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
    }
    this.sink(JSON.stringify(entry), level)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create an AccountLogger. Defaults: level "info", component "account",
 * warn/error lines to console.error and the rest to console.log.
 */
export function createAccountLogger(options: AccountLoggerOptions = {}): AccountLogger {
  return new JsonLineAccountLogger(
    options.level ?? "info",
    options.component ?? "account",
    options.sink ?? consoleSink,
    options.now ?? (() => new Date()),
  )
}

function consoleSink(line: string, level: LogLevel): void {
  if (level === "warn" || level === "error") {
    console.error(line)
  } else {
    console.log(line)
  }
}
