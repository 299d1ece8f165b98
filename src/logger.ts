/**
 * Structured logger for the console supervisor.
 *
 * - In production (NODE_ENV=production): emits newline-delimited JSON to stdout/stderr,
 *   suitable for log shippers and structured filtering.
 * - In development: emits human-readable text to stdout/stderr.
 *
 * Pass `server` in the meta object to correlate entries with a supervised instance.
 */

const isProduction = process.env.NODE_ENV === "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Optional structured metadata attached to a log entry. */
export interface LogMeta {
  server?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

function emit(level: LogLevel, message: string, meta?: LogMeta): void {
  if (isProduction) {
    const entry: Record<string, unknown> = {
      level,
      timestamp: new Date().toISOString(),
      message,
      ...meta,
    };
    const line = JSON.stringify(entry);
    if (level === "error" || level === "warn") {
      process.stderr.write(`${line}\n`);
    } else {
      process.stdout.write(`${line}\n`);
    }
  } else {
    const ts = new Date().toISOString();
    const tag = `[${ts}] [${level.toUpperCase().padEnd(5)}]`;
    const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    const line = `${tag} ${message}${metaStr}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger: Logger = {
  debug(message: string, meta?: LogMeta): void {
    // Only emit debug in non-production or when LOG_LEVEL=debug is set
    if (!isProduction || process.env.LOG_LEVEL === "debug") {
      emit("debug", message, meta);
    }
  },

  info(message: string, meta?: LogMeta): void {
    emit("info", message, meta);
  },

  warn(message: string, meta?: LogMeta): void {
    emit("warn", message, meta);
  },

  error(message: string, meta?: LogMeta): void {
    emit("error", message, meta);
  },
};

/** Logger that stamps every entry with the instance name. */
export function serverLogger(server: string): Logger {
  return {
    debug: (message, meta) => logger.debug(message, { server, ...meta }),
    info: (message, meta) => logger.info(message, { server, ...meta }),
    warn: (message, meta) => logger.warn(message, { server, ...meta }),
    error: (message, meta) => logger.error(message, { server, ...meta }),
  };
}
