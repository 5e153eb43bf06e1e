export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(event: string, payload?: Record<string, unknown>): void;
  info(event: string, payload?: Record<string, unknown>): void;
  warn(event: string, payload?: Record<string, unknown>): void;
  error(event: string, payload?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

/**
 * One JSON line per event. Payloads must not carry full message text;
 * use {@link preview} for anything user-authored.
 */
export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const write = (level: LogLevel, event: string, payload: Record<string, unknown> = {}) => {
    if (level === "debug" && !opts.debug) return;
    const line = JSON.stringify({
      level,
      scope,
      event,
      timestamp: new Date().toISOString(),
      ...payload,
    });
    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (event, payload) => write("debug", event, payload),
    info: (event, payload) => write("info", event, payload),
    warn: (event, payload) => write("warn", event, payload),
    error: (event, payload) => write("error", event, payload),
  };
}

/** Silent logger for tests and embedding. */
export const NOOP_LOGGER: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function preview(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
