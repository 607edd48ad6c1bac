export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logging interface accepted by the client. Its methods match `console` and
 * the usual pino or winston instances, so any of those can be passed as is.
 * The client itself writes at `debug` (each attempt) and `warn` (retries,
 * suspicious configuration).
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console logger that drops messages below `minLevel`.
 *
 * @example
 * ```typescript
 * const client = new RentAHumanClient({ logger: createLogger("debug") });
 * // 2026-02-10T14:00:00.000Z DEBUG [rentahuman] GET /humans (attempt 1/4)
 * ```
 */
export function createLogger(
  minLevel: LogLevel = "info",
  prefix = "[rentahuman]",
): Logger {
  const emitter = (level: LogLevel, sink: (...data: unknown[]) => void) =>
    SEVERITY[level] < SEVERITY[minLevel]
      ? () => {}
      : (message: string, ...args: unknown[]) =>
          sink(
            `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`,
            ...args,
          );

  return {
    debug: emitter("debug", (...data) => console.debug(...data)),
    info: emitter("info", (...data) => console.info(...data)),
    warn: emitter("warn", (...data) => console.warn(...data)),
    error: emitter("error", (...data) => console.error(...data)),
  };
}

/** Discards everything; the client's default. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
