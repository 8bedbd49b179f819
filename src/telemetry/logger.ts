import { destination, pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: { level: LogLevel; destination?: DestinationStream }): Logger {
  return pino(
    {
      name: "pve-tool",
      level: options.level,
      // Tokens end up in settings and request headers; never print them.
      redact: {
        paths: ["token", "settings.token", "headers.Authorization", 'headers["Authorization"]'],
        censor: "[redacted]"
      }
    },
    // stdout carries command output, diagnostics go to stderr.
    options.destination ?? destination(2)
  );
}

/** Logger for code paths constructed without one (tests, library use). */
export const silentLogger: Logger = pino({ level: "silent" });
