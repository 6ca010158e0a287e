import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = (level: LogLevel, message: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function formatLogLine(level: LogLevel, message: string): string {
  return level === "debug" ? pc.dim(`[debug] ${message}`) : `[${level}] ${message}`;
}

const stderrSink: LogSink = (level, message) => {
  process.stderr.write(`${formatLogLine(level, message)}\n`);
};

export interface LoggerOptions {
  debug?: boolean;
  sink?: LogSink;
}

export function createLogger({debug = false, sink = stderrSink}: LoggerOptions = {}): Logger {
  return {
    debug(message) {
      if (debug) {
        sink("debug", message);
      }
    },
    info(message) {
      sink("info", message);
    },
    warn(message) {
      sink("warn", message);
    },
    error(message) {
      sink("error", message);
    }
  };
}

export const silentLogger: Logger = createLogger({sink: () => undefined});
