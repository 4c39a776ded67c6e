/**
 * Logging hook.
 * stdout belongs to the MCP transport, so everything goes to stderr.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = (level: LogLevel, message: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger writing `[prefix] message` lines to stderr, dropping levels below `minLevel`.
 */
export function consoleLogger(prefix: string, minLevel: LogLevel = "warn"): Logger {
  return (level, message) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    console.error(`[${prefix}] ${level === "info" ? "" : `${level}: `}${message}`);
  };
}

export const silentLogger: Logger = () => {};
