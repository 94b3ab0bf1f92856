// ANSI escape helpers for console output, plus a component logger for the
// server side. Level and format come from the environment at call time.
const esc = (code: string) => (s: string) => `\x1b[${code}m${s}\x1b[0m`;

export const dim = esc("2");
export const bold = esc("1");
export const cyan = esc("36");
export const green = esc("32");
export const yellow = esc("33");
export const boldGreen = esc("1;32");

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function getLogLevel(): LogLevel {
  const level = (process.env.TLV_RELAY_LOG_LEVEL ?? "INFO").toUpperCase();
  return isLogLevel(level) ? level : "INFO";
}

function isLogJson(): boolean {
  return process.env.TLV_RELAY_LOG_JSON === "1";
}

export function formatLine(
  ts: string,
  level: LogLevel,
  component: string,
  msg: string,
  extra: Record<string, unknown> = {},
): string {
  if (isLogJson()) {
    return JSON.stringify({ ts, level, component, msg, ...extra });
  }
  const extraStr = Object.keys(extra).length > 0
    ? " " + Object.entries(extra).map(([k, v]) => `${k}=${v}`).join(" ")
    : "";
  return `${ts} [${level}] [${component}] ${msg}${extraStr}`;
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[getLogLevel()]) return;

  const line = formatLine(new Date().toISOString(), level, component, msg, extra);
  if (level === "ERROR" || level === "WARN") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

/** Logger for one component, e.g. "dispatcher" or "tunnel". */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log("DEBUG", component, msg, extra),
    info: (msg, extra) => log("INFO", component, msg, extra),
    warn: (msg, extra) => log("WARN", component, msg, extra),
    error: (msg, extra) => log("ERROR", component, msg, extra),
  };
}
