type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function logDebug(...args: unknown[]) {
  if (!enabled("debug")) return;
  console.debug(new Date().toISOString(), ...args);
}

export function log(...args: unknown[]) {
  if (!enabled("info")) return;
  console.log(new Date().toISOString(), ...args);
}

export function logWarn(...args: unknown[]) {
  if (!enabled("warn")) return;
  console.warn(new Date().toISOString(), ...args);
}

export function logError(...args: unknown[]) {
  if (!enabled("error")) return;
  console.error(new Date().toISOString(), ...args);
}

export function logEvent(event: string, payload?: Record<string, unknown>) {
  if (!enabled("info")) return;
  const suffix = payload ? JSON.stringify(payload) : "";
  console.log(new Date().toISOString(), `[event:${event}]`, suffix);
}

/**
 * Fire-and-forget async operation with proper error logging.
 * Use instead of `.catch(() => {})` or `void promise` so failures are logged.
 */
export function fireAndForget(promise: Promise<unknown>, context: string): void {
  promise.catch((err) => {
    logError(`[fireAndForget] ${context} failed:`, err);
  });
}

export type { LogLevel };
