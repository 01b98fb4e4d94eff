type LogLevel = "debug" | "info" | "warn" | "error";
type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLevel(value: string): value is LogLevel {
  return Object.hasOwn(WEIGHTS, value);
}

function shouldEmit(level: LogLevel): boolean {
  const envLevel = String(process.env.HEPC_LOG_LEVEL ?? "").toLowerCase().trim();
  if (envLevel === "silent" || envLevel === "off" || envLevel === "none") {
    return false;
  }
  const threshold = isLevel(envLevel) ? WEIGHTS[envLevel] : WEIGHTS.info;
  return WEIGHTS[level] >= threshold;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (!shouldEmit(level)) return;

  // stdout belongs to command output (`hepc select`, `hepc packs`); logs go to stderr.
  const logger = level === "warn" ? console.warn : console.error;
  const line = `[hepc] ${level.toUpperCase()} ${message}`;
  if (context && Object.keys(context).length > 0) {
    logger(line, context);
    return;
  }
  logger(line);
};

export const logInfo: LoggerFn = (message, context) => emit("info", message, context);
export const logWarning: LoggerFn = (message, context) => emit("warn", message, context);
export const logError: LoggerFn = (message, context) => emit("error", message, context);
export const logDebug: LoggerFn = (message, context) => emit("debug", message, context);
