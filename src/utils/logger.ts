/**
 * Structured logging with a pino-style surface: numeric levels, bindings
 * merged into every entry, and child loggers.
 *
 * Entries are written as JSON lines, or as one coloured line each when
 * pretty printing is on (the default outside production). LOG_LEVEL picks
 * the threshold and LOG_PRETTY=false forces JSON.
 *
 *   const log = createServiceLogger("TransactionFeed");
 *   log.warn("Rejected transaction", { transactionId: 42 });
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Numeric log level values (pino-compatible) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LogContext {
  /** Service or component name */
  service?: string;
  [key: string]: unknown;
}

interface LogEntry {
  time: string;
  level: LogLevel;
  levelNum: number;
  msg: string;
  [key: string]: unknown;
}

/** Receives each formatted line */
export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  prettyPrint?: boolean;
  bindings?: LogContext;
  writer?: LogWriter;
}

type LogMethod = {
  (msg: string, context?: LogContext): void;
  (context: LogContext, msg: string): void;
};

export interface Logger {
  level: LogLevel;
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child(bindings: LogContext): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export function getLogLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) return level;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

export function shouldPrettyPrint(): boolean {
  if (process.env.LOG_PRETTY === "false") return false;
  return process.env.NODE_ENV !== "production";
}

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const CYAN = "\x1b[36m";

const LEVEL_STYLE: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: CYAN,
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[31m\x1b[1m",
};

const ENVELOPE_KEYS = new Set(["time", "level", "levelNum", "msg", "service"]);

function toJsonLine(entry: LogEntry): string {
  return JSON.stringify(entry, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

function toPrettyLine(entry: LogEntry): string {
  const clock = entry.time.slice(11, 23);
  const level = LEVEL_STYLE[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
  const service = typeof entry.service === "string" ? `${CYAN}[${entry.service}]${RESET} ` : "";

  const fields = Object.entries(entry)
    .filter(([key]) => !ENVELOPE_KEYS.has(key))
    .map(([key, value]): [string, unknown] => [key, value instanceof Error ? value.message : value]);
  const extra = fields.length > 0 ? ` ${DIM}${JSON.stringify(Object.fromEntries(fields))}${RESET}` : "";

  return `${DIM}${clock}${RESET} ${level} ${service}${entry.msg}${extra}`;
}

/* eslint-disable no-console */
const CONSOLE_SINKS: Record<LogLevel, (line: string) => void> = {
  trace: (line) => console.debug(line),
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
  fatal: (line) => console.error(line),
};
/* eslint-enable no-console */

const consoleWriter: LogWriter = (level, line) => CONSOLE_SINKS[level](line);

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? getLogLevelFromEnv();
  const prettyPrint = options.prettyPrint ?? shouldPrettyPrint();
  const bindings = options.bindings ?? {};
  const writer = options.writer ?? consoleWriter;
  const threshold = LOG_LEVELS[level];

  function write(entryLevel: LogLevel, msg: string, context: LogContext): void {
    if (LOG_LEVELS[entryLevel] < threshold) return;

    const entry: LogEntry = {
      time: new Date().toISOString(),
      level: entryLevel,
      levelNum: LOG_LEVELS[entryLevel],
      msg,
      ...bindings,
      ...context,
    };
    if (options.name) entry.service = options.name;

    writer(entryLevel, prettyPrint ? toPrettyLine(entry) : toJsonLine(entry));
  }

  const method = (entryLevel: LogLevel): LogMethod =>
    (first: string | LogContext, second?: string | LogContext) => {
      if (typeof first === "string") {
        write(entryLevel, first, typeof second === "object" ? second : {});
      } else {
        write(entryLevel, typeof second === "string" ? second : "", first);
      }
    };

  return {
    level,
    trace: method("trace"),
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    fatal: method("fatal"),
    child: (extra) =>
      createLogger({
        level,
        prettyPrint,
        writer,
        name: extra.service ?? options.name,
        bindings: { ...bindings, ...extra },
      }),
  };
}

export const logger = createLogger({ name: "risk-engine" });

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

/** Writes nothing; the default for tests */
export function createSilentLogger(): Logger {
  return createLogger({ level: "fatal", writer: () => undefined });
}

/**
 * Reduce an unknown thrown value to loggable fields
 */
export function errorContext(error: unknown): LogContext {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return code ? { error: error.message, errorName: error.name, code } : { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}
