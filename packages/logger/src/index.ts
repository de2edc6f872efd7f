export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly runId?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  readonly minLevel: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Returns a logger that merges `meta` into every entry it writes. */
  withContext(meta: LogMeta): Logger;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to DOWNTICK_LOG_LEVEL, then "debug". */
  readonly minLevel?: LogLevel;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
};

const resolveMinLevel = (options: LoggerOptions): LogLevel => {
  if (options.minLevel) {
    return options.minLevel;
  }
  const fromEnv = process.env.DOWNTICK_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "debug";
};

const writeLine = (level: LogLevel, line: string): void => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { runId, ...rest } = meta ?? {};

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof runId === "string" ? { runId } : {}),
    ...rest,
  };
};

const buildLogger = (moduleName: string, minLevel: LogLevel, baseMeta: LogMeta): Logger => {
  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, { ...baseMeta, ...meta });
    writeLine(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    minLevel,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    withContext: (meta) => buildLogger(moduleName, minLevel, { ...baseMeta, ...meta }),
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  return buildLogger(moduleName, resolveMinLevel(options), {});
};
