// utils/logger.ts
// Levelled, namespaced logger with pretty or JSON-line output.
// - Levels: trace, debug, info, warn, error, fatal (+ silent)
// - Child loggers with merged context and "parent:child" names
// - Timers: const done = log.time("profile"); ...; done({ columns })
// Defaults come from LOG_LEVEL, LOG_JSON and LOG_COLORS.

/* ================================= Types ================================ */

export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export type LogData = Record<string, unknown>;

export type LogRecord = {
  time: string;               // ISO timestamp
  level: LogLevelName;
  name?: string;
  msg: string;
  data?: LogData;
};

export type LogSink = (line: string, rec: LogRecord) => void;

export type LoggerOptions = {
  name?: string;
  level?: LogLevelName;       // default LOG_LEVEL or "info"
  json?: boolean;             // default LOG_JSON or false
  colors?: boolean;           // default LOG_COLORS or stdout is a TTY
  context?: LogData;          // fields added to every record
  sink?: LogSink;             // default: console by level
};

export type Timer = (extra?: LogData) => void;

export type Logger = {
  trace(msg: string, data?: LogData): void;
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  fatal(msg: string, data?: LogData): void;

  child(nameOrCtx?: string | LogData): Logger;
  time(label: string, base?: LogData, level?: LogLevelName): Timer;
};

/* ============================ Implementation ============================ */

const LEVELS: readonly LogLevelName[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];
const LEVEL_NUM: Record<LogLevelName, number> = {
  trace: 10, debug: 20, info: 30, warn: 40, error: 50, fatal: 60, silent: 1000,
};

const LABEL: Record<LogLevelName, string> = {
  trace: "TRACE", debug: "DEBUG", info: "INFO ", warn: "WARN ", error: "ERROR", fatal: "FATAL", silent: "     ",
};

const COLOR: Record<LogLevelName, string> = {
  trace: "\x1b[90m", debug: "\x1b[34m", info: "\x1b[32m", warn: "\x1b[33m",
  error: "\x1b[31m", fatal: "\x1b[35m\x1b[1m", silent: "",
};
const RESET = "\x1b[0m";
const CYAN = "\x1b[36m";
const GRAY = "\x1b[90m";

export function parseLevel(v?: string): LogLevelName | undefined {
  if (!v) return undefined;
  const s = v.trim().toLowerCase();
  return LEVELS.find((l) => l === s);
}

export function parseBool(v?: string): boolean | undefined {
  if (v == null) return undefined;
  const s = v.trim().toLowerCase();
  if (s === "1" || s === "true" || s === "yes" || s === "on") return true;
  if (s === "0" || s === "false" || s === "no" || s === "off") return false;
  return undefined;
}

// Handles circular refs, bigint and Error values.
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_k, v: unknown) => {
    if (typeof v === "bigint") return String(v);
    if (v instanceof Error) return { name: v.name, message: v.message, stack: v.stack };
    if (typeof v === "object" && v !== null) {
      if (seen.has(v)) return "[Circular]";
      seen.add(v);
    }
    return v;
  });
}

// key=value rendering for pretty mode
function kv(data: LogData): string {
  const parts: string[] = [];
  for (const [k, v] of Object.entries(data)) {
    let s: string;
    if (v == null) s = "null";
    else if (typeof v === "string") s = /\s|["=]/.test(v) ? JSON.stringify(v) : v;
    else if (typeof v === "number" || typeof v === "boolean") s = String(v);
    else if (v instanceof Error) s = JSON.stringify({ name: v.name, message: v.message });
    else s = safeStringify(v);
    parts.push(k + "=" + s);
  }
  return parts.join(" ");
}

function merge(...objs: Array<LogData | undefined>): LogData | undefined {
  let out: LogData | undefined;
  for (const o of objs) {
    if (!o) continue;
    out = { ...(out ?? {}), ...o };
  }
  return out;
}

function consoleSink(line: string, rec: LogRecord): void {
  if (rec.level === "error" || rec.level === "fatal") console.error(line);
  else if (rec.level === "warn") console.warn(line);
  else console.log(line);
}

/* ================================ Factory =============================== */

export function createLogger(opts: LoggerOptions = {}): Logger {
  const env = process.env;
  const state = {
    name: opts.name,
    level: opts.level ?? parseLevel(env.LOG_LEVEL) ?? "info",
    json: opts.json ?? parseBool(env.LOG_JSON) ?? false,
    colors: opts.colors ?? parseBool(env.LOG_COLORS) ?? Boolean(process.stdout.isTTY),
    ctx: opts.context ? { ...opts.context } : undefined,
    sink: opts.sink ?? consoleSink,
  };

  const paint = (text: string, color: string) => (state.colors ? color + text + RESET : text);

  function isEnabled(lvl: LogLevelName): boolean {
    return state.level !== "silent" && lvl !== "silent" && LEVEL_NUM[lvl] >= LEVEL_NUM[state.level];
  }

  function render(rec: LogRecord): string {
    if (state.json) {
      return safeStringify({ time: rec.time, level: rec.level, name: rec.name, msg: rec.msg, data: rec.data });
    }
    return [
      paint(rec.time, GRAY),
      paint(LABEL[rec.level], COLOR[rec.level]),
      rec.name ? paint(rec.name, CYAN) : "",
      rec.msg,
      rec.data ? kv(rec.data) : "",
    ].filter(Boolean).join(" ");
  }

  function log(lvl: LogLevelName, msg: string, data?: LogData): void {
    if (!isEnabled(lvl)) return;
    const rec: LogRecord = { time: new Date().toISOString(), level: lvl, name: state.name, msg };
    const merged = merge(state.ctx, data);
    if (merged) rec.data = merged;
    state.sink(render(rec), rec);
  }

  const api: Logger = {
    trace: (m, d) => log("trace", m, d),
    debug: (m, d) => log("debug", m, d),
    info: (m, d) => log("info", m, d),
    warn: (m, d) => log("warn", m, d),
    error: (m, d) => log("error", m, d),
    fatal: (m, d) => log("fatal", m, d),

    child(nameOrCtx) {
      const sub = typeof nameOrCtx === "string" ? nameOrCtx : undefined;
      return createLogger({
        name: state.name && sub ? `${state.name}:${sub}` : (sub ?? state.name),
        level: state.level,
        json: state.json,
        colors: state.colors,
        context: merge(state.ctx, typeof nameOrCtx === "object" ? nameOrCtx : undefined),
        sink: state.sink,
      });
    },

    time(label, base, level = "debug") {
      const start = Date.now();
      return (extra) => log(level, label, merge(base, extra, { ms: Date.now() - start }));
    },
  };

  return api;
}

/** Logger that drops everything; the default inside the library. */
export const silentLogger: Logger = createLogger({ level: "silent", sink: () => undefined });
