export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  child(name: string): Logger;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function is_log_level(v: string): v is LogLevel {
  return v in LEVEL_ORDER;
}

export function parse_log_level(raw: string | undefined, fallback: LogLevel = DEFAULT_LOG_LEVEL): LogLevel {
  const v = String(raw || "").trim().toLowerCase();
  return is_log_level(v) ? v : fallback;
}

export function format_ctx(ctx: LogContext | undefined): string {
  if (!ctx) return "";
  const parts: string[] = [];
  for (const [k, v] of Object.entries(ctx)) {
    if (v === undefined) continue;
    parts.push(`${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/** stdout belongs to motd/list output, so every level goes to stderr. */
const stderr_sink: LogSink = (line) => {
  console.error(line);
};

class ConsoleLogger implements Logger {
  private readonly name: string;
  private readonly prefix: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(name: string, level: LogLevel, sink: LogSink) {
    this.name = name;
    this.prefix = `[${name}]`;
    this.level = level;
    this.sink = sink;
  }

  debug(msg: string, ctx?: LogContext): void { this.log("debug", msg, ctx); }
  info(msg: string, ctx?: LogContext): void { this.log("info", msg, ctx); }
  warn(msg: string, ctx?: LogContext): void { this.log("warn", msg, ctx); }
  error(msg: string, ctx?: LogContext): void { this.log("error", msg, ctx); }

  child(name: string): Logger {
    return new ConsoleLogger(`${this.name}:${name}`, this.level, this.sink);
  }

  private log(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    this.sink(`${this.prefix} ${msg}${format_ctx(ctx)}`);
  }
}

const _log_level = parse_log_level(process.env.LOG_LEVEL);

export function create_logger(name: string, level: LogLevel = _log_level, sink: LogSink = stderr_sink): Logger {
  return new ConsoleLogger(name, level, sink);
}
