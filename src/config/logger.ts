import fs from "fs";
import path from "path";
import { loadConfig } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  // When set, every line is also appended to <logDir>/run-<stamp>.log
  logDir?: string;
}

function openRunFile(logDir: string): fs.WriteStream | null {
  const runStamp = new Date().toISOString().replace(/[:.]/g, "-");
  try {
    fs.mkdirSync(logDir, { recursive: true });
    return fs.createWriteStream(path.join(logDir, `run-${runStamp}.log`), { flags: "a" });
  } catch (err) {
    console.warn(`logger: file output disabled (${err instanceof Error ? err.message : String(err)})`);
    return null;
  }
}

export function createLogger(level: LogLevel = "info", options: LoggerOptions = {}): Logger {
  const order: LogLevel[] = ["debug", "info", "warn", "error"];
  const minIdx = order.indexOf(level);
  const fileStream = options.logDir ? openRunFile(options.logDir) : null;

  function shouldLog(lvl: LogLevel): boolean {
    return order.indexOf(lvl) >= minIdx;
  }

  function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>) {
    if (!shouldLog(lvl)) return;
    const payload = ctx ? ` ${JSON.stringify(ctx)}` : "";
    const ts = new Date().toISOString();
    const line = `${ts} [${lvl}] ${msg}${payload}`;
    // eslint-disable-next-line no-console
    console[lvl === "debug" ? "log" : lvl](line);
    if (fileStream) fileStream.write(line + "\n");
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
  };
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export default createLogger;

const cfg = loadConfig();
export const logger: Logger = createLogger(cfg.logLevel, { logDir: cfg.logDir });
