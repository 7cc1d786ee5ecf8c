import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  data: (label: string, payload: unknown) => void;
  /** Resolves once every queued line has been written. */
  flush: () => Promise<void>;
};

export type LoggerOptions = {
  /** Absolute path of the log file; `null` keeps logs on the console only. */
  logFile: string | null;
  alsoConsole?: boolean;
  now?: () => Date;
};

export function formatLogLine(level: LogLevel, msg: string, at: Date): string {
  return `[${at.toISOString()}] ${level} ${msg}`;
}

function stringify(payload: unknown): string {
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}

export function createLogger(opts: LoggerOptions): Logger {
  const now = opts.now ?? (() => new Date());
  const toConsole = opts.alsoConsole === true || opts.logFile === null;
  let queue: Promise<void> = Promise.resolve();
  let dirReady = false;

  const appendLine = async (line: string) => {
    if (!opts.logFile) return;
    try {
      if (!dirReady) {
        await mkdir(path.dirname(opts.logFile), { recursive: true });
        dirReady = true;
      }
      await appendFile(opts.logFile, `${line}\n`);
    } catch (err) {
      // File sink is best-effort.
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[logger] failed to write ${opts.logFile}: ${msg}\n`);
    }
  };

  const write = (level: LogLevel, msg: string) => {
    const line = formatLogLine(level, msg, now());
    queue = queue.then(() => appendLine(line));
    if (toConsole) {
      if (level === "INFO") console.log(line);
      else console.error(line);
    }
  };

  return {
    info: (msg) => write("INFO", msg),
    warn: (msg) => write("WARN", msg),
    error: (msg) => write("ERROR", msg),
    data: (label, payload) => write("INFO", `${label}: ${stringify(payload)}`),
    flush: () => queue,
  };
}

export const nullLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  data: () => {},
  flush: () => Promise.resolve(),
};
