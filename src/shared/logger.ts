import * as fs from "node:fs";
import * as path from "node:path";
import { FLOWVAULT_DIR } from "./project.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type Component = "store" | "capture" | "cli";

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: Component;
  msg: string;
  data?: Record<string, unknown>;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const LOG_FILE_NAME = "flowvault.log";

/** 10MB max file size before rotation */
export const DEFAULT_MAX_LOG_SIZE = 10 * 1024 * 1024;

/** Flush buffered log lines after this delay */
const FLUSH_DELAY_MS = 100;

export interface LoggerOptions {
  maxLogSize?: number;
}

/**
 * JSON-lines file logger. Lines are buffered and flushed on a short timer;
 * the file rotates to `<file>.1` once it passes `maxLogSize`.
 */
export class Logger {
  private stream: fs.WriteStream | null = null;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private dirEnsured = false;
  private readonly maxLogSize: number;

  constructor(
    private readonly component: Component,
    private readonly logFile: string,
    private readonly level: LogLevel = "warn",
    options?: LoggerOptions
  ) {
    this.maxLogSize = options?.maxLogSize ?? DEFAULT_MAX_LOG_SIZE;
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log("error", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log("warn", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log("info", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log("debug", msg, data);
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.log("trace", msg, data);
  }

  /**
   * Logger for another component writing to the same file at the same level.
   */
  forComponent(component: Component): Logger {
    return new Logger(component, this.logFile, this.level, { maxLogSize: this.maxLogSize });
  }

  /**
   * Flush buffered lines synchronously and close the stream.
   */
  close(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.stream) {
      this.stream.end();
      this.stream = null;
    }

    if (this.buffer.length === 0) {
      return;
    }

    const lines = this.buffer;
    this.buffer = [];
    this.ensureDir();
    for (const line of lines) {
      this.rotateIfNeeded();
      try {
        fs.appendFileSync(this.logFile, line, "utf-8");
      } catch {
        // Logging must never take the caller down
      }
    }
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.component,
      msg,
    };

    if (data !== undefined) {
      entry.data = data;
    }

    this.buffer.push(JSON.stringify(entry) + "\n");
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer !== null) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush();
    }, FLUSH_DELAY_MS);
    // A pending flush must not keep a short-lived CLI process alive
    this.flushTimer.unref();
  }

  private flush(): void {
    if (this.buffer.length === 0) {
      return;
    }

    const data = this.buffer.join("");
    this.buffer = [];

    this.rotateIfNeeded();

    try {
      this.ensureStream().write(data);
    } catch {
      // Logging must never take the caller down
    }
  }

  private ensureDir(): void {
    if (this.dirEnsured) {
      return;
    }
    fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    this.dirEnsured = true;
  }

  private ensureStream(): fs.WriteStream {
    if (this.stream) {
      return this.stream;
    }

    this.ensureDir();
    this.stream = fs.createWriteStream(this.logFile, { flags: "a" });
    this.stream.on("error", () => {
      this.stream = null;
    });
    return this.stream;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level];
  }

  private rotateIfNeeded(): void {
    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      if (fs.statSync(this.logFile).size < this.maxLogSize) {
        return;
      }

      if (this.stream) {
        this.stream.end();
        this.stream = null;
      }

      const rotatedPath = this.logFile + ".1";
      fs.rmSync(rotatedPath, { force: true });
      fs.renameSync(this.logFile, rotatedPath);
    } catch {
      // A failed rotation leaves the current file growing
    }
  }
}

/**
 * Create a logger writing to `<projectRoot>/.flowvault/flowvault.log`.
 */
export function createLogger(
  component: Component,
  projectRoot: string,
  level: LogLevel = "warn",
  options?: LoggerOptions
): Logger {
  const logFile = path.join(projectRoot, FLOWVAULT_DIR, LOG_FILE_NAME);
  return new Logger(component, logFile, level, options);
}

/**
 * Parse verbosity flag count to log level.
 * 0 = warn (default), 1 = info, 2 = debug, 3+ = trace
 */
export function parseVerbosity(verboseCount: number): LogLevel {
  switch (verboseCount) {
    case 0:
      return "warn";
    case 1:
      return "info";
    case 2:
      return "debug";
    default:
      return "trace";
  }
}

export function isValidLogLevel(level: string): level is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, level);
}
