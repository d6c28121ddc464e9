import * as fs from "node:fs";
import { createLogger, DEFAULT_MAX_LOG_SIZE, type LogLevel } from "./logger.js";
import { getFlowVaultPaths } from "./project.js";

export const JOURNAL_MODES = ["wal", "delete", "memory"] as const;
export const SYNCHRONOUS_MODES = ["off", "normal", "full"] as const;

export type JournalMode = (typeof JOURNAL_MODES)[number];
export type SynchronousMode = (typeof SYNCHRONOUS_MODES)[number];

export const DEFAULT_PAGE_SIZE = 100;
const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024;

export interface FlowVaultConfig {
  /** SQLite journal mode for the flow database */
  journalMode: JournalMode;
  /**
   * SQLite synchronous level. "off" trades durability of the last few
   * writes for insert speed.
   */
  synchronous: SynchronousMode;
  /** Max body size in bytes captured per request/response */
  maxBodySize: number;
  /** Max log file size in bytes before rotation */
  maxLogSize: number;
  /** Default number of flows per page when no limit is given */
  pageSize: number;
}

export const DEFAULT_CONFIG: FlowVaultConfig = {
  journalMode: "wal",
  synchronous: "normal",
  maxBodySize: DEFAULT_MAX_BODY_SIZE,
  maxLogSize: DEFAULT_MAX_LOG_SIZE,
  pageSize: DEFAULT_PAGE_SIZE,
};

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((candidate) => candidate === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Keep the valid fields of a parsed config object; everything else falls
 * back to the default.
 */
export function validateConfig(raw: Record<string, unknown>): FlowVaultConfig {
  const config = { ...DEFAULT_CONFIG };

  const journalMode = raw["journalMode"];
  if (isOneOf(JOURNAL_MODES, journalMode)) {
    config.journalMode = journalMode;
  }

  const synchronous = raw["synchronous"];
  if (isOneOf(SYNCHRONOUS_MODES, synchronous)) {
    config.synchronous = synchronous;
  }

  const maxBodySize = raw["maxBodySize"];
  if (isPositiveInteger(maxBodySize)) {
    config.maxBodySize = maxBodySize;
  }

  const maxLogSize = raw["maxLogSize"];
  if (isPositiveInteger(maxLogSize)) {
    config.maxLogSize = maxLogSize;
  }

  const pageSize = raw["pageSize"];
  if (isPositiveInteger(pageSize)) {
    config.pageSize = pageSize;
  }

  return config;
}

/**
 * Load `.flowvault/config.json`.
 *
 * Returns defaults if the file is missing. Logs a warning and returns defaults
 * if the JSON is malformed or not an object.
 */
export function loadConfig(projectRoot: string, logLevel?: LogLevel): FlowVaultConfig {
  const { configFile } = getFlowVaultPaths(projectRoot);

  let raw: string;
  try {
    raw = fs.readFileSync(configFile, "utf-8");
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    warn(projectRoot, logLevel, "Malformed config.json, using defaults");
    return { ...DEFAULT_CONFIG };
  }

  if (!isRecord(parsed)) {
    warn(projectRoot, logLevel, "config.json must be an object, using defaults");
    return { ...DEFAULT_CONFIG };
  }

  return validateConfig(parsed);
}

function warn(projectRoot: string, logLevel: LogLevel | undefined, msg: string): void {
  const logger = createLogger("cli", projectRoot, logLevel);
  logger.warn(msg);
  logger.close();
}
