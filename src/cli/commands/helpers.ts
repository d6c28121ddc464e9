import { Command } from "commander";
import { loadConfig, type FlowVaultConfig } from "../../shared/config.js";
import { ParseError, getErrorMessage } from "../../shared/errors.js";
import { createLogger, parseVerbosity, type Logger } from "../../shared/logger.js";
import {
  ensureFlowVaultDir,
  findProjectRoot,
  getFlowVaultPaths,
  type FlowVaultPaths,
} from "../../shared/project.js";
import { FlowStore } from "../../store/flow-store.js";

export interface GlobalOptions {
  verbose: number;
  dir?: string;
}

/**
 * Validate and extract global CLI options from a Commander command.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const raw = command.optsWithGlobals() as Record<string, unknown>;
  return {
    verbose: typeof raw["verbose"] === "number" ? raw["verbose"] : 0,
    dir: typeof raw["dir"] === "string" ? raw["dir"] : undefined,
  };
}

export interface CommandContext {
  projectRoot: string;
  paths: FlowVaultPaths;
  config: FlowVaultConfig;
  logger: Logger;
  storeLogger: Logger;
}

/**
 * Resolve the project, its config and a CLI logger for a command.
 */
export function resolveContext(command: Command): CommandContext {
  const globalOpts = getGlobalOptions(command);
  const projectRoot = findProjectRoot(undefined, globalOpts.dir);
  const level = parseVerbosity(globalOpts.verbose);
  const config = loadConfig(projectRoot, level);
  const logger = createLogger("cli", projectRoot, level, { maxLogSize: config.maxLogSize });
  return {
    projectRoot,
    paths: getFlowVaultPaths(projectRoot),
    config,
    logger,
    storeLogger: logger.forComponent("store"),
  };
}

export function openStore(context: CommandContext): FlowStore {
  ensureFlowVaultDir(context.projectRoot);
  return FlowStore.open({
    path: context.paths.databaseFile,
    journalMode: context.config.journalMode,
    synchronous: context.config.synchronous,
    pageSize: context.config.pageSize,
    logger: context.storeLogger,
  });
}

export function closeLoggers(context: CommandContext): void {
  context.storeLogger.close();
  context.logger.close();
}

/**
 * Render an error for the terminal. Filter errors get a caret under the
 * offending position when the filter text is known.
 */
export function formatCommandError(err: unknown, filter?: string): string {
  const message = `Error: ${getErrorMessage(err)}`;
  if (!(err instanceof ParseError) || filter === undefined) {
    return message;
  }
  return [message, `  ${filter}`, `  ${" ".repeat(err.position)}^`].join("\n");
}

/**
 * Run a command body against the project's store. Errors are printed and
 * exit the process with status 1 once the store is closed.
 */
export function withStore(
  command: Command,
  fn: (store: FlowStore, context: CommandContext) => void,
  filter?: string
): void {
  const context = resolveContext(command);
  let store: FlowStore | undefined;
  let failed = false;

  try {
    store = openStore(context);
    fn(store, context);
  } catch (err) {
    context.logger.debug("Command failed", { command: command.name(), error: getErrorMessage(err) });
    console.error(formatCommandError(err, filter));
    failed = true;
  } finally {
    store?.close();
    closeLoggers(context);
  }

  if (failed) {
    process.exit(1);
  }
}

/**
 * Parse a numeric CLI flag, exiting with an error if the value is not a valid non-negative integer.
 */
export function parseIntFlag(value: string, flagName: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    console.error(`Invalid ${flagName} value: "${value}"`);
    process.exit(1);
  }
  return parsed;
}

/**
 * Join variadic filter words back into one filter expression.
 */
export function joinFilter(words: readonly string[]): string | undefined {
  const text = words.join(" ").trim();
  return text === "" ? undefined : text;
}
