import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export const FLOWVAULT_DIR = ".flowvault";
const HOME_DIR_PREFIX = "~";

/**
 * Resolve an override path, expanding ~ to the user's home directory
 * and converting relative paths to absolute.
 */
export function resolveOverridePath(override: string): string {
  if (override === HOME_DIR_PREFIX) {
    return os.homedir();
  }
  if (override.startsWith(HOME_DIR_PREFIX + "/") || override.startsWith(HOME_DIR_PREFIX + path.sep)) {
    return path.join(os.homedir(), override.slice(HOME_DIR_PREFIX.length + 1));
  }
  return path.resolve(override);
}

/**
 * Walk up from `startDir` looking for a `.flowvault` directory, falling back
 * to the nearest `.git` root, then to the home directory.
 *
 * @param override - used as-is (after `~` expansion) instead of searching
 */
export function findProjectRoot(startDir: string = process.cwd(), override?: string): string {
  if (override !== undefined) {
    return resolveOverridePath(override);
  }

  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;
  let gitRoot: string | undefined;

  while (currentDir !== root) {
    if (fs.existsSync(path.join(currentDir, FLOWVAULT_DIR))) {
      return currentDir;
    }

    if (!gitRoot && fs.existsSync(path.join(currentDir, ".git"))) {
      gitRoot = currentDir;
    }

    currentDir = path.dirname(currentDir);
  }

  return gitRoot ?? os.homedir();
}

export function getFlowVaultDir(projectRoot: string): string {
  return path.join(projectRoot, FLOWVAULT_DIR);
}

export function ensureFlowVaultDir(projectRoot: string): string {
  const dir = getFlowVaultDir(projectRoot);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export interface FlowVaultPaths {
  flowVaultDir: string;
  databaseFile: string;
  configFile: string;
  logFile: string;
  caKeyFile: string;
  caCertFile: string;
}

/**
 * Get paths to the files kept inside the .flowvault directory.
 */
export function getFlowVaultPaths(projectRoot: string): FlowVaultPaths {
  const flowVaultDir = getFlowVaultDir(projectRoot);

  return {
    flowVaultDir,
    databaseFile: path.join(flowVaultDir, "flows.db"),
    configFile: path.join(flowVaultDir, "config.json"),
    logFile: path.join(flowVaultDir, "flowvault.log"),
    caKeyFile: path.join(flowVaultDir, "ca-key.pem"),
    caCertFile: path.join(flowVaultDir, "ca.pem"),
  };
}
