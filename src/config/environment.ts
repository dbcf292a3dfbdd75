import * as fs from "fs";
import * as path from "path";
import { LauncherConfig } from "../types/launcher";
import { ConfigurationError, generateCorrelationId } from "../types/errors";

/**
 * Default locations, relative to the project root
 */
export const DEFAULTS = {
  ENV_FILE: ".env",
  VENV_DIR: ".venv",
  REPORT_SCRIPT: path.join("scripts", "run_inventory_report.py"),
  LOGS_DIR: "logs",
  CRON_LOG: "cron.log",
} as const;

/**
 * The launcher's code lives one level below the project root
 * (src/ when run from sources, dist/ when built).
 */
export const DEFAULT_PROJECT_ROOT = path.resolve(__dirname, "..", "..");

const isDirectory = (candidate: string): boolean => {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
};

/**
 * Resolves the project root from PROJECT_ROOT or the launcher's own location
 * @throws {ConfigurationError} When PROJECT_ROOT names something that is not a directory
 */
export const resolveProjectRoot = (
  env: NodeJS.ProcessEnv = process.env,
  fallback: string = DEFAULT_PROJECT_ROOT,
): string => {
  const override = env.PROJECT_ROOT?.trim();
  if (!override) {
    return fallback;
  }

  const projectRoot = path.resolve(override);
  if (!isDirectory(projectRoot)) {
    throw new ConfigurationError(
      `PROJECT_ROOT is not a directory: "${projectRoot}"`,
      generateCorrelationId(),
      "PROJECT_ROOT",
      { projectRoot },
    );
  }
  return projectRoot;
};

/**
 * Gets the launcher configuration with defaults applied
 * @throws {ConfigurationError} When PROJECT_ROOT is invalid
 */
export const getLauncherConfig = (
  env: NodeJS.ProcessEnv = process.env,
  fallbackRoot: string = DEFAULT_PROJECT_ROOT,
): LauncherConfig => {
  const projectRoot = resolveProjectRoot(env, fallbackRoot);
  const logsDir = path.join(projectRoot, DEFAULTS.LOGS_DIR);

  return {
    projectRoot,
    envFilePath: path.join(projectRoot, DEFAULTS.ENV_FILE),
    reportScriptPath: path.join(projectRoot, DEFAULTS.REPORT_SCRIPT),
    logsDir,
    cronLogPath: path.join(logsDir, DEFAULTS.CRON_LOG),
  };
};

/**
 * Virtual environment location. Read after .env is loaded, so .env may set VENV_PATH.
 */
export const resolveVenvPath = (
  projectRoot: string,
  env: NodeJS.ProcessEnv,
): string => {
  const override = env.VENV_PATH?.trim();
  return override
    ? path.resolve(projectRoot, override)
    : path.join(projectRoot, DEFAULTS.VENV_DIR);
};
