/**
 * .env loading
 *
 * Mirrors `set -a; source .env; set +a`: every variable in the file is exported
 * into the target environment and overrides a value already there. `$VAR` and
 * `${VAR}` references expand against earlier lines of the file, then the
 * environment being built. A missing or unreadable file only produces a warning.
 */

import * as fs from "fs";
import { parse } from "dotenv";
import { expand } from "dotenv-expand";
import { EnvFileResult } from "../types/launcher";
import { EnvFileError, isErrnoException } from "../types/errors";
import { Logger, applyLogLevel, logger as defaultLogger } from "../utils/logger";

/**
 * Reads and parses a .env file
 * @throws {EnvFileError} When the file exists but cannot be read
 */
export function readEnvFile(
  filePath: string,
  correlationId: string,
): Record<string, string> {
  try {
    return parse(fs.readFileSync(filePath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EnvFileError(
      `Failed to read .env file: ${reason}`,
      correlationId,
      filePath,
      isErrnoException(error) ? { code: error.code } : {},
    );
  }
}

/**
 * Expands variable references in parsed .env values.
 * Keys the file defines are left out of the lookup environment so the file's
 * own values win, as they do when the file is sourced.
 */
export function expandEnvValues(
  parsed: Record<string, string>,
  target: NodeJS.ProcessEnv,
): Record<string, string> {
  const lookup: Record<string, string> = {};
  for (const [key, value] of Object.entries(target)) {
    if (value !== undefined && !(key in parsed)) {
      lookup[key] = value;
    }
  }

  const result = expand({ parsed: { ...parsed }, processEnv: lookup });
  return result.parsed ?? parsed;
}

/**
 * Loads a .env file into `target`
 */
export function loadEnvFile(
  filePath: string,
  target: NodeJS.ProcessEnv,
  correlationId: string,
  logger: Logger = defaultLogger,
): EnvFileResult {
  if (!fs.existsSync(filePath)) {
    logger.warn(
      ".env file not found. Ensure environment variables are set via crontab or system config.",
      { operation: "load_env_file", filePath },
    );
    return { loaded: false, path: filePath, keys: [] };
  }

  let parsed: Record<string, string>;
  try {
    parsed = readEnvFile(filePath, correlationId);
  } catch (error) {
    if (!(error instanceof EnvFileError)) {
      throw error;
    }
    logger.warn("Could not load .env file, continuing with current environment", {
      operation: "load_env_file",
      filePath,
      error: error.toLogFormat(),
    });
    return { loaded: false, path: filePath, keys: [] };
  }

  const expanded = expandEnvValues(parsed, target);
  const keys = Object.keys(parsed);
  for (const key of keys) {
    target[key] = expanded[key] ?? parsed[key];
  }

  // LOG_LEVEL may come from the file itself
  applyLogLevel(logger, target).info("Loaded environment variables from .env file", {
    operation: "load_env_file",
    filePath,
    variableCount: keys.length,
  });

  return { loaded: true, path: filePath, keys };
}
