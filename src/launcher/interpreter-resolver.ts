/**
 * Python interpreter resolution
 *
 * Candidates are checked in a fixed order and the first hit wins:
 *   1. <venv>/Scripts/python.exe   (Windows venv layout)
 *   2. <venv>/bin/python           (Unix venv layout)
 *   3. python3 on PATH
 *   4. python on PATH
 */

import * as fs from "fs";
import * as path from "path";
import { InterpreterSource, ResolvedInterpreter } from "../types/launcher";
import { InterpreterNotFoundError } from "../types/errors";
import { Logger, logger as defaultLogger } from "../utils/logger";

const SYSTEM_INTERPRETERS = ["python3", "python"] as const;

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD";

export interface ResolveOptions {
  correlationId: string;
  logger?: Logger;
  platform?: NodeJS.Platform;
}

interface VenvCandidate {
  path: string;
  source: Exclude<InterpreterSource, "system">;
  label: string;
}

const isFile = (candidate: string): boolean => {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
};

const isExecutableFile = (candidate: string): boolean => {
  if (!isFile(candidate)) {
    return false;
  }
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

/**
 * The venv interpreter paths, in priority order
 */
export function venvCandidates(venvPath: string): VenvCandidate[] {
  return [
    {
      path: path.join(venvPath, "Scripts", "python.exe"),
      source: "windows-venv",
      label: "Windows venv",
    },
    {
      path: path.join(venvPath, "bin", "python"),
      source: "unix-venv",
      label: "Linux/macOS venv",
    },
  ];
}

/**
 * Looks a command up on PATH the way `command -v` does
 *
 * @returns Absolute path of the first executable match, or null
 */
export function findOnPath(
  command: string,
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform = process.platform,
): string | null {
  const delimiter = platform === "win32" ? ";" : ":";
  const directories = (env.PATH ?? "").split(delimiter).filter((dir) => dir !== "");

  const extensions =
    platform === "win32"
      ? ["", ...(env.PATHEXT ?? DEFAULT_PATHEXT).split(";").filter((ext) => ext !== "")]
      : [""];

  for (const directory of directories) {
    for (const extension of extensions) {
      const candidate = path.resolve(directory, command + extension);
      if (isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}

/**
 * Resolves the interpreter that will run the report script
 *
 * @throws {InterpreterNotFoundError} When no candidate exists
 */
export function resolveInterpreter(
  venvPath: string,
  env: NodeJS.ProcessEnv,
  options: ResolveOptions,
): ResolvedInterpreter {
  const logger = options.logger ?? defaultLogger;
  const checked: string[] = [];

  for (const candidate of venvCandidates(venvPath)) {
    checked.push(candidate.path);
    if (isFile(candidate.path)) {
      logger.info(`Found Python interpreter (${candidate.label}): ${candidate.path}`, {
        operation: "resolve_interpreter",
        interpreter: candidate.path,
        source: candidate.source,
      });
      return { path: candidate.path, source: candidate.source };
    }
  }

  for (const command of SYSTEM_INTERPRETERS) {
    checked.push(`${command} (PATH)`);
    const found = findOnPath(command, env, options.platform);
    if (found) {
      logger.warn(`Virtual environment Python not found. Using system Python: ${found}`, {
        operation: "resolve_interpreter",
        interpreter: found,
        source: "system",
        venvPath,
      });
      return { path: found, source: "system" };
    }
  }

  throw new InterpreterNotFoundError(
    "No Python interpreter found. Please install Python or set up virtual environment.",
    options.correlationId,
    checked,
    { venvPath },
  );
}
