import * as fs from "fs";
import * as path from "path";
import { VirtualEnvActivation } from "../types/launcher";
import { Logger, logger as defaultLogger } from "../utils/logger";

/**
 * Applies what a venv's activate script does to `env`: VIRTUAL_ENV set, the
 * venv script directory first on PATH, PYTHONHOME removed.
 *
 * Windows layout is checked before Unix layout. Returns null when the venv has
 * no activate script; activation is never fatal.
 */
export function activateVirtualEnv(
  venvPath: string,
  env: NodeJS.ProcessEnv,
  logger: Logger = defaultLogger,
  platform: NodeJS.Platform = process.platform,
): VirtualEnvActivation | null {
  const layouts: VirtualEnvActivation[] = [
    { venvPath, binDir: path.join(venvPath, "Scripts"), layout: "windows" },
    { venvPath, binDir: path.join(venvPath, "bin"), layout: "unix" },
  ];

  const activation = layouts.find((candidate) =>
    fs.existsSync(path.join(candidate.binDir, "activate")),
  );

  if (!activation) {
    logger.debug("No virtual environment activate script found", {
      operation: "activate_venv",
      venvPath,
    });
    return null;
  }

  const delimiter = platform === "win32" ? ";" : ":";
  const currentPath = env.PATH ?? "";

  env.VIRTUAL_ENV = venvPath;
  env.PATH = currentPath ? `${activation.binDir}${delimiter}${currentPath}` : activation.binDir;
  delete env.PYTHONHOME;

  logger.info(`Activating virtual environment (${activation.layout}): ${activation.binDir}`, {
    operation: "activate_venv",
    venvPath,
  });

  return activation;
}
