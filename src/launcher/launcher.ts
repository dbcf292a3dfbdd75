/**
 * Inventory Report Launcher
 *
 * Bootstrap sequence cron runs once a week:
 * - Load <root>/.env into the child environment (warning only when missing)
 * - Resolve the Python interpreter (venv first, then system)
 * - Activate the venv for the child environment
 * - Run scripts/run_inventory_report.py from the project root
 * - Hand back the script's exit code
 */

import {
  InterpreterNotFoundError,
  LaunchResult,
  LauncherConfig,
  ProcessLaunchError,
  ResolvedInterpreter,
  generateCorrelationId,
} from "../types";
import { loadEnvFile } from "../config/env-file";
import { resolveVenvPath } from "../config/environment";
import { Logger, applyLogLevel, createCorrelatedLogger } from "../utils/logger";
import { resolveInterpreter } from "./interpreter-resolver";
import { activateVirtualEnv } from "./virtual-env";
import { ProcessRunner, runProcess } from "./process-runner";

export interface LauncherDependencies {
  /** Environment the child starts from; copied, never mutated */
  baseEnv?: NodeJS.ProcessEnv;
  runner?: ProcessRunner;
  platform?: NodeJS.Platform;
  correlationId?: string;
}

export class InventoryReportLauncher {
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly runner: ProcessRunner;
  private readonly platform: NodeJS.Platform;
  private readonly correlationId: string;
  private readonly logger: Logger;

  constructor(
    private readonly config: LauncherConfig,
    dependencies: LauncherDependencies = {},
  ) {
    this.baseEnv = dependencies.baseEnv ?? process.env;
    this.runner = dependencies.runner ?? runProcess;
    this.platform = dependencies.platform ?? process.platform;
    this.correlationId = dependencies.correlationId ?? generateCorrelationId();
    this.logger = createCorrelatedLogger(this.correlationId);
  }

  async launch(): Promise<LaunchResult> {
    const { projectRoot, envFilePath, reportScriptPath } = this.config;
    const childEnv: NodeJS.ProcessEnv = { ...this.baseEnv };

    const envFile = loadEnvFile(envFilePath, childEnv, this.correlationId, this.logger);
    const logger = applyLogLevel(this.logger, childEnv);

    logger.info("Starting inventory report launcher", {
      operation: "launcher_startup",
      projectRoot,
      envFileLoaded: envFile.loaded,
    });

    const venvPath = resolveVenvPath(projectRoot, childEnv);

    let interpreter: ResolvedInterpreter;
    try {
      interpreter = resolveInterpreter(venvPath, childEnv, {
        correlationId: this.correlationId,
        logger,
        platform: this.platform,
      });
    } catch (error) {
      if (error instanceof InterpreterNotFoundError) {
        logger.error(error.message, error, {
          operation: "resolve_interpreter",
          candidates: error.candidates,
        });
        return { exitCode: 1, invoked: false };
      }
      throw error;
    }

    logger.info(`Using Python interpreter: ${interpreter.path}`, {
      operation: "resolve_interpreter",
      interpreter: interpreter.path,
      source: interpreter.source,
    });

    activateVirtualEnv(venvPath, childEnv, logger, this.platform);

    logger.info("Executing inventory reporting pipeline", {
      operation: "run_report",
      script: reportScriptPath,
    });

    try {
      const exitCode = await this.runner(interpreter.path, [reportScriptPath], {
        cwd: projectRoot,
        env: childEnv,
        correlationId: this.correlationId,
      });

      const context = { operation: "run_report", exitCode };
      if (exitCode === 0) {
        logger.info("Inventory reporting pipeline finished", context);
      } else {
        logger.warn("Inventory reporting pipeline exited with failure", context);
      }

      return { exitCode, invoked: true, interpreter };
    } catch (error) {
      if (error instanceof ProcessLaunchError) {
        logger.error("Could not start inventory reporting pipeline", error, {
          operation: "run_report",
          exitCode: error.exitCode,
        });
        return { exitCode: error.exitCode, invoked: true, interpreter };
      }
      throw error;
    }
  }
}
