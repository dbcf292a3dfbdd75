/**
 * `show-config`: what a run would use, without launching anything.
 * Variable values are never printed.
 */

import * as fs from "fs";
import { LauncherConfig, ResolvedInterpreter } from "../types/launcher";
import { InterpreterNotFoundError, generateCorrelationId } from "../types/errors";
import { loadEnvFile } from "../config/env-file";
import { resolveVenvPath } from "../config/environment";
import { LAUNCHER_VARIABLES, REPORT_VARIABLES, describeVariable } from "../config/report-variables";
import { resolveInterpreter } from "../launcher/interpreter-resolver";
import { applyLogLevel, createCorrelatedLogger } from "../utils/logger";

export interface ConfigReport {
  config: LauncherConfig;
  envFileLoaded: boolean;
  reportScriptFound: boolean;
  venvPath: string;
  interpreter: ResolvedInterpreter | null;
  reportVariables: Array<{ name: string; label: string }>;
  launcherVariables: Array<{ name: string; label: string }>;
}

export function collectConfigReport(
  config: LauncherConfig,
  baseEnv: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  correlationId: string = generateCorrelationId(),
): ConfigReport {
  const baseLogger = createCorrelatedLogger(correlationId, { operation: "show_config" });
  const env: NodeJS.ProcessEnv = { ...baseEnv };
  const envFile = loadEnvFile(config.envFilePath, env, correlationId, baseLogger);
  const logger = applyLogLevel(baseLogger, env);
  const venvPath = resolveVenvPath(config.projectRoot, env);

  let interpreter: ResolvedInterpreter | null = null;
  try {
    interpreter = resolveInterpreter(venvPath, env, {
      correlationId,
      logger,
      platform,
    });
  } catch (error) {
    if (!(error instanceof InterpreterNotFoundError)) {
      throw error;
    }
  }

  return {
    config,
    envFileLoaded: envFile.loaded,
    reportScriptFound: fs.existsSync(config.reportScriptPath),
    venvPath,
    interpreter,
    reportVariables: REPORT_VARIABLES.map((variable) => ({
      name: variable.name,
      label: describeVariable(variable, env).label,
    })),
    launcherVariables: LAUNCHER_VARIABLES.map((variable) => ({
      name: variable.name,
      label: describeVariable(variable, env).label,
    })),
  };
}

export function formatConfigReport(report: ConfigReport): string[] {
  const rule = "=".repeat(60);
  const { config } = report;

  return [
    rule,
    "INVENTORY REPORT LAUNCHER CONFIGURATION",
    rule,
    `Project root: ${config.projectRoot}`,
    `.env file: ${config.envFilePath} (${report.envFileLoaded ? "loaded" : "not loaded"})`,
    `Report script: ${config.reportScriptPath} (${report.reportScriptFound ? "found" : "missing"})`,
    `Cron log: ${config.cronLogPath}`,
    `Virtual environment: ${report.venvPath}`,
    `Interpreter: ${
      report.interpreter
        ? `${report.interpreter.path} (${report.interpreter.source})`
        : "not found"
    }`,
    "",
    "Launcher variables:",
    ...report.launcherVariables.map(({ name, label }) => `  ${name}: ${label}`),
    "",
    "Report variables:",
    ...report.reportVariables.map(({ name, label }) => `  ${name}: ${label}`),
    rule,
  ];
}
