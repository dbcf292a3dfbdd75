/**
 * Launcher types
 */

export interface LauncherConfig {
  projectRoot: string;
  envFilePath: string;
  reportScriptPath: string;
  logsDir: string;
  cronLogPath: string;
}

/**
 * Where a resolved interpreter came from, in priority order
 */
export type InterpreterSource = "windows-venv" | "unix-venv" | "system";

export interface ResolvedInterpreter {
  path: string;
  source: InterpreterSource;
}

export interface EnvFileResult {
  loaded: boolean;
  path: string;
  keys: string[];
}

export interface VirtualEnvActivation {
  venvPath: string;
  binDir: string;
  layout: "windows" | "unix";
}

export interface LaunchResult {
  exitCode: number;
  /** False when the launcher stopped before spawning the report script */
  invoked: boolean;
  interpreter?: ResolvedInterpreter;
}

export interface CronSchedule {
  expression: string;
  description: string;
}

/**
 * Environment variable consumed by the external report program
 */
export interface ReportVariable {
  name: string;
  description: string;
  required: boolean;
  secret: boolean;
  defaultValue?: string;
}
