import { ReportVariable } from "../types/launcher";

/**
 * Variables the report program reads. The launcher passes them through untouched;
 * this list only feeds `show-config`.
 */
export const REPORT_VARIABLES: readonly ReportVariable[] = [
  { name: "AWS_ACCESS_KEY_ID", description: "AWS access key for the inventory bucket", required: true, secret: true },
  { name: "AWS_SECRET_ACCESS_KEY", description: "AWS secret key", required: true, secret: true },
  { name: "AWS_REGION", description: "AWS region", required: false, secret: false, defaultValue: "us-east-1" },
  { name: "INVENTORY_S3_BUCKET", description: "Bucket holding inventory exports", required: true, secret: false },
  { name: "INVENTORY_S3_PREFIX", description: "Key prefix inside the bucket", required: false, secret: false },
  { name: "SMTP_SERVER", description: "SMTP host for report delivery", required: true, secret: false },
  { name: "SMTP_USER", description: "SMTP login", required: true, secret: false },
  { name: "SMTP_PASSWORD", description: "SMTP password", required: true, secret: true },
  { name: "SMTP_PORT", description: "SMTP port", required: false, secret: false, defaultValue: "587" },
  { name: "EMAIL_RECIPIENTS", description: "Comma-separated report recipients", required: false, secret: false },
];

/**
 * Launcher overrides, read by the launcher itself
 */
export const LAUNCHER_VARIABLES: readonly ReportVariable[] = [
  { name: "PROJECT_ROOT", description: "Project root (auto-detected if not set)", required: false, secret: false },
  { name: "VENV_PATH", description: "Virtual environment (defaults to <root>/.venv)", required: false, secret: false },
  { name: "LOG_LEVEL", description: "Launcher log level, also read from .env", required: false, secret: false, defaultValue: "INFO" },
];

export type VariableStatus = "set" | "not set" | "default";

/**
 * Reports whether a variable is set without ever exposing its value
 */
export function describeVariable(
  variable: ReportVariable,
  env: NodeJS.ProcessEnv,
): { status: VariableStatus; label: string } {
  const value = env[variable.name];
  if (value !== undefined && value !== "") {
    return { status: "set", label: variable.secret ? "set (secret)" : "set" };
  }
  if (variable.defaultValue !== undefined) {
    return { status: "default", label: `default ${variable.defaultValue}` };
  }
  return {
    status: "not set",
    label: variable.required ? "not set (required)" : "not set",
  };
}
