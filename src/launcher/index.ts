/**
 * @fileoverview Launcher Module Exports
 */

export { InventoryReportLauncher } from "./launcher";
export type { LauncherDependencies } from "./launcher";
export { resolveInterpreter, findOnPath, venvCandidates } from "./interpreter-resolver";
export type { ResolveOptions } from "./interpreter-resolver";
export { activateVirtualEnv } from "./virtual-env";
export { runProcess, signalExitCode, spawnFailureExitCode } from "./process-runner";
export type { ProcessRunner, RunProcessOptions } from "./process-runner";
