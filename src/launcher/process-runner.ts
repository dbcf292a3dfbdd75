/**
 * Child process execution for the report script
 */

import { spawn } from "child_process";
import * as os from "os";
import { ProcessLaunchError, isErrnoException } from "../types/errors";

export interface RunProcessOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  correlationId: string;
  /** Signals forwarded to the child while it runs */
  forwardSignals?: NodeJS.Signals[];
}

/**
 * Spawns a command and resolves with its exit code
 */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: RunProcessOptions,
) => Promise<number>;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

/**
 * Exit status a shell reports for a child killed by `signal`
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

/**
 * Exit status a shell reports when a command cannot be started
 */
export function spawnFailureExitCode(code: string | undefined): number {
  switch (code) {
    case "ENOENT":
      return 127;
    case "EACCES":
    case "ENOEXEC":
      return 126;
    default:
      return 1;
  }
}

export const runProcess: ProcessRunner = (command, args, options) =>
  new Promise<number>((resolve, reject) => {
    const forwardSignals = options.forwardSignals ?? ["SIGINT", "SIGTERM"];

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: "inherit",
    });

    const forward = (signal: NodeJS.Signals): void => {
      child.kill(signal);
    };
    for (const signal of forwardSignals) {
      process.on(signal, forward);
    }
    const detach = (): void => {
      for (const signal of forwardSignals) {
        process.removeListener(signal, forward);
      }
    };

    child.once("error", (error) => {
      detach();
      const code = isErrnoException(error) ? error.code : undefined;
      reject(
        new ProcessLaunchError(
          `Failed to start ${command}: ${error.message}`,
          options.correlationId,
          command,
          spawnFailureExitCode(code),
          { args, cwd: options.cwd, code },
        ),
      );
    });

    child.once("close", (code, signal) => {
      detach();
      if (code !== null) {
        resolve(code);
      } else if (signal !== null) {
        resolve(signalExitCode(signal));
      } else {
        resolve(1);
      }
    });
  });
