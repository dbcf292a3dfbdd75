#!/usr/bin/env node
/**
 * @fileoverview Inventory Report Launcher entry point
 *
 * Cron runs this weekly to start the inventory reporting pipeline.
 *
 * @example
 * ```bash
 * # Launch the report script with the resolved Python interpreter
 * node dist/index.js run
 *
 * # Print the crontab line (Tuesdays 05:30 UTC by default)
 * node dist/index.js crontab --schedule "0 6 * * 1"
 *
 * # Inspect the resolved configuration
 * node dist/index.js show-config
 * ```
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";
import { DEFAULT_PROJECT_ROOT, getLauncherConfig } from "./config/environment";
import { InventoryReportLauncher, LauncherDependencies } from "./launcher";
import { DEFAULT_SCHEDULE, buildCrontabEntry } from "./schedule/crontab";
import { collectConfigReport, formatConfigReport } from "./cli/show-config";
import { LauncherError } from "./types/errors";
import { LauncherConfig } from "./types/launcher";
import { logger } from "./utils/logger";

export const USAGE = [
  "Usage: inventory-report [command] [options]",
  "",
  "Commands:",
  "  run           Launch the inventory reporting pipeline (default)",
  "  crontab       Print the crontab entry for the weekly run",
  "  show-config   Show the resolved configuration without launching",
  "  help          Show this message",
  "",
  "Options:",
  `  --schedule <expr>   Cron expression for crontab (default "${DEFAULT_SCHEDULE.expression}")`,
].join("\n");

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  /** Project root used when PROJECT_ROOT is not set */
  fallbackRoot?: string;
  launcher?: LauncherDependencies;
  platform?: NodeJS.Platform;
}

type Command = "run" | "crontab" | "show-config" | "help";

const COMMANDS: readonly Command[] = ["run", "crontab", "show-config", "help"];

const isCommand = (value: string): value is Command =>
  COMMANDS.some((command) => command === value);

/**
 * Runs one CLI command and returns the process exit code
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const env = options.env ?? process.env;

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  if (parsed.command === "help") {
    console.log(USAGE);
    return 0;
  }

  let config: LauncherConfig;
  try {
    config = getLauncherConfig(env, options.fallbackRoot);
  } catch (error) {
    if (error instanceof LauncherError) {
      logger.error("Invalid launcher configuration", error, error.toLogFormat());
      return 1;
    }
    throw error;
  }

  switch (parsed.command) {
    case "run": {
      const launcher = new InventoryReportLauncher(config, {
        baseEnv: env,
        platform: options.platform,
        ...options.launcher,
      });
      const result = await launcher.launch();
      return result.exitCode;
    }

    case "crontab": {
      const command = [process.execPath, path.join(DEFAULT_PROJECT_ROOT, "dist", "index.js"), "run"];
      if (config.projectRoot !== (options.fallbackRoot ?? DEFAULT_PROJECT_ROOT)) {
        command.unshift("env", `PROJECT_ROOT=${config.projectRoot}`);
      }

      let entry: string;
      try {
        entry = buildCrontabEntry({
          schedule: parsed.schedule
            ? { expression: parsed.schedule, description: "Custom schedule" }
            : DEFAULT_SCHEDULE,
          command,
          logFile: config.cronLogPath,
        });
      } catch (error) {
        if (error instanceof LauncherError) {
          console.error(error.message);
          return 2;
        }
        throw error;
      }

      fs.mkdirSync(config.logsDir, { recursive: true });
      console.log(entry);
      return 0;
    }

    case "show-config": {
      const report = collectConfigReport(config, env, options.platform);
      console.log(formatConfigReport(report).join("\n"));
      return report.interpreter ? 0 : 1;
    }
  }
}

function parseCommandLine(argv: string[]): { command: Command; schedule?: string } {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      schedule: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    return { command: "help" };
  }

  const [name = "run", ...rest] = positionals;
  if (rest.length > 0) {
    throw new Error(`Unexpected arguments: ${rest.join(" ")}`);
  }
  if (!isCommand(name)) {
    throw new Error(`Unknown command: ${name}`);
  }

  return { command: name, schedule: values.schedule };
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      logger.error(
        "Unexpected launcher failure",
        error instanceof Error ? error : new Error(String(error)),
        { operation: "main" },
      );
      process.exitCode = 1;
    },
  );
}
