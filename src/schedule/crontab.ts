/**
 * @fileoverview Crontab entry generation
 *
 * The launcher is scheduled by the host's cron, not by this process. This module
 * builds the line operators paste into `crontab -e`, with stdout and stderr
 * appended to logs/cron.log.
 *
 * @example
 * ```
 * 30 5 * * 2 /usr/bin/node /srv/inventory/dist/index.js run >> /srv/inventory/logs/cron.log 2>&1
 * ```
 */

import { CronSchedule } from "../types/launcher";
import { ConfigurationError, generateCorrelationId } from "../types/errors";

/**
 * Tuesdays 05:30 UTC, which is 11:00 IST (UTC+5:30)
 */
export const DEFAULT_SCHEDULE: CronSchedule = {
  expression: "30 5 * * 2",
  description: "Every Tuesday at 05:30 UTC (11:00 IST)",
};

const FIELD_RANGES: ReadonlyArray<{ name: string; min: number; max: number }> = [
  { name: "minute", min: 0, max: 59 },
  { name: "hour", min: 0, max: 23 },
  { name: "day of month", min: 1, max: 31 },
  { name: "month", min: 1, max: 12 },
  { name: "day of week", min: 0, max: 7 },
];

const ITEM_PATTERN = /^(\*|(\d+)(?:-(\d+))?)(?:\/(\d+))?$/;

const isValidField = (field: string, min: number, max: number): boolean =>
  field.split(",").every((item) => {
    const match = ITEM_PATTERN.exec(item);
    if (!match) {
      return false;
    }

    const [, , start, end, step] = match;
    if (step !== undefined && Number(step) === 0) {
      return false;
    }
    if (start === undefined) {
      return true;
    }

    const from = Number(start);
    const to = end === undefined ? from : Number(end);
    return from >= min && to <= max && from <= to;
  });

/**
 * Validates a standard five-field cron expression (no names, no macros)
 */
export function isValidCronExpression(expression: string): boolean {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== FIELD_RANGES.length) {
    return false;
  }
  return fields.every((field, index) =>
    isValidField(field, FIELD_RANGES[index].min, FIELD_RANGES[index].max),
  );
}

/**
 * Quotes an argument for /bin/sh when it contains anything but safe characters
 */
export function shellQuote(argument: string): string {
  if (argument !== "" && /^[\w@%+=:,./-]+$/.test(argument)) {
    return argument;
  }
  return `'${argument.replace(/'/g, `'\\''`)}'`;
}

/**
 * cron turns an unescaped `%` into a newline, even inside single quotes
 */
export function escapeCronPercent(text: string): string {
  return text.replace(/%/g, "\\%");
}

export interface CrontabEntryOptions {
  schedule?: CronSchedule;
  /** Command and arguments cron runs */
  command: string[];
  logFile: string;
}

/**
 * Builds `<expression> <command> >> <logFile> 2>&1`
 * @throws {ConfigurationError} When the schedule expression is invalid
 */
export function buildCrontabEntry(options: CrontabEntryOptions): string {
  const schedule = options.schedule ?? DEFAULT_SCHEDULE;
  const expression = schedule.expression.trim().split(/\s+/).join(" ");

  if (!isValidCronExpression(expression)) {
    throw new ConfigurationError(
      `Invalid cron expression: "${schedule.expression}"`,
      generateCorrelationId(),
      "schedule",
      { expression: schedule.expression },
    );
  }

  const command = options.command.map(shellQuote).join(" ");
  return `${expression} ${escapeCronPercent(command)} >> ${escapeCronPercent(shellQuote(options.logFile))} 2>&1`;
}
