import { StateType } from '@runplane/shared';
import type { Deployment, Run } from '../types/index.js';
import type { SchedulerTickResult } from '../services/scheduler.js';
import type { LateRunsTickResult } from '../services/late-runs.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

type Color = keyof typeof colors;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: Color): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

const stateColors: Record<StateType, Color> = {
  [StateType.SCHEDULED]: 'yellow',
  [StateType.PENDING]: 'gray',
  [StateType.RUNNING]: 'blue',
  [StateType.COMPLETED]: 'green',
  [StateType.FAILED]: 'red',
  [StateType.CRASHED]: 'magenta',
  [StateType.CANCELLED]: 'gray',
  [StateType.CANCELLING]: 'gray',
  [StateType.PAUSED]: 'white',
};

/**
 * Format a run's current state with its color, e.g. `SCHEDULED (Late)`.
 */
export function formatState(run: Run): string {
  const { type, name } = run.state;
  const label = name.toUpperCase() === type ? type : `${type} (${name})`;
  return colorize(label, stateColors[type]);
}

/**
 * Format a duration in milliseconds, e.g. `1h 5m`, `90s`, `250ms`.
 */
export function formatDurationMs(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 120) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 120) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 48) {
    return `${hours}h ${minutes % 60}m`;
  }
  return `${Math.floor(hours / 24)}d ${hours % 24}h`;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

export interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  const headerRow = columns
    .map((col) => {
      const header = col.align === 'right' ? padLeft(col.header, col.width) : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));

  for (const item of items) {
    const row = columns
      .map((col) => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right' ? padLeft(value, col.width) : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format upcoming occurrences of a deployment's schedule.
 */
export function formatSchedulePreview(deployment: Deployment, dates: Date[]): string {
  const header = `${bold(deployment.name)} ${dim(`(${deployment.flowName})`)}`;
  if (dates.length === 0) {
    return `${header}\n  ${dim('No upcoming runs within the scheduling horizon')}`;
  }
  const lines = dates.map((date, index) => `  ${padLeft(String(index + 1), 3)}. ${date.toISOString()}`);
  return [header, ...lines].join('\n');
}

export function formatRunList(runs: Run[]): string {
  if (runs.length === 0) {
    return dim('No runs');
  }
  return formatTable(runs, [
    { header: 'NAME', width: 32, value: (run) => run.name },
    { header: 'STATE', width: 22, value: (run) => formatState(run) },
    {
      header: 'EXPECTED START',
      width: 24,
      value: (run) => run.expectedStartTime?.toISOString() ?? '-',
    },
  ]);
}

/**
 * Summary of one scheduler tick and one late-run tick.
 */
export function formatTickSummary(scheduler: SchedulerTickResult, lateRuns: LateRunsTickResult): string {
  return [
    bold('Scheduler:'),
    `  ${bold('Deployments scanned:')} ${cyan(String(scheduler.deploymentsScanned))}`,
    `  ${bold('Runs created:')} ${cyan(String(scheduler.runsCreated))}`,
    `  ${bold('Deployments failed:')} ${cyan(String(scheduler.deploymentsFailed))}`,
    bold('Late runs:'),
    `  ${bold('Runs found:')} ${cyan(String(lateRuns.runsFound))}`,
    `  ${bold('Marked late:')} ${cyan(String(lateRuns.runsMarkedLate))}`,
    `  ${bold('Skipped:')} ${cyan(String(lateRuns.runsSkipped))}`,
    `  ${bold('Failed:')} ${cyan(String(lateRuns.runsFailed))}`,
  ].join('\n');
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });
  return [formatError('Validation failed:'), ...lines].join('\n');
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
