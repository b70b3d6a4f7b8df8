import type { HealthGrade } from '../orchestrator/health.js';
import type { HealthReport, PhaseRunReport, UnitListing } from '../orchestrator/orchestrator.js';
import type { DependencyGraphView, ValidationReport } from '../orchestrator/resolver.js';
import type { RunAllReport, UnitOutcome, UnitStatus } from '../orchestrator/types.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

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

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a unit status with appropriate color.
 */
export function formatUnitStatus(status: UnitStatus): string {
  const statusColors: Record<UnitStatus, keyof typeof colors> = {
    not_run: 'gray',
    success: 'green',
    failed: 'red',
  };

  return colorize(status.toUpperCase(), statusColors[status]);
}

export function formatHealthGrade(grade: HealthGrade): string {
  const gradeColors: Record<HealthGrade, keyof typeof colors> = {
    EXCELLENT: 'green',
    GOOD: 'green',
    FAIR: 'yellow',
    POOR: 'red',
  };

  return colorize(grade, gradeColors[grade]);
}

/**
 * Format a duration in milliseconds.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

/**
 * Truncate text to a maximum length.
 */
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

interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format items as a fixed-width table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

function formatOutcome(outcome: UnitOutcome): string {
  const attempts = outcome.attempts > 1 ? dim(` (${outcome.attempts} attempts)`) : '';
  if (outcome.success) {
    return `  ${green('✓')} ${outcome.unit}${attempts}`;
  }
  return `  ${red('✗')} ${outcome.unit}${attempts}\n      ${red(outcome.error)}`;
}

/**
 * Format a full-graph run report.
 */
export function formatRunReport(report: RunAllReport): string {
  const lines: string[] = [];

  lines.push(bold('Run Result'));
  lines.push('');
  lines.push(`${bold('Run ID:')}        ${report.runId}`);
  lines.push(`${bold('Order:')}         ${report.order.join(' → ') || dim('(empty)')}`);
  lines.push(`${bold('Successful:')}    ${green(String(report.successful))}/${report.totalUnits}`);
  lines.push(`${bold('Failed:')}        ${report.failed > 0 ? red(String(report.failed)) : '0'}`);
  lines.push(`${bold('Success Rate:')}  ${report.successRate.toFixed(1)}%`);
  lines.push(`${bold('Duration:')}      ${formatDuration(report.durationMs)}`);
  lines.push('');
  lines.push(...report.results.map(formatOutcome));

  return lines.join('\n');
}

export function formatPhaseReport(report: PhaseRunReport): string {
  const lines: string[] = [];

  lines.push(`${bold('Phase:')} ${cyan(report.phase)}`);
  lines.push(`${bold('Executed:')} ${report.unitsExecuted}`);
  if (report.skipped.length > 0) {
    lines.push(`${bold('Not registered:')} ${dim(report.skipped.join(', '))}`);
  }
  if (report.results.length > 0) {
    lines.push('');
    lines.push(...report.results.map(formatOutcome));
  }

  return lines.join('\n');
}

export function formatUnitList(listing: UnitListing): string {
  if (listing.units.length === 0) {
    return dim('No units registered.');
  }

  const table = formatTable(listing.units, [
    { header: 'NAME', width: 28, value: u => u.name },
    { header: 'STATUS', width: 8, value: u => u.status.toUpperCase() },
    { header: 'DEPENDENCIES', width: 40, value: u => u.dependencies.join(', ') || '-' },
  ]);

  const order = listing.executionOrder.length > 0
    ? listing.executionOrder.join(' → ')
    : red('unresolvable');

  return [
    table,
    '',
    `${bold('Total:')} ${listing.totalUnits} units, ${listing.unitsWithDependencies} with dependencies`,
    `${bold('Execution order:')} ${order}`,
  ].join('\n');
}

export function formatValidationReport(report: ValidationReport): string {
  if (report.validationPassed) {
    return formatSuccess('Dependency graph is valid');
  }

  const lines = report.issues.map(issue =>
    issue.type === 'missing_dependency'
      ? `  ${red('•')} ${bold(issue.unit)}: missing dependency ${issue.missingDependency}`
      : `  ${red('•')} ${issue.error}`
  );

  return [formatError(`${report.totalIssues} dependency issue(s) found:`), ...lines].join('\n');
}

export function formatDependencyGraph(view: DependencyGraphView): string {
  const lines: string[] = [];

  for (const [name, node] of Object.entries(view.graph)) {
    lines.push(bold(name));
    lines.push(`  ${dim('depends on:')}   ${node.dependencies.join(', ') || '-'}`);
    lines.push(`  ${dim('required by:')}  ${node.dependents.join(', ') || '-'}`);
  }

  lines.push('');
  lines.push(
    `${bold('Total:')} ${view.totalUnits} units, ` +
      `${view.unitsWithDependencies} with dependencies, ` +
      `${view.unitsWithDependents} with dependents`
  );

  return lines.join('\n');
}

export function formatHealth(report: HealthReport): string {
  return [
    `${bold('Health:')}  ${formatHealthGrade(report.healthStatus)}`,
    `${bold('Units:')}   ${report.successfulUnits} succeeded, ${report.failedUnits} failed, ${report.notRunUnits} not run`,
  ].join('\n');
}

/**
 * Format a success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format an error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
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
 * Print to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
