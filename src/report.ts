import type { Diagnostic, Severity, UnitOutcome, UnitStatus } from './types';

/**
 * Plain-text rendering
 * --------------------
 * The engine itself never prints. These helpers turn its results into lines a
 * command-line collaborator can write as-is: no colours, no trailing
 * whitespace, one finding per line.
 *
 * Unit lines share a fixed-width status column so that paths line up:
 *
 * ```text
 * [changed] tb/test_dut.py
 * [ok]      tb/test_util.py
 * [failed]  tb/broken.py: expected ':', found end of line (5:21)
 * ```
 */

export type DiagnosticReportOptions = {
  /** Prefix for every line, usually the file path. */
  path?: string;

  /**
   * Maximum number of diagnostics to list. The rest is summarised in a final
   * line.
   * @default Infinity
   */
  maxDiagnostics?: number;
};

const STATUS_LABEL: Record<UnitStatus, string> = {
  changed: '[changed]',
  unchanged: '[ok]',
  failed: '[failed]'
};

const STATUS_WIDTH = Math.max(...Object.values(STATUS_LABEL).map(label => label.length)) + 1;

export function formatUnitLine(outcome: UnitOutcome): string {
  const label = STATUS_LABEL[outcome.status].padEnd(STATUS_WIDTH);
  return outcome.status === 'failed'
    ? `${label}${outcome.path}: ${outcome.error.message}`
    : `${label}${outcome.path}`;
}

function formatLocation(diagnostic: Diagnostic, path: string | undefined): string {
  const start = diagnostic.position?.start;
  const location = start ? `${start.line}:${start.column}` : undefined;
  return [path, location].filter(part => part !== undefined && part !== '').join(':');
}

function formatOrigin(diagnostic: Diagnostic): string {
  return diagnostic.rule ? `${diagnostic.pass}/${diagnostic.rule}` : diagnostic.pass;
}

/**
 * One line per diagnostic:
 * `path:line:column: severity: message [pass/rule]`. Location parts that are
 * unknown are left out.
 *
 * @returns The lines, or an empty array when there is nothing to report.
 */
export function formatDiagnostics(
  diagnostics: readonly Diagnostic[],
  options: DiagnosticReportOptions = {}
): string[] {
  const limit = options.maxDiagnostics ?? Infinity;

  const lines = diagnostics.slice(0, limit).map(diagnostic => {
    const location = formatLocation(diagnostic, options.path);
    const body = `${diagnostic.severity}: ${diagnostic.message} [${formatOrigin(diagnostic)}]`;
    return location ? `${location}: ${body}` : body;
  });

  // Truncation indicator
  if (diagnostics.length > limit) {
    lines.push(`… (${diagnostics.length - limit} more)`);
  }

  return lines;
}

/** Counts per severity, e.g. `2 warnings, 1 error`; `undefined` when empty. */
export function formatSeverityCounts(diagnostics: readonly Diagnostic[]): string | undefined {
  if (diagnostics.length === 0) return undefined;

  const order: Severity[] = ['error', 'warning', 'info'];
  const counts = new Map<Severity, number>();
  for (const { severity } of diagnostics) {
    counts.set(severity, (counts.get(severity) ?? 0) + 1);
  }

  return order
    .filter(severity => counts.has(severity))
    .map(severity => {
      const count = counts.get(severity) ?? 0;
      return `${count} ${severity}${count === 1 ? '' : 's'}`;
    })
    .join(', ');
}

/**
 * Closing summary of a batch:
 *
 * ```text
 * Summary:
 *   2 file(s) changed
 *   5 file(s) unchanged
 * ```
 *
 * A `failed` line is added only when some unit failed to parse.
 */
export function formatBatchSummary(outcomes: readonly UnitOutcome[]): string {
  const count = (status: UnitStatus) =>
    outcomes.filter(outcome => outcome.status === status).length;

  const lines = [
    'Summary:',
    `  ${count('changed')} file(s) changed`,
    `  ${count('unchanged')} file(s) unchanged`
  ];

  const failed = count('failed');
  if (failed > 0) lines.push(`  ${failed} file(s) failed`);

  return lines.join('\n');
}
