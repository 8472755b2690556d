// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI output rendering.
 */

import chalk from 'chalk';
import { CLI_CONFIG } from '../constants.js';
import type { SearchMatch } from '../dom/search.js';
import { countBySeverity, formatDiagnostic, Severity, type Diagnostic } from '../errors.js';
import type { OriginReport } from './workspace.js';

/**
 * Shorten text to a maximum length, marking the cut with an ellipsis.
 */
export function truncate(text: string, max: number = CLI_CONFIG.MAX_PREVIEW_LENGTH): string {
  return text.length <= max ? text : text.slice(0, Math.max(0, max - 1)) + '…';
}

function colorFor(severity: Severity): (text: string) => string {
  switch (severity) {
    case Severity.ERROR:
      return chalk.red;
    case Severity.WARNING:
      return chalk.yellow;
    case Severity.INFO:
      return chalk.blue;
  }
}

/**
 * One line per diagnostic plus a summary line.
 */
export function renderDiagnostics(diagnostics: readonly Diagnostic[]): string[] {
  const lines = diagnostics.map((d) => colorFor(d.severity)(formatDiagnostic(d)));
  const counts = countBySeverity(diagnostics);
  lines.push(
    chalk.dim(`${counts.error} error${counts.error === 1 ? '' : 's'}, ` +
      `${counts.warning} warning${counts.warning === 1 ? '' : 's'}`)
  );
  return lines;
}

export function renderSearchResults(matches: readonly SearchMatch[]): string[] {
  if (matches.length === 0) {
    return [chalk.gray('No matches.')];
  }
  return matches.map((m) => `${chalk.cyan(m.path)}  ${chalk.dim(`[${m.match}]`)} ${truncate(m.text)}`);
}

export function renderOrigin(report: OriginReport): string[] {
  return [
    `${chalk.bold(report.path)} ${chalk.dim(`(mount ${report.mount})`)}`,
    `  winner:       ${chalk.green(report.winner)}`,
    `  defined in:   ${report.contributors.join(' → ')}`,
  ];
}
