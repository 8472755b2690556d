// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Diagnostics and error types
 *
 * Data-shape problems (bad source units, overlaps, broken references, schema
 * mismatches) are reported as Diagnostic records and never thrown.
 * Exceptions are reserved for contract violations and for the caller-facing
 * query and project-file APIs.
 */

import type { ZodIssue } from 'zod';

/**
 * Advisory severity attached to each diagnostic.
 */
export enum Severity {
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info',
}

/**
 * Every kind of diagnostic the pipeline can emit.
 */
export type DiagnosticKind =
  | 'LoadError'
  | 'OverlapError'
  | 'UnresolvedReference'
  | 'ReferenceCycle'
  | 'MissingRequiredField'
  | 'UnexpectedField'
  | 'TypeMismatch'
  | 'StructuralMismatch'
  | 'RangeViolation'
  | 'PatternViolation'
  | 'EnumViolation'
  | 'IntegrityWarning';

/**
 * A single structured finding, anchored at a DOM path.
 */
export interface Diagnostic {
  path: string;
  kind: DiagnosticKind;
  message: string;
  severity: Severity;
  /** Layer, source unit or provider the finding came from */
  source?: string;
}

/**
 * Build a diagnostic, defaulting severity to ERROR.
 */
export function diagnostic(
  kind: DiagnosticKind,
  path: string,
  message: string,
  severity: Severity = Severity.ERROR,
  source?: string
): Diagnostic {
  return source === undefined
    ? { path, kind, message, severity }
    : { path, kind, message, severity, source };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort diagnostics by path, then kind, then message.
 * Returns a new array.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(
    (a, b) =>
      compareText(a.path, b.path) ||
      compareText(a.kind, b.kind) ||
      compareText(a.message, b.message)
  );
}

/**
 * Count diagnostics per severity.
 */
export function countBySeverity(diagnostics: readonly Diagnostic[]): Record<Severity, number> {
  const counts: Record<Severity, number> = {
    [Severity.ERROR]: 0,
    [Severity.WARNING]: 0,
    [Severity.INFO]: 0,
  };
  for (const d of diagnostics) {
    counts[d.severity]++;
  }
  return counts;
}

/**
 * One-line rendering used by logs and the CLI.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const source = d.source ? ` (${d.source})` : '';
  return `${d.severity}: [${d.kind}] ${d.path}: ${d.message}${source}`;
}

/**
 * Programming-contract violation: bad arguments, unknown node kinds,
 * attaching an owned node twice.
 */
export class ContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractError';
  }
}

/**
 * No node exists at the queried path.
 */
export class PathNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Configuration path '${path}' not found`);
    this.name = 'PathNotFoundError';
  }
}

/**
 * The subtree at a path could not be decoded into the requested shape.
 */
export class DecodeMismatchError extends Error {
  constructor(
    public readonly path: string,
    public readonly issues: ZodIssue[]
  ) {
    const details = issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Value at '${path}' does not match the requested shape: ${details}`);
    this.name = 'DecodeMismatchError';
  }
}

/**
 * The cascade project file or schema document is missing or malformed.
 */
export class ProjectFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'ProjectFileError';
  }
}

/**
 * Exhaustiveness guard for closed unions.
 */
export function assertNever(value: never, what: string): never {
  const detail: unknown = value;
  const label = typeof detail === 'object' && detail !== null && 'kind' in detail ? detail.kind : detail;
  throw new ContractError(`Unrecognized ${what}: ${String(label)}`);
}
