// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * strata - layered configuration cascade
 *
 * Loads configuration from ordered layers, merges them with per-path origin
 * tracking, resolves cross-references, validates against schemas and
 * composes several sources into one queryable tree.
 *
 * @example
 * const registry = new MountRegistry();
 * registry.register('/app', new CascadingProvider(layers, new FileSourceLoader()));
 * await registry.refresh();
 * const port = registry.query().get('/app/server/port', z.number().int());
 */

export * from './dom/index.js';
export * from './io/index.js';
export * from './cascade/index.js';
export * from './refs/index.js';
export * from './schema/index.js';
export * from './query/index.js';
export * from './mount/index.js';
export {
  Severity,
  diagnostic,
  sortDiagnostics,
  countBySeverity,
  formatDiagnostic,
  ContractError,
  PathNotFoundError,
  DecodeMismatchError,
  ProjectFileError,
} from './errors.js';
export type { Diagnostic, DiagnosticKind } from './errors.js';
export { logger, LogLevel, parseLogLevel } from './logger.js';
export { VERSION } from './version.js';
