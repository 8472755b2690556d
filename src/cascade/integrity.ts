// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Integrity Checks
 *
 * Cross-layer consistency checks that are legal but usually mistakes.
 * Every finding is a warning.
 */

import { childPath } from '../dom/tree.js';
import { diagnostic, Severity, sortDiagnostics, type Diagnostic } from '../errors.js';
import type { CascadeLayer } from './types.js';

/**
 * Checks that can be selected individually.
 */
export type IntegrityCheck = 'property-casing' | 'unit-consistency';

export const ALL_INTEGRITY_CHECKS: readonly IntegrityCheck[] = ['property-casing', 'unit-consistency'];

function ascending(layers: readonly CascadeLayer[]): CascadeLayer[] {
  return [...layers].sort((a, b) => a.definition.index - b.definition.index);
}

/**
 * Paths that differ only by letter case across (or within) layers, e.g.
 * /server/timeout in one layer and /server/timeOut in another. Such paths
 * never merge with each other.
 */
export function checkPropertyCasing(layers: readonly CascadeLayer[]): Diagnostic[] {
  const issues: Diagnostic[] = [];
  const canonical = new Map<string, { path: string; layer: string }>();

  for (const layer of ascending(layers)) {
    const paths = [...layer.unitOrigins.keys()].sort();
    for (const path of paths) {
      const key = path.toLowerCase();
      const first = canonical.get(key);
      if (!first) {
        canonical.set(key, { path, layer: layer.definition.name });
      } else if (first.path !== path) {
        issues.push(
          diagnostic(
            'IntegrityWarning',
            path,
            `Casing differs from "${first.path}" in layer "${first.layer}"`,
            Severity.WARNING,
            layer.definition.name
          )
        );
      }
    }
  }
  return issues;
}

/**
 * Top-level sections defined by differently named units in different
 * layers (e.g., /database from "database.json" in base but from
 * "database/primary.json" in production).
 */
export function checkUnitConsistency(layers: readonly CascadeLayer[]): Diagnostic[] {
  const issues: Diagnostic[] = [];
  const canonical = new Map<string, { unit: string; layer: string }>();

  for (const layer of ascending(layers)) {
    for (const key of layer.root.keys()) {
      const path = childPath('/', key);
      const unit = layer.unitOrigins.get(path);
      if (unit === undefined) continue;
      const first = canonical.get(path);
      if (!first) {
        canonical.set(path, { unit, layer: layer.definition.name });
      } else if (first.unit !== unit) {
        issues.push(
          diagnostic(
            'IntegrityWarning',
            path,
            `Defined in "${unit}" here but in "${first.unit}" in layer "${first.layer}"`,
            Severity.WARNING,
            layer.definition.name
          )
        );
      }
    }
  }
  return issues;
}

/**
 * Run the selected checks over a set of layers.
 */
export function checkIntegrity(
  layers: readonly CascadeLayer[],
  checks: readonly IntegrityCheck[] = ALL_INTEGRITY_CHECKS
): Diagnostic[] {
  const issues: Diagnostic[] = [];
  if (checks.includes('property-casing')) issues.push(...checkPropertyCasing(layers));
  if (checks.includes('unit-consistency')) issues.push(...checkUnitConsistency(layers));
  return sortDiagnostics(issues);
}
