// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Utilities
 *
 * Helper functions for working with resolved configuration.
 */

import { DOM_CONFIG, SOURCE_CONFIG } from '../constants.js';
import { countBySeverity, type Diagnostic } from '../errors.js';
import type { ResolvedConfig, WorkspaceConfig } from './types.js';

/**
 * Check whether diagnostics reach the configured failOn threshold.
 */
export function reachesFailOn(diagnostics: readonly Diagnostic[], config: Pick<ResolvedConfig, 'failOn'>): boolean {
  const counts = countBySeverity(diagnostics);
  switch (config.failOn) {
    case 'never':
      return false;
    case 'warning':
      return counts.error + counts.warning > 0;
    case 'error':
      return counts.error > 0;
  }
}

/**
 * Create an example configuration file content.
 */
export function getExampleConfig(): string {
  const example: WorkspaceConfig = {
    project: SOURCE_CONFIG.PROJECT_FILE,
    schema: 'schemas.yaml',
    strict: false,
    refKey: DOM_CONFIG.REF_KEY,
    format: 'json',
    failOn: 'error',
  };

  return JSON.stringify(example, null, 2);
}
