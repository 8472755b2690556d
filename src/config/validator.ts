// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Functions for validating workspace configuration.
 */

import type { SourceFormat } from '../io/parser.js';
import type { FailOn, WorkspaceConfig } from './types.js';

/**
 * Valid output formats.
 */
const VALID_FORMATS: readonly SourceFormat[] = ['json', 'json5', 'yaml'];

/**
 * Valid failOn thresholds.
 */
const VALID_FAIL_ON: readonly FailOn[] = ['error', 'warning', 'never'];

export function isSourceFormat(value: string): value is SourceFormat {
  return VALID_FORMATS.some((format) => format === value);
}

export function isFailOn(value: string): value is FailOn {
  return VALID_FAIL_ON.some((level) => level === value);
}

/**
 * Validate workspace configuration.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];

  if (config.format !== undefined && !isSourceFormat(config.format)) {
    warnings.push(`Unknown format "${config.format}". Valid: ${VALID_FORMATS.join(', ')}`);
  }

  if (config.failOn !== undefined && !isFailOn(config.failOn)) {
    warnings.push(`Unknown failOn "${config.failOn}". Valid: ${VALID_FAIL_ON.join(', ')}`);
  }

  if (config.refKey !== undefined) {
    if (config.refKey.trim() === '') {
      warnings.push('refKey must not be empty');
    } else if (config.refKey.includes('/')) {
      warnings.push(`refKey should not contain "/": "${config.refKey}"`);
    }
  }

  if (config.project !== undefined && config.project.trim() === '') {
    warnings.push('project must not be empty');
  }

  if (config.upToLayer !== undefined && config.upToLayer.trim() === '') {
    warnings.push('upToLayer must not be empty');
  }

  return warnings;
}
