// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > workspace config > global config > defaults
 */

import { DOM_CONFIG, SOURCE_CONFIG } from '../constants.js';
import type { WorkspaceConfig, ResolvedConfig } from './types.js';
import { isFailOn, isSourceFormat } from './validator.js';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  project: SOURCE_CONFIG.PROJECT_FILE,
  strict: false,
  refKey: DOM_CONFIG.REF_KEY,
  format: 'json',
  failOn: 'error',
};

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  project?: string;
  schema?: string;
  strict?: boolean;
  format?: string;
  failOn?: string;
  upTo?: string;
}

/**
 * Apply a workspace config layer to the resolved config.
 * Invalid values are skipped (validateConfig reports them).
 */
function applyWorkspaceConfig(config: ResolvedConfig, source: WorkspaceConfig): void {
  if (source.project) config.project = source.project;
  if (source.schema) config.schema = source.schema;
  if (source.strict !== undefined) config.strict = source.strict;
  if (source.refKey && source.refKey.trim() !== '') config.refKey = source.refKey;
  if (source.format && isSourceFormat(source.format)) config.format = source.format;
  if (source.failOn && isFailOn(source.failOn)) config.failOn = source.failOn;
  if (source.upToLayer) config.upToLayer = source.upToLayer;
}

/**
 * Merge workspace config with CLI options.
 * Priority: CLI options > workspace config > global config
 */
export function mergeConfig(
  workspaceConfig: WorkspaceConfig | null,
  cliOptions: CLIOptions,
  globalConfig: WorkspaceConfig | null = null
): ResolvedConfig {
  const config: ResolvedConfig = { ...DEFAULT_CONFIG };

  // Apply global config (lowest priority, baseline for all projects)
  if (globalConfig) {
    applyWorkspaceConfig(config, globalConfig);
  }

  // Apply workspace config (overrides global)
  if (workspaceConfig) {
    applyWorkspaceConfig(config, workspaceConfig);
  }

  // CLI options override workspace config
  if (cliOptions.project) config.project = cliOptions.project;
  if (cliOptions.schema) config.schema = cliOptions.schema;
  if (cliOptions.strict) config.strict = true;
  if (cliOptions.format && isSourceFormat(cliOptions.format)) config.format = cliOptions.format;
  if (cliOptions.failOn && isFailOn(cliOptions.failOn)) config.failOn = cliOptions.failOn;
  if (cliOptions.upTo) config.upToLayer = cliOptions.upTo;

  return config;
}
