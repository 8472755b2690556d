// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * Tool settings for strata, split across:
 *
 * - types.ts     - Type definitions (WorkspaceConfig, ResolvedConfig)
 * - loader.ts    - File I/O (load config files, init)
 * - validator.ts - Config validation
 * - merger.ts    - Config merging with priority handling
 * - utils.ts     - Utility functions
 *
 * Usage:
 *   import { loadWorkspaceConfig, mergeConfig } from './config/index.js';
 */

export type { FailOn, WorkspaceConfig, ResolvedConfig } from './types.js';

export {
  CONFIG_FILES,
  GLOBAL_CONFIG_DIR,
  GLOBAL_CONFIG_FILE,
  loadGlobalConfig,
  loadWorkspaceConfig,
  initConfig,
} from './loader.js';

export { validateConfig, isSourceFormat, isFailOn } from './validator.js';

export { DEFAULT_CONFIG, mergeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

export { reachesFailOn, getExampleConfig } from './utils.js';
