// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for loading configuration files from disk.
 * Handles global and workspace configuration files.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { WorkspaceConfig } from './types.js';
import { getExampleConfig } from './utils.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.strata.json', '.strata/config.json', 'strata.config.json'];

/**
 * Global config directory path.
 */
export const GLOBAL_CONFIG_DIR = path.join(os.homedir(), '.strata');

/**
 * Global config file path.
 */
export const GLOBAL_CONFIG_FILE = path.join(GLOBAL_CONFIG_DIR, 'config.json');

const workspaceConfigSchema = z.object({
  project: z.string().optional(),
  schema: z.string().optional(),
  strict: z.boolean().optional(),
  refKey: z.string().optional(),
  format: z.string().optional(),
  failOn: z.string().optional(),
  upToLayer: z.string().optional(),
}) satisfies z.ZodType<WorkspaceConfig>;

/**
 * Read one config file. Malformed files are reported and ignored.
 */
function readConfigFile(configPath: string): WorkspaceConfig | null {
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const result = workspaceConfigSchema.safeParse(JSON.parse(content));
    if (!result.success) {
      const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      logger.warn(`Ignoring ${configPath}: ${details}`);
      return null;
    }
    return result.data;
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return null;
  }
}

/**
 * Find and load global configuration from ~/.strata/config.json.
 * This applies to all projects unless overridden by project-specific config.
 * @param overrideDir - Optional directory override for testing
 */
export function loadGlobalConfig(overrideDir?: string): {
  config: WorkspaceConfig | null;
  configPath: string | null;
} {
  const configPath = overrideDir
    ? path.join(overrideDir, 'config.json')
    : GLOBAL_CONFIG_FILE;

  if (fs.existsSync(configPath)) {
    return { config: readConfigFile(configPath), configPath };
  }
  return { config: null, configPath: null };
}

/**
 * Find and load workspace configuration from the current directory.
 * Searches for .strata.json, .strata/config.json, or strata.config.json
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): {
  config: WorkspaceConfig | null;
  configPath: string | null;
} {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (fs.existsSync(configPath)) {
      return { config: readConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}

/**
 * Initialize a new .strata.json file in the current directory.
 */
export function initConfig(cwd: string = process.cwd()): {
  success: boolean;
  path: string;
  error?: string;
} {
  const configPath = path.join(cwd, '.strata.json');

  if (fs.existsSync(configPath)) {
    return {
      success: false,
      path: configPath,
      error: 'Config file already exists',
    };
  }

  try {
    fs.writeFileSync(configPath, getExampleConfig());
    return { success: true, path: configPath };
  } catch (error) {
    return {
      success: false,
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
