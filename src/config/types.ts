// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for the strata tool settings (not the configuration
 * trees strata itself loads).
 */

import type { SourceFormat } from '../io/parser.js';

/**
 * Diagnostic severity at which the CLI exits non-zero.
 */
export type FailOn = 'error' | 'warning' | 'never';

/**
 * Workspace configuration for strata.
 * Can be defined in .strata.json, .strata/config.json or strata.config.json
 * in the working directory, or globally in ~/.strata/config.json.
 */
export interface WorkspaceConfig {
  /** Cascade project file (default: strata.cascade.json5) */
  project?: string;

  /** Schema document; overrides the one named by the project file */
  schema?: string;

  /** Report properties the schema doesn't declare */
  strict?: boolean;

  /** Key that marks a reference object (default: "$ref") */
  refKey?: string;

  /** Output format for resolved trees (json, json5, yaml) */
  format?: string;

  /** Exit non-zero at this severity (error, warning, never) */
  failOn?: string;

  /** Only merge layers up to and including this layer name */
  upToLayer?: string;
}

/**
 * Resolved configuration with all values set.
 * This is the merged result of global, workspace and CLI configs.
 */
export interface ResolvedConfig {
  project: string;
  schema?: string;
  strict: boolean;
  refKey: string;
  format: SourceFormat;
  failOn: FailOn;
  upToLayer?: string;
}
