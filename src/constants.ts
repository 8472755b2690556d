// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for strata.
 * Single source of truth for wire conventions and tree naming.
 */

/**
 * DOM conventions shared by the parser, the tree model and the resolver.
 */
export const DOM_CONFIG = {
  /** Reserved key that turns a single-key object into a reference */
  REF_KEY: '$ref',
  /** Name given to every tree root */
  ROOT_NAME: '$root',
  /** Path separator between segments */
  PATH_SEPARATOR: '/',
} as const;

/**
 * Source unit handling.
 */
export const SOURCE_CONFIG = {
  /** File extensions the file loader picks up */
  EXTENSIONS: ['json', 'json5', 'yaml', 'yml'],
  /** Default cascade project file name */
  PROJECT_FILE: 'strata.cascade.json5',
  /** Glob used to list source units under a layer folder */
  GLOB_PATTERN: '**/*.{json,json5,yaml,yml}',
} as const;

/**
 * Output limits for CLI rendering.
 */
export const CLI_CONFIG = {
  /** Longest scalar preview shown in search results */
  MAX_PREVIEW_LENGTH: 80,
  /** Indentation for JSON output */
  JSON_INDENT: 2,
} as const;
