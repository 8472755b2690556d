// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * IO Module
 *
 * - parser.ts        - Text ↔ raw values ↔ DOM trees
 * - source-loader.ts - Layer source units from folders or memory
 * - project.ts       - Cascade project files
 */

export {
  SourceParseError,
  formatFromId,
  parseText,
  formatText,
  parseRaw,
  parseSource,
  serialize,
} from './parser.js';
export type { SourceFormat, ParseOptions } from './parser.js';
export { FileSourceLoader, MemorySourceLoader } from './source-loader.js';
export type { SourceLoader, LayerSources } from './source-loader.js';
export { loadProjectFile, parseProjectFile } from './project.js';
export type { ProjectFile, MountDefinition, ProjectFileDocument } from './project.js';
