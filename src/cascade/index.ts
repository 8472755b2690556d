// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Cascade Module
 *
 * - types.ts       - Layer, unit and result types
 * - intra-layer.ts - Merging the units of one layer
 * - merger.ts      - Merging layers with origin tracking
 * - origins.ts     - Per-path origin map
 * - integrity.ts   - Cross-layer consistency checks
 */

export type {
  LayerDefinition,
  SourceUnit,
  CascadeLayer,
  LayerBuildResult,
  MergeResult,
  CascadeResult,
  MergeOptions,
} from './types.js';

export { buildLayer, unitPathSegments } from './intra-layer.js';
export { mergeInto, mergeLayers, buildCascade } from './merger.js';
export { OriginMap } from './origins.js';
export type { PathOrigin } from './origins.js';
export {
  ALL_INTEGRITY_CHECKS,
  checkIntegrity,
  checkPropertyCasing,
  checkUnitConsistency,
} from './integrity.js';
export type { IntegrityCheck } from './integrity.js';
