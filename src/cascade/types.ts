// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Cascade Types
 *
 * Type definitions for layers, source units and merge results.
 */

import type { ObjectNode } from '../dom/nodes.js';
import type { Diagnostic } from '../errors.js';
import type { SourceFormat } from '../io/parser.js';
import type { OriginMap } from './origins.js';

/**
 * A named configuration layer with fixed precedence.
 */
export interface LayerDefinition {
  /** Display name (e.g., "base", "production") */
  name: string;
  /** Precedence index; 0 is the lowest */
  index: number;
  /** Where the layer's source units come from (e.g., a folder) */
  source: string;
}

/**
 * One raw source unit within a layer.
 */
export interface SourceUnit {
  /** Identifier that also determines the DOM path prefix (e.g., "database/primary.json") */
  id: string;
  text: string;
  /** Inferred from the id extension when omitted */
  format?: SourceFormat;
}

/**
 * A layer after its units have been merged into one tree.
 */
export interface CascadeLayer {
  definition: LayerDefinition;
  root: ObjectNode;
  /** DOM path → id of the unit that defined it */
  unitOrigins: ReadonlyMap<string, string>;
  /** Ids of units that took part in the merge, sorted */
  units: readonly string[];
}

/**
 * Outcome of an intra-layer merge. `layer` is null when the merge failed.
 */
export interface LayerBuildResult {
  definition: LayerDefinition;
  layer: CascadeLayer | null;
  diagnostics: Diagnostic[];
}

/**
 * Outcome of an inter-layer merge.
 */
export interface MergeResult {
  root: ObjectNode;
  origins: OriginMap;
  /** Definitions of the layers that took part, ascending */
  layers: readonly LayerDefinition[];
}

/**
 * Outcome of building and merging a whole cascade.
 */
export interface CascadeResult {
  merge: MergeResult;
  layers: readonly CascadeLayer[];
  diagnostics: Diagnostic[];
}

export interface MergeOptions {
  /** Only merge layers whose index is at most this value */
  upToIndex?: number;
}
