// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Intra-layer Merge
 *
 * Merges the source units of one layer into a single tree. Each unit is
 * mounted at a path prefix derived from its id ("db/primary.json" →
 * /db/primary). Two units defining the same non-object path is an overlap;
 * overlaps are collected and fail the whole layer.
 */

import { SOURCE_CONFIG } from '../constants.js';
import { createRoot, type DomNode, type ObjectNode } from '../dom/nodes.js';
import { childPath, cloneNode, ensureObjectPath, joinPath, walk } from '../dom/tree.js';
import { diagnostic, sortDiagnostics, type Diagnostic } from '../errors.js';
import { formatFromId, parseSource, SourceParseError, type ParseOptions } from '../io/parser.js';
import { logger } from '../logger.js';
import type { LayerBuildResult, LayerDefinition, SourceUnit } from './types.js';

const EXTENSION_PATTERN = new RegExp(`\\.(${SOURCE_CONFIG.EXTENSIONS.join('|')})$`, 'i');

/**
 * DOM path segments for a unit id: extension stripped, split on "/" or "\".
 */
export function unitPathSegments(id: string): string[] {
  return id
    .replace(EXTENSION_PATTERN, '')
    .split(/[\\/]/)
    .filter((segment) => segment.length > 0 && segment !== '.');
}

interface MergeState {
  layerName: string;
  origins: Map<string, string>;
  diagnostics: Diagnostic[];
  overlaps: number;
}

function trackSubtree(node: DomNode, path: string, unitId: string, origins: Map<string, string>): void {
  walk(node, (_n, p) => {
    origins.set(p, unitId);
  }, path);
}

function reportOverlap(state: MergeState, path: string, unitId: string): void {
  const first = state.origins.get(path) ?? 'unknown unit';
  state.overlaps++;
  state.diagnostics.push(
    diagnostic(
      'OverlapError',
      path,
      `Defined in both "${first}" and "${unitId}"`,
      undefined,
      state.layerName
    )
  );
}

function mergeUnitInto(
  target: ObjectNode,
  source: ObjectNode,
  basePath: string,
  unitId: string,
  state: MergeState
): void {
  for (const [key, child] of source.entries()) {
    const path = childPath(basePath, key);
    const existing = target.get(key);
    if (!existing) {
      const copy = target.addChild(cloneNode(child));
      trackSubtree(copy, path, unitId, state.origins);
    } else if (existing.kind === 'object' && child.kind === 'object') {
      mergeUnitInto(existing, child, path, unitId, state);
    } else {
      reportOverlap(state, path, unitId);
    }
  }
}

/**
 * Find the first prefix segment occupied by a non-object node.
 */
function blockedPrefix(root: ObjectNode, segments: readonly string[]): string {
  let current: DomNode | undefined = root;
  const walked: string[] = [];
  for (const segment of segments) {
    if (!current || current.kind !== 'object') break;
    walked.push(segment);
    current = current.get(segment);
  }
  return joinPath(walked);
}

/**
 * Build one layer from its source units.
 */
export function buildLayer(
  definition: LayerDefinition,
  units: readonly SourceUnit[],
  options: ParseOptions = {}
): LayerBuildResult {
  const root = createRoot();
  const state: MergeState = {
    layerName: definition.name,
    origins: new Map(),
    diagnostics: [],
    overlaps: 0,
  };
  const merged: string[] = [];
  const sorted = [...units].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  for (const unit of sorted) {
    const segments = unitPathSegments(unit.id);
    const prefix = joinPath(segments);
    const source = `${definition.name}:${unit.id}`;

    let tree: DomNode;
    try {
      tree = parseSource(unit.text, unit.format ?? formatFromId(unit.id), options);
    } catch (error) {
      if (!(error instanceof SourceParseError)) throw error;
      state.diagnostics.push(diagnostic('LoadError', prefix, error.message, undefined, source));
      continue;
    }
    if (tree.kind !== 'object') {
      state.diagnostics.push(
        diagnostic('LoadError', prefix, `Root of "${unit.id}" must be an object, found ${tree.kind}`, undefined, source)
      );
      continue;
    }

    const target = ensureObjectPath(root, segments);
    if (!target) {
      reportOverlap(state, blockedPrefix(root, segments), unit.id);
      continue;
    }
    for (let i = 1; i <= segments.length; i++) {
      const folderPath = joinPath(segments.slice(0, i));
      if (!state.origins.has(folderPath)) state.origins.set(folderPath, unit.id);
    }

    logger.trace(`layer "${definition.name}": merging ${unit.id} at ${prefix}`);
    mergeUnitInto(target, tree, prefix, unit.id, state);
    merged.push(unit.id);
  }

  const failed = state.overlaps > 0;
  logger.layerLoaded(definition.name, definition.index, sorted.length, failed);

  return {
    definition,
    layer: failed
      ? null
      : { definition, root, unitOrigins: state.origins, units: merged },
    diagnostics: sortDiagnostics(state.diagnostics),
  };
}
