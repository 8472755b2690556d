// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Layer Merger
 *
 * Functions for merging layers into one effective tree.
 * Priority: higher layer index > lower layer index
 *
 * Objects merge key by key; any other pair (values, arrays, references,
 * mismatched kinds) is replaced wholesale by the higher layer.
 */

import { createRoot, type ObjectNode } from '../dom/nodes.js';
import { cloneNode, findNode, walk } from '../dom/tree.js';
import { ContractError, diagnostic, sortDiagnostics, type Diagnostic } from '../errors.js';
import type { ParseOptions } from '../io/parser.js';
import { logger } from '../logger.js';
import { buildLayer } from './intra-layer.js';
import { OriginMap } from './origins.js';
import type {
  CascadeLayer,
  CascadeResult,
  LayerDefinition,
  MergeOptions,
  MergeResult,
  SourceUnit,
} from './types.js';

/**
 * Merge source into target, cloning everything taken from source.
 */
export function mergeInto(target: ObjectNode, source: ObjectNode): void {
  for (const [key, sourceChild] of source.entries()) {
    const targetChild = target.get(key);
    if (targetChild && targetChild.kind === 'object' && sourceChild.kind === 'object') {
      mergeInto(targetChild, sourceChild);
    } else {
      target.setChild(cloneNode(sourceChild));
    }
  }
}

/**
 * Pass 1: every non-root path each layer defines, with the defining layer
 * indices in ascending order.
 */
function collectContributors(layers: readonly CascadeLayer[]): Map<string, number[]> {
  const contributors = new Map<string, number[]>();
  for (const layer of layers) {
    const index = layer.definition.index;
    walk(layer.root, (_node, path) => {
      if (path === '/') return;
      const list = contributors.get(path);
      if (list) {
        list.push(index);
      } else {
        contributors.set(path, [index]);
      }
    }, '/');
  }
  return contributors;
}

function orderLayers(layers: readonly CascadeLayer[]): CascadeLayer[] {
  const ordered = [...layers].sort((a, b) => a.definition.index - b.definition.index);
  for (let i = 1; i < ordered.length; i++) {
    if (ordered[i].definition.index === ordered[i - 1].definition.index) {
      throw new ContractError(
        `Layers "${ordered[i - 1].definition.name}" and "${ordered[i].definition.name}" ` +
        `share precedence index ${ordered[i].definition.index}`
      );
    }
  }
  return ordered;
}

/**
 * Merge layers lowest to highest precedence into a new tree.
 * Layer trees are never modified.
 */
export function mergeLayers(layers: readonly CascadeLayer[], options: MergeOptions = {}): MergeResult {
  const { upToIndex } = options;
  const included = orderLayers(layers).filter(
    (layer) => upToIndex === undefined || layer.definition.index <= upToIndex
  );

  const root = createRoot();
  for (const layer of included) {
    mergeInto(root, layer.root);
  }

  // Pass 2: drop paths a higher layer replaced with a differently shaped node
  const contributors = collectContributors(included);
  for (const path of [...contributors.keys()]) {
    if (!findNode(root, path)) contributors.delete(path);
  }

  const origins = new OriginMap(contributors);
  logger.mergeSummary(included.length, origins.size);

  return {
    root,
    origins,
    layers: included.map((layer) => layer.definition),
  };
}

/**
 * Build every layer from its units, then merge the ones that succeeded.
 * A failed layer is reported and left out; it never blocks the others.
 */
export function buildCascade(
  definitions: readonly LayerDefinition[],
  unitsByLayer: ReadonlyMap<string, readonly SourceUnit[]>,
  options: MergeOptions & ParseOptions = {}
): CascadeResult {
  const diagnostics: Diagnostic[] = [];
  const layers: CascadeLayer[] = [];

  for (const definition of definitions) {
    const units = unitsByLayer.get(definition.name) ?? [];
    const result = buildLayer(definition, units, options);
    diagnostics.push(...result.diagnostics);
    if (result.layer) {
      layers.push(result.layer);
    } else {
      diagnostics.push(
        diagnostic(
          'LoadError',
          '/',
          `Layer "${definition.name}" was excluded from the cascade`,
          undefined,
          definition.name
        )
      );
    }
  }

  return {
    merge: mergeLayers(layers, options),
    layers,
    diagnostics: sortDiagnostics(diagnostics),
  };
}
