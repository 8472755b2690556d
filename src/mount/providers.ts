// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * DOM Providers
 *
 * A provider produces one subtree for the mount registry. Implement
 * DomProvider to plug in other sources (a database snapshot, a remote
 * service); the registry only needs `load`.
 */

import { buildCascade } from '../cascade/merger.js';
import type { CascadeResult, LayerDefinition, MergeOptions, SourceUnit } from '../cascade/types.js';
import type { ObjectNode } from '../dom/nodes.js';
import { cloneNode } from '../dom/tree.js';
import { ContractError, sortDiagnostics, type Diagnostic } from '../errors.js';
import type { ParseOptions } from '../io/parser.js';
import type { SourceLoader } from '../io/source-loader.js';

/**
 * What a provider hands to the registry. Diagnostic paths are relative to
 * the provider's own root; the registry rebases them under the mount path.
 */
export interface ProviderLoad {
  root: ObjectNode;
  diagnostics: Diagnostic[];
  /** Set by cascading providers; published with the snapshot for origin queries */
  cascade?: CascadeResult;
}

export interface DomProvider {
  /**
   * Produce a fresh subtree. Rejecting marks the mount as failed for the
   * refresh in progress.
   */
  load(): Promise<ProviderLoad>;
}

/**
 * Serves a fixed tree. Every load returns an independent copy.
 */
export class StaticDomProvider implements DomProvider {
  constructor(private readonly root: ObjectNode) {
    if (!root) {
      throw new ContractError('StaticDomProvider requires a tree');
    }
  }

  async load(): Promise<ProviderLoad> {
    return { root: cloneNode(this.root), diagnostics: [] };
  }
}

export type CascadingProviderOptions = MergeOptions & ParseOptions;

/**
 * Loads a cascade of layers through a source loader and merges it.
 * Each load carries its own cascade result, so origins always match the
 * tree they came with.
 */
export class CascadingProvider implements DomProvider {
  constructor(
    private readonly layers: readonly LayerDefinition[],
    private readonly loader: SourceLoader,
    private readonly options: CascadingProviderOptions = {}
  ) {
    if (!layers || !loader) {
      throw new ContractError('CascadingProvider requires layer definitions and a source loader');
    }
  }

  async load(): Promise<ProviderLoad> {
    const loaded = await Promise.all(this.layers.map((layer) => this.loader.loadLayer(layer)));

    const unitsByLayer = new Map<string, SourceUnit[]>();
    const diagnostics: Diagnostic[] = [];
    this.layers.forEach((layer, i) => {
      unitsByLayer.set(layer.name, loaded[i].units);
      diagnostics.push(...loaded[i].diagnostics);
    });

    const result = buildCascade(this.layers, unitsByLayer, this.options);
    return {
      root: result.merge.root,
      diagnostics: sortDiagnostics([...diagnostics, ...result.diagnostics]),
      cascade: result,
    };
  }

  getLayers(): readonly LayerDefinition[] {
    return this.layers;
  }
}
