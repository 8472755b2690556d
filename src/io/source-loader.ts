// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Source Loader
 *
 * Collects the raw source units of a layer. The file loader treats every
 * json/json5/yaml file under the layer folder as one unit, identified by its
 * forward-slash path relative to the folder.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import type { LayerDefinition, SourceUnit } from '../cascade/types.js';
import { unitPathSegments } from '../cascade/intra-layer.js';
import { SOURCE_CONFIG } from '../constants.js';
import { joinPath } from '../dom/tree.js';
import { diagnostic, sortDiagnostics, type Diagnostic } from '../errors.js';
import { logger } from '../logger.js';

export interface LayerSources {
  units: SourceUnit[];
  diagnostics: Diagnostic[];
}

/**
 * Anything that can produce the units of a layer.
 */
export interface SourceLoader {
  loadLayer(definition: LayerDefinition): Promise<LayerSources>;
}

/**
 * In-memory loader keyed by layer name. Useful for embedding and tests.
 */
export class MemorySourceLoader implements SourceLoader {
  constructor(private readonly unitsByLayer: ReadonlyMap<string, readonly SourceUnit[]>) {}

  async loadLayer(definition: LayerDefinition): Promise<LayerSources> {
    return { units: [...(this.unitsByLayer.get(definition.name) ?? [])], diagnostics: [] };
  }
}

async function isDirectory(folder: string): Promise<boolean> {
  try {
    return (await fs.stat(folder)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Loads units from the folder named by `definition.source`.
 */
export class FileSourceLoader implements SourceLoader {
  constructor(private readonly pattern: string = SOURCE_CONFIG.GLOB_PATTERN) {}

  async loadLayer(definition: LayerDefinition): Promise<LayerSources> {
    const folder = definition.source;
    const diagnostics: Diagnostic[] = [];

    if (!(await isDirectory(folder))) {
      diagnostics.push(
        diagnostic('LoadError', '/', `Layer folder "${folder}" does not exist`, undefined, definition.name)
      );
      return { units: [], diagnostics };
    }

    const matches = await glob(this.pattern, { cwd: folder, nodir: true, posix: true, dot: false });
    const ids = [...matches].sort();

    // Ids that differ only by case would map to paths that never merge
    const byLowerCase = new Map<string, string[]>();
    for (const id of ids) {
      const key = id.toLowerCase();
      byLowerCase.set(key, [...(byLowerCase.get(key) ?? []), id]);
    }

    const units: SourceUnit[] = [];
    for (const id of ids) {
      const twins = byLowerCase.get(id.toLowerCase()) ?? [];
      const prefix = joinPath(unitPathSegments(id));
      if (twins.length > 1) {
        diagnostics.push(
          diagnostic(
            'LoadError',
            prefix,
            `Source files differ only by case: ${twins.join(', ')}`,
            undefined,
            `${definition.name}:${id}`
          )
        );
        continue;
      }
      try {
        const text = await fs.readFile(path.join(folder, id), 'utf-8');
        units.push({ id, text });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        diagnostics.push(
          diagnostic('LoadError', prefix, `Cannot read "${id}": ${message}`, undefined, `${definition.name}:${id}`)
        );
      }
    }

    logger.debug(`layer "${definition.name}": ${units.length} source files in ${folder}`);
    return { units, diagnostics: sortDiagnostics(diagnostics) };
  }
}
