// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI Workspace
 *
 * Wires resolved tool settings to a mount registry: one cascading provider
 * per mount named in the project file, plus the schema document if any.
 */

import * as path from 'path';
import { checkIntegrity } from '../cascade/integrity.js';
import type { ResolvedConfig } from '../config/types.js';
import { joinPath, splitPath } from '../dom/tree.js';
import { ProjectFileError, type Diagnostic } from '../errors.js';
import { loadProjectFile, type ProjectFile } from '../io/project.js';
import { FileSourceLoader, type SourceLoader } from '../io/source-loader.js';
import { logger } from '../logger.js';
import { CascadingProvider } from '../mount/providers.js';
import { MountRegistry } from '../mount/registry.js';
import { loadSchemaFile } from '../schema/loader.js';
import type { SchemaMap } from '../schema/types.js';

/**
 * Where a resolved path came from.
 */
export interface OriginReport {
  path: string;
  mount: string;
  /** Name of the winning layer */
  winner: string;
  /** Names of every layer that defined the path, ascending */
  contributors: string[];
}

export class Workspace {
  readonly registry: MountRegistry;

  constructor(
    readonly project: ProjectFile,
    private readonly config: ResolvedConfig,
    loader: SourceLoader = new FileSourceLoader(),
    cwd: string = process.cwd()
  ) {
    const schemaFile = config.schema ? path.resolve(cwd, config.schema) : project.schemaFile;
    let schemas: Promise<SchemaMap> | undefined;
    // A failed read is not cached; the next refresh reads the file again
    const loadSchemas = (file: string): Promise<SchemaMap> =>
      (schemas ??= loadSchemaFile(file).catch((error: unknown) => {
        schemas = undefined;
        throw error;
      }));
    this.registry = new MountRegistry({
      strict: config.strict,
      schemas: schemaFile ? () => loadSchemas(schemaFile) : undefined,
    });

    const upToIndexes = this.resolveUpToLayer();
    for (const mount of project.mounts) {
      const provider = new CascadingProvider(mount.layers, loader, {
        refKey: config.refKey,
        upToIndex: upToIndexes.get(mount.path),
      });
      this.registry.register(mount.path, provider);
    }
  }

  /**
   * Map mount path → index of the `upToLayer` layer in that mount.
   * @throws ProjectFileError if no mount has a layer of that name
   */
  private resolveUpToLayer(): Map<string, number> {
    const indexes = new Map<string, number>();
    const name = this.config.upToLayer;
    if (!name) return indexes;
    for (const mount of this.project.mounts) {
      const layer = mount.layers.find((l) => l.name === name);
      if (layer) indexes.set(mount.path, layer.index);
    }
    if (indexes.size === 0) {
      throw new ProjectFileError(`No mount has a layer named "${name}"`, this.project.filePath);
    }
    return indexes;
  }

  /**
   * Mount containing a path, if any.
   */
  mountFor(target: string): string | undefined {
    const segments = splitPath(target);
    return this.project.mounts
      .map((m) => m.path)
      .find((mountPath) => {
        const prefix = splitPath(mountPath);
        return prefix.every((segment, i) => segments[i] === segment);
      });
  }

  /**
   * Origin of a path in the published snapshot, or undefined when no
   * layer defined it.
   */
  originOf(target: string): OriginReport | undefined {
    const mountPath = this.mountFor(target);
    if (!mountPath) return undefined;
    const result = this.registry.snapshot?.cascades.get(mountPath);
    if (!result) return undefined;

    const relative = joinPath(splitPath(target).slice(splitPath(mountPath).length));
    const origin = result.merge.origins.get(relative);
    if (!origin) return undefined;

    const names = new Map<number, string>(result.merge.layers.map((l): [number, string] => [l.index, l.name]));
    const nameOf = (index: number): string => names.get(index) ?? String(index);
    return {
      path: target,
      mount: mountPath,
      winner: nameOf(origin.winner),
      contributors: origin.contributors.map(nameOf),
    };
  }

  /**
   * Integrity warnings for every cascade in the published snapshot,
   * rebased under the mount path.
   */
  integrityDiagnostics(): Diagnostic[] {
    const issues: Diagnostic[] = [];
    for (const [mountPath, result] of this.registry.snapshot?.cascades ?? []) {
      for (const d of checkIntegrity(result.layers)) {
        issues.push({ ...d, path: d.path === '/' ? mountPath : mountPath + d.path });
      }
    }
    return issues;
  }
}

/**
 * Load the project named by the settings and open a workspace on it.
 */
export async function openWorkspace(config: ResolvedConfig, cwd: string = process.cwd()): Promise<Workspace> {
  const projectPath = path.resolve(cwd, config.project);
  const project = await loadProjectFile(projectPath);
  logger.verbose(`Project ${projectPath}: ${project.mounts.length} mounts`);
  return new Workspace(project, config, new FileSourceLoader(), cwd);
}
