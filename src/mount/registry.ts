// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Mount Registry
 *
 * Composes the subtrees of several providers into one master tree.
 * A refresh loads every provider concurrently, splices the results under
 * their mount paths, resolves references once over the whole tree (so
 * references may cross mounts) and validates per-mount schemas.
 *
 * Only complete refreshes are published. When a newer refresh starts
 * before an older one finishes, the older result is discarded.
 */

import type { CascadeResult } from '../cascade/types.js';
import { createRoot, type DomNode, type ObjectNode } from '../dom/nodes.js';
import { cloneNode, ensureObjectPath, joinPath, splitPath } from '../dom/tree.js';
import { ContractError, diagnostic, sortDiagnostics, type Diagnostic } from '../errors.js';
import { logger } from '../logger.js';
import { DomQuery } from '../query/dom-query.js';
import { resolveReferences } from '../refs/resolver.js';
import type { SchemaMap, SchemaNode } from '../schema/types.js';
import { validateMounts } from '../schema/validator.js';
import type { DomProvider, ProviderLoad } from './providers.js';

/**
 * Supplies schemas keyed by mount (or any other) path. Called once per
 * refresh.
 */
export type SchemaSupplier = () => SchemaMap | Promise<SchemaMap>;

export interface MountRegistryOptions {
  schemas?: SchemaSupplier;
  /** Report properties the schemas don't declare */
  strict?: boolean;
}

/**
 * A published, immutable view of the master tree.
 */
export interface RegistrySnapshot {
  generation: number;
  /** Master tree with references resolved */
  root: DomNode;
  /** Master tree as spliced, references untouched */
  unresolved: ObjectNode;
  diagnostics: Diagnostic[];
  /** Mount paths whose providers loaded, sorted */
  mounts: string[];
  /** Cascade results of the loads spliced into this snapshot, by mount path */
  cascades: Map<string, CascadeResult>;
}

export interface RefreshResult {
  /** True when a newer refresh started before this one finished */
  superseded: boolean;
  /** The snapshot published by this refresh, or the current one if superseded */
  snapshot: RegistrySnapshot | undefined;
}

function normalizeMountPath(mountPath: string): string {
  if (typeof mountPath !== 'string' || !mountPath.startsWith('/')) {
    throw new ContractError(`Mount path "${mountPath}" must be absolute`);
  }
  const normalized = joinPath(splitPath(mountPath));
  if (normalized === '/') {
    throw new ContractError('Cannot mount at the root');
  }
  return normalized;
}

function contains(outer: string, inner: string): boolean {
  return outer === inner || inner.startsWith(outer + '/');
}

/**
 * Re-anchor a provider-relative path under a mount path.
 */
function rebase(mountPath: string, path: string): string {
  return path === '/' ? mountPath : mountPath + path;
}

export class MountRegistry {
  private readonly providers = new Map<string, DomProvider>();
  private current: RegistrySnapshot | undefined;
  private requested = 0;

  constructor(private readonly options: MountRegistryOptions = {}) {}

  /**
   * Register a provider at a mount path.
   * @throws ContractError for the root, a taken path or a nested mount
   */
  register(mountPath: string, provider: DomProvider): void {
    if (!provider) {
      throw new ContractError('register requires a provider');
    }
    const normalized = normalizeMountPath(mountPath);
    for (const existing of this.providers.keys()) {
      if (contains(existing, normalized) || contains(normalized, existing)) {
        throw new ContractError(`Mount "${normalized}" conflicts with mount "${existing}"`);
      }
    }
    this.providers.set(normalized, provider);
  }

  /**
   * Remove a mount. Takes effect at the next refresh.
   */
  unregister(mountPath: string): boolean {
    return this.providers.delete(normalizeMountPath(mountPath));
  }

  /** Registered mount paths, sorted */
  get mountPaths(): string[] {
    return [...this.providers.keys()].sort();
  }

  /** Last published snapshot */
  get snapshot(): RegistrySnapshot | undefined {
    return this.current;
  }

  /**
   * Query the last published snapshot.
   * @throws ContractError before the first completed refresh
   */
  query(): DomQuery {
    if (!this.current) {
      throw new ContractError('No snapshot yet; call refresh() first');
    }
    return new DomQuery(this.current.root);
  }

  /**
   * Reload every provider and publish a new snapshot.
   */
  async refresh(): Promise<RefreshResult> {
    const generation = ++this.requested;
    const startTime = Date.now();
    const mounts = this.mountPaths.map((path) => ({ path, provider: this.getProvider(path) }));

    const outcomes = await Promise.allSettled(mounts.map(async (mount) => mount.provider.load()));
    const supplied = await this.loadSchemas();

    if (generation !== this.requested) {
      logger.debug(`refresh #${generation} superseded by #${this.requested}`);
      return { superseded: true, snapshot: this.current };
    }

    const master = createRoot();
    const diagnostics: Diagnostic[] = [...supplied.diagnostics];
    const loaded: string[] = [];
    const failed: string[] = [];
    const cascades = new Map<string, CascadeResult>();

    mounts.forEach((mount, i) => {
      const outcome = outcomes[i];
      if (outcome.status === 'rejected') {
        const reason: unknown = outcome.reason;
        const message = reason instanceof Error ? reason.message : String(reason);
        diagnostics.push(diagnostic('LoadError', mount.path, `Provider failed: ${message}`, undefined, mount.path));
        failed.push(mount.path);
        return;
      }
      this.splice(master, mount.path, outcome.value);
      for (const d of outcome.value.diagnostics) {
        diagnostics.push({ ...d, path: rebase(mount.path, d.path) });
      }
      if (outcome.value.cascade) {
        cascades.set(mount.path, outcome.value.cascade);
      }
      loaded.push(mount.path);
    });

    const resolved = resolveReferences(master);
    diagnostics.push(...resolved.diagnostics);

    if (supplied.schemas) {
      const applicable = new Map<string, SchemaNode>();
      for (const [path, schema] of supplied.schemas) {
        if (!failed.some((mountPath) => contains(mountPath, path))) {
          applicable.set(path, schema);
        }
      }
      // The resolver has already reported every broken reference
      const reported = new Set(resolved.diagnostics.map((d) => d.path));
      for (const issue of validateMounts(master, applicable, { strict: this.options.strict })) {
        if (issue.kind !== 'UnresolvedReference' || !reported.has(issue.path)) {
          diagnostics.push(issue);
        }
      }
    }

    const snapshot: RegistrySnapshot = {
      generation,
      root: resolved.root,
      unresolved: master,
      diagnostics: sortDiagnostics(diagnostics),
      mounts: loaded,
      cascades,
    };
    this.current = snapshot;
    logger.refreshSummary(generation, loaded.length, snapshot.diagnostics, (Date.now() - startTime) / 1000);
    return { superseded: false, snapshot };
  }

  /**
   * Ask the schema supplier for this refresh's schemas. A failing supplier
   * is reported at the root and the refresh goes on without validation.
   */
  private async loadSchemas(): Promise<{ schemas?: SchemaMap; diagnostics: Diagnostic[] }> {
    if (!this.options.schemas) {
      return { diagnostics: [] };
    }
    try {
      return { schemas: await this.options.schemas(), diagnostics: [] };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`schema supplier failed: ${message}`);
      return { diagnostics: [diagnostic('LoadError', '/', `Schema supplier failed: ${message}`)] };
    }
  }

  private getProvider(mountPath: string): DomProvider {
    const provider = this.providers.get(mountPath);
    if (!provider) {
      throw new ContractError(`No provider at "${mountPath}"`);
    }
    return provider;
  }

  private splice(master: ObjectNode, mountPath: string, load: ProviderLoad): void {
    const segments = splitPath(mountPath);
    const parent = ensureObjectPath(master, segments.slice(0, -1));
    if (!parent) {
      throw new ContractError(`Cannot splice at "${mountPath}"`);
    }
    parent.setChild(cloneNode(load.root, segments[segments.length - 1]));
  }
}
