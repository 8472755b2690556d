// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Reference Resolver
 *
 * Replaces reference nodes with independent clones of their targets.
 * Works on a private copy of the input tree, so the input is never
 * modified. A target is fully resolved before it is copied.
 *
 * Resolution is best-effort: a missing target or a cycle is reported once
 * per reference location, the reference keeps its marker, and the rest of
 * the tree still resolves.
 */

import { type DomNode, type RefNode } from '../dom/nodes.js';
import { cloneNode, getPath, splitPath } from '../dom/tree.js';
import {
  assertNever,
  ContractError,
  diagnostic,
  sortDiagnostics,
  type Diagnostic,
} from '../errors.js';
import { logger } from '../logger.js';

export type ResolutionFailure = 'missing' | 'cycle';

/**
 * Outcome of resolving one location.
 */
export type Resolution =
  | { ok: true; node: DomNode }
  | { ok: false; reason: ResolutionFailure; message: string };

export interface ResolveResult {
  root: DomNode;
  diagnostics: Diagnostic[];
  /** Number of references replaced */
  resolved: number;
}

/**
 * Resolver bound to one tree. `resolveAll` resolves everything;
 * `resolveAt` resolves on demand (used by the validator).
 */
export class ReferenceResolver {
  private root: DomNode;
  private readonly failures = new Map<string, { reason: ResolutionFailure; message: string }>();
  private readonly diagnostics: Diagnostic[] = [];
  private resolvedCount = 0;

  constructor(root: DomNode) {
    if (!root) {
      throw new ContractError('ReferenceResolver requires a tree');
    }
    this.root = cloneNode(root);
  }

  /**
   * Resolve every reachable reference.
   */
  resolveAll(): ResolveResult {
    this.resolveSubtree(this.root, new Set());
    logger.resolveSummary(this.resolvedCount, this.failures.size);
    return {
      root: this.root,
      diagnostics: sortDiagnostics(this.diagnostics),
      resolved: this.resolvedCount,
    };
  }

  /**
   * Resolve the subtree at a path and return an independent copy of it.
   * The copy may still hold markers for references that failed.
   */
  resolveAt(path: string): Resolution {
    const chain = new Set<string>();
    const found = this.locate(path, chain);
    if (!found) {
      return { ok: false, reason: 'missing', message: `Nothing exists at "${path}"` };
    }
    if (!found.ok) {
      return found;
    }
    const outcome = this.resolveSubtree(found.node, chain);
    return outcome.ok ? { ok: true, node: cloneNode(outcome.node) } : outcome;
  }

  /**
   * Diagnostics reported so far, sorted by path.
   */
  getDiagnostics(): Diagnostic[] {
    return sortDiagnostics(this.diagnostics);
  }

  private fail(location: string, reason: ResolutionFailure, message: string): Resolution {
    const prior = this.failures.get(location);
    if (prior) {
      return { ok: false, ...prior };
    }
    this.failures.set(location, { reason, message });
    this.diagnostics.push(
      diagnostic(reason === 'cycle' ? 'ReferenceCycle' : 'UnresolvedReference', location, message)
    );
    logger.trace(`unresolved ${location}: ${message}`);
    return { ok: false, reason, message };
  }

  private resolveRef(ref: RefNode, chain: Set<string>): Resolution {
    const location = getPath(ref);
    const prior = this.failures.get(location);
    if (prior) {
      return { ok: false, ...prior };
    }
    if (chain.has(location)) {
      return this.fail(location, 'cycle', `Reference cycle: ${[...chain, location].join(' → ')}`);
    }

    chain.add(location);
    const found = this.locate(ref.refPath, chain);
    const outcome = found && found.ok ? this.resolveSubtree(found.node, chain) : found;
    chain.delete(location);

    if (!outcome) {
      return this.fail(location, 'missing', `Target "${ref.refPath}" does not exist`);
    }

    if (!outcome.ok) {
      return this.fail(
        location,
        outcome.reason,
        outcome.reason === 'cycle'
          ? `Target "${ref.refPath}" is part of a reference cycle`
          : `Target "${ref.refPath}" could not be resolved`
      );
    }
    // The target contained this very reference
    const selfFailure = this.failures.get(location);
    if (selfFailure) {
      return { ok: false, ...selfFailure };
    }

    this.resolvedCount++;
    logger.trace(`resolved ${location} → ${ref.refPath}`);
    return { ok: true, node: cloneNode(outcome.node, ref.name) };
  }

  /**
   * Find the node at a path in the tree being resolved. References met
   * along the way are resolved first, so the outcome does not depend on
   * which sibling was visited earlier. Undefined when nothing is there.
   */
  private locate(path: string, chain: Set<string>): Resolution | undefined {
    let current: DomNode = this.root;
    for (const segment of splitPath(path)) {
      if (current.kind === 'ref') {
        const outcome = this.resolveRef(current, chain);
        if (!outcome.ok) return outcome;
        this.replace(current, outcome.node);
        current = outcome.node;
      }
      let next: DomNode | undefined;
      switch (current.kind) {
        case 'object':
          next = current.get(segment);
          break;
        case 'array':
          next = /^\d+$/.test(segment) ? current.at(Number(segment)) : undefined;
          break;
        case 'value':
        case 'ref':
          next = undefined;
          break;
        default:
          return assertNever(current, 'node kind');
      }
      if (!next) return undefined;
      current = next;
    }
    return { ok: true, node: current };
  }

  private replace(old: RefNode, replacement: DomNode): void {
    const parent = old.parent;
    if (!parent) {
      this.root = replacement;
    } else if (parent.kind === 'object') {
      parent.setChild(replacement);
    } else {
      parent.replaceAt(Number(old.name), replacement);
    }
  }

  private resolveSubtree(node: DomNode, chain: Set<string>): Resolution {
    switch (node.kind) {
      case 'ref': {
        const outcome = this.resolveRef(node, chain);
        if (outcome.ok) {
          this.replace(node, outcome.node);
        }
        return outcome;
      }
      // Children are re-read on each step: resolving one sibling may
      // already have replaced another
      case 'object':
        for (const key of node.keys()) {
          const child = node.get(key);
          if (child) this.resolveSubtree(child, chain);
        }
        return { ok: true, node };
      case 'array':
        for (let i = 0; i < node.length; i++) {
          const item = node.at(i);
          if (item) this.resolveSubtree(item, chain);
        }
        return { ok: true, node };
      case 'value':
        return { ok: true, node };
      default:
        return assertNever(node, 'node kind');
    }
  }
}

/**
 * Resolve every reference in a tree. The input is left untouched.
 */
export function resolveReferences(root: DomNode): ResolveResult {
  return new ReferenceResolver(root).resolveAll();
}
