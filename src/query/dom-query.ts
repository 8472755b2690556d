// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Query Layer
 *
 * Typed reads over a (usually resolved) tree. Subtrees are exported to raw
 * values and decoded with a zod schema supplied by the caller.
 *
 * @example
 * const query = new DomQuery(snapshot.root);
 * const server = query.get('/server', z.object({ host: z.string(), port: z.number().int() }));
 */

import type { z } from 'zod';
import type { DomNode, RawValue } from '../dom/nodes.js';
import { exportNode, findNode, joinPath, splitPath } from '../dom/tree.js';
import { ContractError, DecodeMismatchError, PathNotFoundError } from '../errors.js';

export class DomQuery {
  constructor(private readonly root: DomNode) {
    if (!root) {
      throw new ContractError('DomQuery requires a tree');
    }
  }

  has(path: string): boolean {
    return findNode(this.root, path) !== undefined;
  }

  /**
   * Raw value of the subtree at a path.
   * @throws PathNotFoundError
   */
  raw(path: string): RawValue {
    const node = findNode(this.root, path);
    if (!node) {
      throw new PathNotFoundError(joinPath(splitPath(path)));
    }
    return exportNode(node);
  }

  /**
   * Decode the subtree at a path.
   * @throws PathNotFoundError when nothing exists at the path
   * @throws DecodeMismatchError when the subtree doesn't fit the shape
   */
  get<S extends z.ZodTypeAny>(path: string, shape: S): z.output<S> {
    const raw = this.raw(path);
    const result = shape.safeParse(raw);
    if (!result.success) {
      throw new DecodeMismatchError(joinPath(splitPath(path)), result.error.issues);
    }
    return result.data;
  }

  /**
   * Like get, but returns undefined when the path is absent.
   * Decode failures still throw.
   */
  tryGet<S extends z.ZodTypeAny>(path: string, shape: S): z.output<S> | undefined {
    return this.has(path) ? this.get(path, shape) : undefined;
  }
}
