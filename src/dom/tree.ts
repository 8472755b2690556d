// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Tree operations: paths, lookup, cloning, export and traversal.
 */

import { DOM_CONFIG } from '../constants.js';
import { assertNever } from '../errors.js';
import {
  ArrayNode,
  ObjectNode,
  RefNode,
  ValueNode,
  type DomNode,
  type RawValue,
} from './nodes.js';

const SEP = DOM_CONFIG.PATH_SEPARATOR;

/**
 * Escape a node name for use as a path segment (`~` → `~0`, `/` → `~1`).
 */
export function encodeSegment(name: string): string {
  return name.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Reverse of encodeSegment.
 */
export function decodeSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Split a path into decoded segments. Leading, trailing and doubled
 * separators are ignored, so "/a/b", "a/b" and "/a/b/" are equivalent.
 */
export function splitPath(path: string): string[] {
  return path
    .split(SEP)
    .filter((segment) => segment.length > 0)
    .map(decodeSegment);
}

/**
 * Build an absolute path from decoded segments.
 */
export function joinPath(segments: readonly string[]): string {
  return SEP + segments.map(encodeSegment).join(SEP);
}

/**
 * Append one name to an absolute path.
 */
export function childPath(parentPath: string, name: string): string {
  return parentPath === SEP ? SEP + encodeSegment(name) : parentPath + SEP + encodeSegment(name);
}

/**
 * Absolute path of a node, computed by walking parent links.
 * The root (or any detached node) has path "/".
 */
export function getPath(node: DomNode): string {
  const segments: string[] = [];
  let current: DomNode = node;
  while (current.parent) {
    segments.push(current.name);
    current = current.parent;
  }
  return joinPath(segments.reverse());
}

/**
 * Find the node at a path below root, or undefined.
 */
export function findNode(root: DomNode, path: string): DomNode | undefined {
  let current: DomNode | undefined = root;
  for (const segment of splitPath(path)) {
    if (!current) return undefined;
    switch (current.kind) {
      case 'object':
        current = current.get(segment);
        break;
      case 'array':
        current = /^\d+$/.test(segment) ? current.at(Number(segment)) : undefined;
        break;
      case 'value':
      case 'ref':
        return undefined;
      default:
        return assertNever(current, 'node kind');
    }
  }
  return current;
}

/**
 * Deep-clone a subtree. The clone is detached, optionally renamed, and
 * shares no mutable state with the original. References are copied
 * verbatim, unresolved.
 */
export function cloneNode(node: ObjectNode, name?: string): ObjectNode;
export function cloneNode(node: ArrayNode, name?: string): ArrayNode;
export function cloneNode(node: DomNode, name?: string): DomNode;
export function cloneNode(node: DomNode, name: string = node.name): DomNode {
  switch (node.kind) {
    case 'value':
      return new ValueNode(name, node.value);
    case 'ref':
      return new RefNode(name, node.refPath);
    case 'array': {
      const copy = new ArrayNode(name);
      for (const item of node.toArray()) {
        copy.append(cloneNode(item));
      }
      return copy;
    }
    case 'object': {
      const copy = new ObjectNode(name);
      for (const child of node.values()) {
        copy.addChild(cloneNode(child));
      }
      return copy;
    }
    default:
      return assertNever(node, 'node kind');
  }
}

export interface ExportOptions {
  /** Key used for reference markers (default "$ref") */
  refKey?: string;
}

/**
 * Export a subtree to the raw hierarchical representation.
 * Unresolved references become `{ [refKey]: path }` markers.
 */
export function exportNode(node: DomNode, options: ExportOptions = {}): RawValue {
  const refKey = options.refKey ?? DOM_CONFIG.REF_KEY;
  switch (node.kind) {
    case 'value':
      return node.value;
    case 'ref':
      return { [refKey]: node.refPath };
    case 'array':
      return node.toArray().map((item) => exportNode(item, options));
    case 'object': {
      const out: { [key: string]: RawValue } = {};
      for (const [key, child] of node.entries()) {
        // Plain assignment would turn a "__proto__" property into a prototype
        Object.defineProperty(out, key, {
          value: exportNode(child, options),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
    default:
      return assertNever(node, 'node kind');
  }
}

/**
 * Depth-first pre-order traversal. The visitor receives each node with its
 * path relative to the starting node's path. Return false to skip children.
 */
export function walk(
  node: DomNode,
  visit: (node: DomNode, path: string) => boolean | void,
  basePath: string = getPath(node)
): void {
  if (visit(node, basePath) === false) return;
  switch (node.kind) {
    case 'object':
      for (const [key, child] of node.entries()) {
        walk(child, visit, childPath(basePath, key));
      }
      break;
    case 'array':
      node.toArray().forEach((item, index) => {
        walk(item, visit, childPath(basePath, String(index)));
      });
      break;
    case 'value':
    case 'ref':
      break;
    default:
      assertNever(node, 'node kind');
  }
}

/**
 * Count nodes of each kind in a subtree.
 */
export function countNodes(node: DomNode): Record<DomNode['kind'], number> {
  const counts = { object: 0, array: 0, value: 0, ref: 0 };
  walk(node, (n) => {
    counts[n.kind]++;
  }, SEP);
  return counts;
}

/**
 * Walk down from root creating missing objects for each segment.
 * Returns undefined when a segment is occupied by a non-object node.
 */
export function ensureObjectPath(root: ObjectNode, segments: readonly string[]): ObjectNode | undefined {
  let current = root;
  for (const segment of segments) {
    const existing = current.get(segment);
    if (!existing) {
      current = current.addChild(new ObjectNode(segment));
    } else if (existing.kind === 'object') {
      current = existing;
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Structural equality of two subtrees (names, kinds, order and payloads).
 */
export function treesEqual(a: DomNode, b: DomNode): boolean {
  return JSON.stringify(exportNode(a)) === JSON.stringify(exportNode(b));
}
