// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Fill missing optional properties from schema defaults.
 */

import { ArrayNode, ObjectNode, type DomNode } from '../dom/nodes.js';
import { childPath, cloneNode, findNode } from '../dom/tree.js';
import { ContractError } from '../errors.js';
import { parseRaw } from '../io/parser.js';
import type { SchemaNode } from './types.js';

export interface DefaultsResult {
  root: DomNode;
  /** Paths that received a default, sorted */
  applied: string[];
}

function fill(node: DomNode, schema: SchemaNode, path: string, applied: string[]): void {
  if (schema.kind === 'object' && node instanceof ObjectNode) {
    for (const [name, property] of Object.entries(schema.properties)) {
      const child = node.get(name);
      if (child) {
        fill(child, property.schema, childPath(path, name), applied);
      } else if (property.default !== undefined) {
        node.addChild(parseRaw(property.default, {}, name));
        applied.push(childPath(path, name));
      }
    }
    if (schema.additionalProperties) {
      for (const [name, child] of node.entries()) {
        if (!Object.prototype.hasOwnProperty.call(schema.properties, name)) {
          fill(child, schema.additionalProperties, childPath(path, name), applied);
        }
      }
    }
  } else if (schema.kind === 'array' && node instanceof ArrayNode) {
    node.toArray().forEach((item, index) => {
      fill(item, schema.items, childPath(path, String(index)), applied);
    });
  }
  // References and mismatched shapes are left for the validator to report
}

/**
 * Return a copy of the subtree at `path` (default: the whole tree) with
 * absent properties that declare a default filled in. The input is not
 * modified.
 */
export function applySchemaDefaults(root: DomNode, schema: SchemaNode, path: string = '/'): DefaultsResult {
  if (!root || !schema) {
    throw new ContractError('applySchemaDefaults requires a tree and a schema');
  }
  const copy = cloneNode(root);
  const target = findNode(copy, path);
  const applied: string[] = [];
  if (target) {
    fill(target, schema, path, applied);
  }
  return { root: copy, applied: applied.sort() };
}
