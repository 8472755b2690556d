// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * DOM Module
 *
 * - nodes.ts  - Node kinds and container operations
 * - tree.ts   - Paths, lookup, cloning, export, traversal
 * - search.ts - Name/value search
 */

export type { Scalar, RawValue, DomNode, ContainerNode, DomNodeKind } from './nodes.js';
export { ObjectNode, ArrayNode, ValueNode, RefNode, createRoot } from './nodes.js';

export type { ExportOptions } from './tree.js';
export {
  encodeSegment,
  decodeSegment,
  splitPath,
  joinPath,
  childPath,
  getPath,
  findNode,
  cloneNode,
  exportNode,
  walk,
  countNodes,
  ensureObjectPath,
  treesEqual,
} from './tree.js';

export type { SearchMatch, SearchMatchKind } from './search.js';
export { searchTree } from './search.js';
