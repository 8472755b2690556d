// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Tree Search
 *
 * Case-insensitive lookup over node names, scalar values and reference paths.
 */

import { walk } from './tree.js';
import type { DomNode } from './nodes.js';

/**
 * What part of a node matched the query.
 */
export type SearchMatchKind = 'name' | 'value' | 'ref';

export interface SearchMatch {
  path: string;
  match: SearchMatchKind;
  /** Matched text: the node name, the value as text, or the reference path */
  text: string;
}

const MATCH_ORDER: Record<SearchMatchKind, number> = { name: 0, value: 1, ref: 2 };

/**
 * Search a subtree. Results are ordered by path, then match kind.
 * The root's own name is never matched.
 */
export function searchTree(root: DomNode, query: string): SearchMatch[] {
  const needle = query.toLowerCase();
  if (needle.length === 0) return [];

  const matches: SearchMatch[] = [];
  walk(root, (node, path) => {
    if (node !== root && node.name.toLowerCase().includes(needle)) {
      matches.push({ path, match: 'name', text: node.name });
    }
    if (node.kind === 'value') {
      const text = String(node.value);
      if (text.toLowerCase().includes(needle)) {
        matches.push({ path, match: 'value', text });
      }
    } else if (node.kind === 'ref' && node.refPath.toLowerCase().includes(needle)) {
      matches.push({ path, match: 'ref', text: node.refPath });
    }
  }, '/');

  return matches.sort((a, b) => {
    if (a.path !== b.path) return a.path < b.path ? -1 : 1;
    return MATCH_ORDER[a.match] - MATCH_ORDER[b.match];
  });
}
