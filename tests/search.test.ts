// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { searchTree } from '../src/dom/search.js';
import { objectTree } from './helpers/trees.js';

describe('searchTree', () => {
  const root = objectTree({
    database: { host: 'db.internal', port: 5432 },
    cache: { host: { $ref: '/database/host' } },
    hosts: ['web1', 'WEB2'],
  });

  it('matches names, values and reference paths case-insensitively', () => {
    expect(searchTree(root, 'HOST')).toEqual([
      { path: '/cache/host', match: 'name', text: 'host' },
      { path: '/cache/host', match: 'ref', text: '/database/host' },
      { path: '/database/host', match: 'name', text: 'host' },
      { path: '/hosts', match: 'name', text: 'hosts' },
    ]);
  });

  it('matches scalar values as text', () => {
    expect(searchTree(root, 'web')).toEqual([
      { path: '/hosts/0', match: 'value', text: 'web1' },
      { path: '/hosts/1', match: 'value', text: 'WEB2' },
    ]);
    expect(searchTree(root, '543')).toEqual([{ path: '/database/port', match: 'value', text: '5432' }]);
  });

  it('returns nothing for an empty query', () => {
    expect(searchTree(root, '')).toEqual([]);
  });
});
