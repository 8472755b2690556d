// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import {
  CascadingProvider,
  MemorySourceLoader,
  MountRegistry,
  StaticDomProvider,
  exportNode,
  parseRaw,
  s,
  ObjectNode,
} from '../src/index.js';

describe('public API', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads, merges, resolves, validates and queries a configuration', async () => {
    const loader = new MemorySourceLoader(new Map([
      ['base', [
        { id: 'server.yaml', text: 'host: localhost\nport: 8080\n' },
        { id: 'database.json', text: '{ "host": { "$ref": "/shared/dbHost" }, "pool": 4 }' },
      ]],
      ['site', [{ id: 'server.json5', text: '{ port: 70000 }' }]],
    ]));
    const shared = parseRaw({ dbHost: 'db.internal' });
    if (!(shared instanceof ObjectNode)) throw new Error('expected an object');

    const registry = new MountRegistry({
      schemas: () => new Map([
        ['/app', s.object({
          server: s.object({ host: s.string(), port: s.integer({ min: 1, max: 65535 }) }),
          database: s.object({ host: s.string(), pool: s.integer() }),
        })],
      ]),
    });
    registry.register('/app', new CascadingProvider(
      [{ name: 'base', index: 0, source: 'memory' }, { name: 'site', index: 1, source: 'memory' }],
      loader
    ));
    registry.register('/shared', new StaticDomProvider(shared));

    const { snapshot } = await registry.refresh();

    expect(snapshot?.diagnostics.map((d) => [d.path, d.kind])).toEqual([
      ['/app/server/port', 'RangeViolation'],
    ]);
    expect(snapshot && exportNode(snapshot.root)).toEqual({
      app: {
        server: { host: 'localhost', port: 70000 },
        database: { host: 'db.internal', pool: 4 },
      },
      shared: { dbHost: 'db.internal' },
    });
    expect(registry.query().get('/app/database', z.object({ host: z.string(), pool: z.number() }))).toEqual({
      host: 'db.internal',
      pool: 4,
    });
  });
});
