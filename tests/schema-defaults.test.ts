// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { exportNode } from '../src/dom/tree.js';
import { applySchemaDefaults } from '../src/schema/defaults.js';
import { s } from '../src/schema/types.js';
import { objectTree } from './helpers/trees.js';

const schema = s.object({
  server: s.object({
    host: s.string(),
    port: s.optional(s.integer(), 8080),
    tls: s.optional(s.object({ enabled: s.optional(s.boolean(), false) })),
  }),
});

describe('applySchemaDefaults', () => {
  it('fills absent properties that declare a default', () => {
    const result = applySchemaDefaults(objectTree({ server: { host: 'a' } }), schema);
    expect(exportNode(result.root)).toEqual({ server: { host: 'a', port: 8080 } });
    expect(result.applied).toEqual(['/server/port']);
  });

  it('keeps values that are already present', () => {
    const result = applySchemaDefaults(objectTree({ server: { host: 'a', port: 9090 } }), schema);
    expect(exportNode(result.root)).toEqual({ server: { host: 'a', port: 9090 } });
    expect(result.applied).toEqual([]);
  });

  it('descends into present objects only', () => {
    const result = applySchemaDefaults(objectTree({ server: { host: 'a', tls: {} } }), schema);
    expect(exportNode(result.root)).toEqual({ server: { host: 'a', tls: { enabled: false }, port: 8080 } });
    expect(result.applied).toEqual(['/server/port', '/server/tls/enabled']);
  });

  it('adds structured defaults', () => {
    const withObject = s.object({ limits: s.optional(s.object({}, { additionalProperties: s.integer() }), { cpu: 2 }) });
    const result = applySchemaDefaults(objectTree({}), withObject);
    expect(exportNode(result.root)).toEqual({ limits: { cpu: 2 } });
  });

  it('fills defaults inside array items and dictionary entries', () => {
    const items = s.object({
      list: s.array(s.object({ weight: s.optional(s.integer(), 1) })),
      pools: s.object({}, { additionalProperties: s.object({ size: s.optional(s.integer(), 4) }) }),
    });
    const result = applySchemaDefaults(
      objectTree({ list: [{}, { weight: 5 }], pools: { main: {} } }),
      items
    );
    expect(exportNode(result.root)).toEqual({
      list: [{ weight: 1 }, { weight: 5 }],
      pools: { main: { size: 4 } },
    });
    expect(result.applied).toEqual(['/list/0/weight', '/pools/main/size']);
  });

  it('works on a subtree and leaves the input untouched', () => {
    const root = objectTree({ app: { server: { host: 'a' } } });
    const result = applySchemaDefaults(root, schema, '/app');
    expect(result.applied).toEqual(['/app/server/port']);
    expect(exportNode(root)).toEqual({ app: { server: { host: 'a' } } });
  });

  it('does nothing when the path is absent or the shape differs', () => {
    expect(applySchemaDefaults(objectTree({}), schema, '/missing').applied).toEqual([]);
    expect(applySchemaDefaults(objectTree({ server: 'x' }), schema).applied).toEqual([]);
  });
});
