// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ValueNode } from '../src/dom/nodes.js';
import { exportNode, findNode, treesEqual } from '../src/dom/tree.js';
import { Severity } from '../src/errors.js';
import { ReferenceResolver, resolveReferences } from '../src/refs/resolver.js';
import { objectTree } from './helpers/trees.js';

describe('resolveReferences', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('replaces a reference with its target value', () => {
    const root = objectTree({
      shared: { defaultHost: 'x.example.com' },
      env: { host: { $ref: '/shared/defaultHost' } },
    });

    const result = resolveReferences(root);

    expect(result.diagnostics).toEqual([]);
    expect(result.resolved).toBe(1);
    expect(exportNode(result.root)).toEqual({
      shared: { defaultHost: 'x.example.com' },
      env: { host: 'x.example.com' },
    });
  });

  it('leaves the input tree untouched', () => {
    const root = objectTree({ a: 1, b: { $ref: '/a' } });
    resolveReferences(root);
    expect(exportNode(root)).toEqual({ a: 1, b: { $ref: '/a' } });
  });

  it('follows chains of references', () => {
    const root = objectTree({ a: { $ref: '/b' }, b: { $ref: '/c' }, c: 'end' });
    const result = resolveReferences(root);
    expect(exportNode(result.root)).toEqual({ a: 'end', b: 'end', c: 'end' });
    expect(result.resolved).toBe(2);
  });

  it('resolves references nested inside a referenced subtree', () => {
    const root = objectTree({
      defaults: { port: 80 },
      template: { port: { $ref: '/defaults/port' }, tls: false },
      service: { $ref: '/template' },
    });
    const result = resolveReferences(root);
    expect(exportNode(result.root)).toEqual({
      defaults: { port: 80 },
      template: { port: 80, tls: false },
      service: { port: 80, tls: false },
    });
  });

  it('gives every reference an independent copy', () => {
    const root = objectTree({ shared: { n: 1 }, a: { $ref: '/shared' }, b: { $ref: '/shared' } });
    const result = resolveReferences(root);

    const leaf = findNode(result.root, '/a/n');
    if (!(leaf instanceof ValueNode)) throw new Error('expected a value');
    leaf.setValue(2);

    expect(exportNode(result.root)).toEqual({ shared: { n: 1 }, a: { n: 2 }, b: { n: 1 } });
  });

  it('resolves references inside arrays', () => {
    const root = objectTree({ hosts: ['a', { $ref: '/primary' }], primary: 'b' });
    const result = resolveReferences(root);
    expect(exportNode(result.root)).toEqual({ hosts: ['a', 'b'], primary: 'b' });
  });

  it('reports a missing target and keeps the marker', () => {
    const root = objectTree({ a: { $ref: '/nowhere' }, b: 1 });
    const result = resolveReferences(root);

    expect(exportNode(result.root)).toEqual({ a: { $ref: '/nowhere' }, b: 1 });
    expect(result.diagnostics).toEqual([
      {
        path: '/a',
        kind: 'UnresolvedReference',
        message: 'Target "/nowhere" does not exist',
        severity: Severity.ERROR,
      },
    ]);
  });

  it('reports both ends of a two-node cycle', () => {
    const root = objectTree({ a: { $ref: '/b' }, b: { $ref: '/a' }, ok: 1 });
    const result = resolveReferences(root);

    expect(exportNode(result.root)).toEqual({ a: { $ref: '/b' }, b: { $ref: '/a' }, ok: 1 });
    expect(result.diagnostics).toEqual([
      {
        path: '/a',
        kind: 'ReferenceCycle',
        message: 'Reference cycle: /a → /b → /a',
        severity: Severity.ERROR,
      },
      {
        path: '/b',
        kind: 'ReferenceCycle',
        message: 'Target "/a" is part of a reference cycle',
        severity: Severity.ERROR,
      },
    ]);
    expect(result.resolved).toBe(0);
  });

  it('treats a reference to its own ancestor as a cycle', () => {
    const root = objectTree({ a: { inner: { $ref: '/a' } } });
    const result = resolveReferences(root);

    expect(result.diagnostics).toEqual([
      {
        path: '/a/inner',
        kind: 'ReferenceCycle',
        message: 'Reference cycle: /a/inner → /a/inner',
        severity: Severity.ERROR,
      },
    ]);
    expect(exportNode(result.root)).toEqual({ a: { inner: { $ref: '/a' } } });
  });

  it('reports a reference whose target failed', () => {
    const root = objectTree({ a: { $ref: '/b' }, b: { $ref: '/missing' } });
    const result = resolveReferences(root);
    expect(result.diagnostics.map((d) => [d.path, d.kind, d.message])).toEqual([
      ['/a', 'UnresolvedReference', 'Target "/b" could not be resolved'],
      ['/b', 'UnresolvedReference', 'Target "/missing" does not exist'],
    ]);
  });

  it('resolves a target path that passes through another reference, whatever the key order', () => {
    const first = resolveReferences(objectTree({ a: { $ref: '/b/c' }, b: { $ref: '/d' }, d: { c: 1 } }));
    const second = resolveReferences(objectTree({ b: { $ref: '/d' }, a: { $ref: '/b/c' }, d: { c: 1 } }));

    for (const result of [first, second]) {
      expect(result.diagnostics).toEqual([]);
      expect(result.resolved).toBe(2);
      expect(exportNode(result.root)).toEqual({ a: 1, b: { c: 1 }, d: { c: 1 } });
    }
  });

  it('fails a reference whose path runs through a broken reference', () => {
    const root = objectTree({ a: { $ref: '/b/c' }, b: { $ref: '/gone' } });
    const result = resolveReferences(root);
    expect(result.diagnostics.map((d) => [d.path, d.kind, d.message])).toEqual([
      ['/a', 'UnresolvedReference', 'Target "/b/c" could not be resolved'],
      ['/b', 'UnresolvedReference', 'Target "/gone" does not exist'],
    ]);
  });

  it('reports a reference into its own target path as a cycle', () => {
    const result = resolveReferences(objectTree({ a: { $ref: '/a/x' } }));
    expect(result.diagnostics.map((d) => [d.path, d.kind, d.message])).toEqual([
      ['/a', 'ReferenceCycle', 'Reference cycle: /a → /a'],
    ]);
    expect(exportNode(result.root)).toEqual({ a: { $ref: '/a/x' } });
  });

  it('is idempotent on a tree without references', () => {
    const root = objectTree({ a: { b: [1, 2] }, c: null });
    const result = resolveReferences(root);
    expect(result.diagnostics).toEqual([]);
    expect(result.resolved).toBe(0);
    expect(treesEqual(result.root, root)).toBe(true);
    expect(treesEqual(resolveReferences(result.root).root, result.root)).toBe(true);
  });
});

describe('ReferenceResolver.resolveAt', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves a single location on demand', () => {
    const resolver = new ReferenceResolver(objectTree({ a: { $ref: '/b' }, b: { v: 1 } }));
    const resolution = resolver.resolveAt('/a');
    expect(resolution.ok).toBe(true);
    expect(resolution.ok && exportNode(resolution.node)).toEqual({ v: 1 });
  });

  it('follows references along the requested path', () => {
    const resolver = new ReferenceResolver(objectTree({ a: { $ref: '/d' }, d: { c: 1 } }));
    const resolution = resolver.resolveAt('/a/c');
    expect(resolution.ok && exportNode(resolution.node)).toBe(1);
  });

  it('reports a missing location', () => {
    const resolver = new ReferenceResolver(objectTree({}));
    expect(resolver.resolveAt('/x')).toEqual({
      ok: false,
      reason: 'missing',
      message: 'Nothing exists at "/x"',
    });
  });

  it('reports each failing location once', () => {
    const resolver = new ReferenceResolver(objectTree({ a: { $ref: '/gone' } }));
    resolver.resolveAt('/a');
    resolver.resolveAt('/a');
    expect(resolver.getDiagnostics()).toHaveLength(1);
  });
});
