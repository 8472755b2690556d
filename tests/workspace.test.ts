// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { openWorkspace, Workspace } from '../src/cli/workspace.js';
import { DEFAULT_CONFIG } from '../src/config/merger.js';
import type { ResolvedConfig } from '../src/config/types.js';
import { exportNode } from '../src/dom/tree.js';
import { ProjectFileError } from '../src/errors.js';
import type { ProjectFile } from '../src/io/project.js';
import { MemorySourceLoader } from '../src/io/source-loader.js';
import { definition } from './helpers/trees.js';

const project: ProjectFile = {
  filePath: '/work/strata.cascade.json5',
  mounts: [
    { path: '/app', layers: [definition('base', 0), definition('prod', 1)] },
    { path: '/db', layers: [definition('db-base', 0)] },
  ],
};

const loader = new MemorySourceLoader(new Map([
  ['base', [{ id: 'server.json', text: '{ "port": 80, "host": "a", "timeout": 5 }' }]],
  ['prod', [{ id: 'server.json', text: '{ "port": 443, "timeOut": 10 }' }]],
  ['db-base', [{ id: 'primary.yaml', text: 'host: db1\n' }]],
]));

function config(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

describe('Workspace', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('mounts one cascade per project mount', async () => {
    const workspace = new Workspace(project, config(), loader);
    const { snapshot } = await workspace.registry.refresh();

    expect(snapshot && exportNode(snapshot.root)).toEqual({
      app: { server: { port: 443, host: 'a', timeout: 5, timeOut: 10 } },
      db: { primary: { host: 'db1' } },
    });
    expect(snapshot?.diagnostics).toEqual([]);
  });

  it('finds the mount containing a path', () => {
    const workspace = new Workspace(project, config(), loader);
    expect(workspace.mountFor('/app/server/port')).toBe('/app');
    expect(workspace.mountFor('/db')).toBe('/db');
    expect(workspace.mountFor('/application')).toBeUndefined();
  });

  it('has no origins before the first refresh', () => {
    const workspace = new Workspace(project, config(), loader);
    expect(workspace.originOf('/app/server/port')).toBeUndefined();
    expect(workspace.integrityDiagnostics()).toEqual([]);
  });

  it('reports the layers behind a path', async () => {
    const workspace = new Workspace(project, config(), loader);
    await workspace.registry.refresh();

    expect(workspace.originOf('/app/server/port')).toEqual({
      path: '/app/server/port',
      mount: '/app',
      winner: 'prod',
      contributors: ['base', 'prod'],
    });
    expect(workspace.originOf('/app/server/host')?.winner).toBe('base');
    expect(workspace.originOf('/app/server/missing')).toBeUndefined();
    expect(workspace.originOf('/elsewhere')).toBeUndefined();
  });

  it('stops each cascade at the named layer', async () => {
    const workspace = new Workspace(project, config({ upToLayer: 'base' }), loader);
    const { snapshot } = await workspace.registry.refresh();

    expect(snapshot && exportNode(snapshot.root)).toEqual({
      app: { server: { port: 80, host: 'a', timeout: 5 } },
      db: { primary: { host: 'db1' } },
    });
  });

  it('rejects a layer name no mount has', () => {
    expect(() => new Workspace(project, config({ upToLayer: 'staging' }), loader)).toThrow(ProjectFileError);
    expect(() => new Workspace(project, config({ upToLayer: 'staging' }), loader)).toThrow(
      'No mount has a layer named "staging"'
    );
  });

  it('rebases integrity warnings under the mount', async () => {
    const workspace = new Workspace(project, config(), loader);
    await workspace.registry.refresh();

    expect(workspace.integrityDiagnostics().map((d) => [d.path, d.kind, d.source])).toEqual([
      ['/app/server/timeOut', 'IntegrityWarning', 'prod'],
    ]);
  });
});

describe('openWorkspace', () => {
  let dir: string;

  function writeFile(relative: string, content: string): void {
    const file = path.join(dir, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'strata-workspace-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('loads the project, its layer folders and its schema document', async () => {
    writeFile('strata.cascade.json5', `{
      mounts: {
        '/app': { layers: [{ name: 'base', folder: 'app/base' }, { name: 'prod', folder: 'app/prod' }] },
      },
      schema: 'schemas.yaml',
    }`);
    writeFile('app/base/server.json', '{ "host": "a", "port": 80 }');
    writeFile('app/prod/server.yaml', 'port: 443\n');
    writeFile('schemas.yaml', [
      'mounts:',
      '  /app:',
      '    type: object',
      '    properties:',
      '      server:',
      '        type: object',
      '        properties:',
      '          port: { type: integer, max: 100 }',
      '',
    ].join('\n'));

    const workspace = await openWorkspace(config(), dir);
    const { snapshot } = await workspace.registry.refresh();

    expect(snapshot && exportNode(snapshot.root)).toEqual({ app: { server: { host: 'a', port: 443 } } });
    expect(snapshot?.diagnostics.map((d) => [d.path, d.kind, d.message])).toEqual([
      ['/app/server/port', 'RangeViolation', 'Value 443 is above the maximum 100'],
    ]);
  });

  it('reads the schema document again after a failed read', async () => {
    writeFile('strata.cascade.json5', `{
      mounts: { '/app': { layers: [{ name: 'base', folder: 'app/base' }] } },
      schema: 'schemas.yaml',
    }`);
    writeFile('app/base/server.json', '{ "port": 443 }');

    const workspace = await openWorkspace(config(), dir);
    const first = await workspace.registry.refresh();
    expect(first.snapshot?.diagnostics.map((d) => [d.path, d.kind])).toEqual([['/', 'LoadError']]);
    expect(first.snapshot && exportNode(first.snapshot.root)).toEqual({ app: { server: { port: 443 } } });

    writeFile('schemas.yaml', [
      'mounts:',
      '  /app:',
      '    type: object',
      '    properties:',
      '      server:',
      '        type: object',
      '        properties:',
      '          port: { type: integer, max: 100 }',
      '',
    ].join('\n'));
    const second = await workspace.registry.refresh();

    expect(second.snapshot?.diagnostics.map((d) => [d.path, d.kind, d.message])).toEqual([
      ['/app/server/port', 'RangeViolation', 'Value 443 is above the maximum 100'],
    ]);
  });

  it('reports a missing layer folder under its mount', async () => {
    writeFile('strata.cascade.json5', `{ mounts: { '/app': { layers: [{ name: 'base', folder: 'nowhere' }] } } }`);

    const workspace = await openWorkspace(config(), dir);
    const { snapshot } = await workspace.registry.refresh();

    expect(snapshot?.diagnostics).toEqual([
      expect.objectContaining({
        path: '/app',
        kind: 'LoadError',
        message: `Layer folder "${path.join(dir, 'nowhere')}" does not exist`,
      }),
    ]);
  });

  it('fails when the project file is missing', async () => {
    await expect(openWorkspace(config(), dir)).rejects.toThrow(ProjectFileError);
  });
});
