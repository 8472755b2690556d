// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProjectFileError } from '../src/errors.js';
import { loadProjectFile, parseProjectFile } from '../src/io/project.js';

const FILE = '/work/strata.cascade.json5';

function layers(...names: string[]) {
  return { layers: names.map((name) => ({ name, folder: name })) };
}

describe('parseProjectFile', () => {
  it('builds sorted mounts with absolute layer folders', () => {
    const project = parseProjectFile({
      mounts: {
        'db': { layers: [{ name: 'base', folder: 'db' }] },
        '/app/': {
          layers: [
            { name: 'base', folder: 'app/base' },
            { name: 'prod', folder: 'app/prod' },
          ],
        },
      },
      schema: 'schemas.yaml',
    }, FILE);

    expect(project).toEqual({
      filePath: FILE,
      mounts: [
        {
          path: '/app',
          layers: [
            { name: 'base', index: 0, source: '/work/app/base' },
            { name: 'prod', index: 1, source: '/work/app/prod' },
          ],
        },
        { path: '/db', layers: [{ name: 'base', index: 0, source: '/work/db' }] },
      ],
      schemaFile: '/work/schemas.yaml',
    });
  });

  it('leaves the schema file out when none is named', () => {
    const project = parseProjectFile({ mounts: { '/a': layers('base') } }, FILE);
    expect(project.schemaFile).toBeUndefined();
  });

  it('rejects a mount at the root', () => {
    expect(() => parseProjectFile({ mounts: { '/': layers('base') } }, FILE)).toThrow(
      'Mount path "/" must not be the root'
    );
  });

  it('rejects nested and duplicate mounts', () => {
    expect(() => parseProjectFile({ mounts: { '/app': layers('a'), '/app/db': layers('b') } }, FILE)).toThrow(
      'Mount "/app/db" overlaps mount "/app"'
    );
    expect(() => parseProjectFile({ mounts: { '/app': layers('a'), 'app/': layers('b') } }, FILE)).toThrow(
      'Mount "/app" overlaps mount "/app"'
    );
  });

  it('rejects duplicate layer names within a mount', () => {
    expect(() => parseProjectFile({ mounts: { '/app': layers('base', 'base') } }, FILE)).toThrow(
      'Duplicate layer name "base" in mount "/app"'
    );
  });

  it('rejects a malformed document', () => {
    expect(() => parseProjectFile({ mounts: { '/a': { layers: [] } } }, FILE)).toThrow(ProjectFileError);
    expect(() => parseProjectFile({ mounts: { '/a': { layers: [] } } }, FILE)).toThrow(
      /^Invalid project file \/work\/strata\.cascade\.json5: mounts\.\/a\.layers: /
    );
  });
});

describe('loadProjectFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'strata-project-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a JSON5 project file relative to its folder', async () => {
    const file = path.join(dir, 'strata.cascade.json5');
    fs.writeFileSync(file, `{
      // lowest precedence first
      mounts: {
        '/app': { layers: [{ name: 'base', folder: 'layers/base' }] },
      },
    }`);

    const project = await loadProjectFile(file);
    expect(project.mounts).toEqual([
      { path: '/app', layers: [{ name: 'base', index: 0, source: path.join(dir, 'layers/base') }] },
    ]);
  });

  it('reports a missing or unparsable file', async () => {
    const missing = path.join(dir, 'missing.json5');
    await expect(loadProjectFile(missing)).rejects.toThrow(`Cannot read project file ${missing}: `);

    const broken = path.join(dir, 'broken.json5');
    fs.writeFileSync(broken, '{ mounts: ');
    await expect(loadProjectFile(broken)).rejects.toThrow(`Invalid project file ${broken}: `);
  });
});
