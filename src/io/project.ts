// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Cascade Project File
 *
 * A JSON5 document naming, per mount path, the layer folders of one cascade
 * in ascending precedence.
 *
 * @example
 * {
 *   // lowest precedence first
 *   mounts: {
 *     "/app": { layers: [{ name: "base", folder: "app/base" }, { name: "prod", folder: "app/prod" }] },
 *   },
 *   schema: "schemas.yaml",
 * }
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import JSON5 from 'json5';
import { z } from 'zod';
import type { LayerDefinition } from '../cascade/types.js';
import { joinPath, splitPath } from '../dom/tree.js';
import { ProjectFileError } from '../errors.js';

const layerEntrySchema = z
  .object({
    name: z.string().min(1),
    folder: z.string().min(1),
  })
  .strict();

const mountEntrySchema = z
  .object({
    layers: z.array(layerEntrySchema).min(1),
  })
  .strict();

const projectFileSchema = z
  .object({
    mounts: z.record(mountEntrySchema),
    schema: z.string().min(1).optional(),
  })
  .strict();

export type ProjectFileDocument = z.infer<typeof projectFileSchema>;

export interface MountDefinition {
  /** Normalized absolute mount path */
  path: string;
  /** Layer definitions in ascending precedence; `source` is an absolute folder */
  layers: LayerDefinition[];
}

export interface ProjectFile {
  filePath: string;
  /** Sorted by mount path */
  mounts: MountDefinition[];
  /** Absolute path of the schema document, when the project names one */
  schemaFile?: string;
}

function nestedIn(child: string, parent: string): boolean {
  return child.startsWith(parent + '/');
}

/**
 * Validate an already parsed project document.
 * @throws ProjectFileError
 */
export function parseProjectFile(raw: unknown, filePath: string): ProjectFile {
  const result = projectFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProjectFileError(`Invalid project file ${filePath}: ${details}`, filePath);
  }

  const baseDir = path.dirname(path.resolve(filePath));
  const mounts: MountDefinition[] = [];

  for (const [rawPath, entry] of Object.entries(result.data.mounts)) {
    const mountPath = joinPath(splitPath(rawPath));
    if (mountPath === '/') {
      throw new ProjectFileError(`Mount path "${rawPath}" must not be the root`, filePath);
    }
    const clash = mounts.find(
      (m) => m.path === mountPath || nestedIn(m.path, mountPath) || nestedIn(mountPath, m.path)
    );
    if (clash) {
      throw new ProjectFileError(`Mount "${mountPath}" overlaps mount "${clash.path}"`, filePath);
    }

    const seen = new Set<string>();
    const layers = entry.layers.map((layer, index): LayerDefinition => {
      if (seen.has(layer.name)) {
        throw new ProjectFileError(`Duplicate layer name "${layer.name}" in mount "${mountPath}"`, filePath);
      }
      seen.add(layer.name);
      return { name: layer.name, index, source: path.resolve(baseDir, layer.folder) };
    });
    mounts.push({ path: mountPath, layers });
  }

  mounts.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const project: ProjectFile = { filePath, mounts };
  if (result.data.schema !== undefined) {
    project.schemaFile = path.resolve(baseDir, result.data.schema);
  }
  return project;
}

/**
 * Read and validate a project file.
 * @throws ProjectFileError
 */
export async function loadProjectFile(filePath: string): Promise<ProjectFile> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ProjectFileError(`Cannot read project file ${filePath}: ${message}`, filePath);
  }

  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ProjectFileError(`Invalid project file ${filePath}: ${message}`, filePath);
  }
  return parseProjectFile(raw, filePath);
}
