// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Schema Document Loader
 *
 * Reads schemas written as data (YAML or JSON) and turns them into schema
 * trees keyed by mount path.
 *
 * @example
 * mounts:
 *   /server:
 *     type: object
 *     properties:
 *       host: { type: string }
 *       port: { type: integer, min: 1, max: 65535 }
 *       tags: { type: array, items: { type: string }, required: false }
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { RawValue } from '../dom/nodes.js';
import { joinPath, splitPath } from '../dom/tree.js';
import { ProjectFileError } from '../errors.js';
import { formatFromId, parseText, SourceParseError } from '../io/parser.js';
import type { PropertySchema, SchemaMap, SchemaNode, ValueType } from './types.js';

interface SchemaDocNode {
  type: 'object' | 'array' | ValueType;
  description?: string;
  required?: boolean;
  default?: RawValue;
  nullable?: boolean;
  properties?: Record<string, SchemaDocNode>;
  additionalProperties?: SchemaDocNode;
  items?: SchemaDocNode;
  minItems?: number;
  maxItems?: number;
  min?: number;
  max?: number;
  pattern?: string;
  enum?: Array<string | number | boolean | null>;
}

const rawValueSchema: z.ZodType<RawValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(rawValueSchema), z.record(rawValueSchema)])
);

const schemaDocNode: z.ZodType<SchemaDocNode> = z.lazy(() =>
  z
    .object({
      type: z.enum(['object', 'array', 'string', 'number', 'integer', 'boolean', 'any']),
      description: z.string().optional(),
      required: z.boolean().optional(),
      default: rawValueSchema.optional(),
      nullable: z.boolean().optional(),
      properties: z.record(schemaDocNode).optional(),
      additionalProperties: schemaDocNode.optional(),
      items: schemaDocNode.optional(),
      minItems: z.number().int().nonnegative().optional(),
      maxItems: z.number().int().nonnegative().optional(),
      min: z.number().optional(),
      max: z.number().optional(),
      pattern: z.string().optional(),
      enum: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
    })
    .strict()
);

const schemaDocument = z
  .object({
    mounts: z.record(schemaDocNode),
  })
  .strict();

function toSchemaNode(doc: SchemaDocNode, where: string, filePath: string): SchemaNode {
  switch (doc.type) {
    case 'object': {
      const properties: Record<string, PropertySchema> = {};
      for (const [name, child] of Object.entries(doc.properties ?? {})) {
        const property: PropertySchema = {
          required: child.required ?? (child.default === undefined),
          schema: toSchemaNode(child, `${where}.${name}`, filePath),
        };
        if (child.default !== undefined) property.default = child.default;
        properties[name] = property;
      }
      return {
        kind: 'object',
        properties,
        ...(doc.additionalProperties && {
          additionalProperties: toSchemaNode(doc.additionalProperties, `${where}.*`, filePath),
        }),
        ...(doc.description !== undefined && { description: doc.description }),
      };
    }
    case 'array':
      if (!doc.items) {
        throw new ProjectFileError(`Array schema at ${where} needs "items"`, filePath);
      }
      return {
        kind: 'array',
        items: toSchemaNode(doc.items, `${where}[]`, filePath),
        ...(doc.minItems !== undefined && { minItems: doc.minItems }),
        ...(doc.maxItems !== undefined && { maxItems: doc.maxItems }),
        ...(doc.description !== undefined && { description: doc.description }),
      };
    default:
      return {
        kind: 'value',
        type: doc.type,
        ...(doc.nullable !== undefined && { nullable: doc.nullable }),
        ...(doc.min !== undefined && { min: doc.min }),
        ...(doc.max !== undefined && { max: doc.max }),
        ...(doc.pattern !== undefined && { pattern: doc.pattern }),
        ...(doc.enum !== undefined && { allowedValues: doc.enum }),
        ...(doc.description !== undefined && { description: doc.description }),
      };
  }
}

/**
 * Convert a parsed schema document into schemas keyed by mount path.
 * @throws ProjectFileError if the document is malformed
 */
export function parseSchemaDocument(raw: unknown, filePath: string = '<inline>'): SchemaMap {
  const result = schemaDocument.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProjectFileError(`Invalid schema document ${filePath}: ${details}`, filePath);
  }

  const schemas = new Map<string, SchemaNode>();
  for (const [mountPath, doc] of Object.entries(result.data.mounts)) {
    schemas.set(joinPath(splitPath(mountPath)), toSchemaNode(doc, mountPath, filePath));
  }
  return schemas;
}

/**
 * Read and convert a schema document (.json, .json5, .yaml or .yml).
 */
export async function loadSchemaFile(filePath: string): Promise<SchemaMap> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ProjectFileError(`Cannot read schema file ${filePath}: ${message}`, filePath);
  }

  let raw: unknown;
  try {
    raw = parseText(text, formatFromId(filePath));
  } catch (error) {
    if (error instanceof SourceParseError) {
      throw new ProjectFileError(`Invalid schema file ${filePath}: ${error.message}`, filePath);
    }
    throw error;
  }
  return parseSchemaDocument(raw, filePath);
}
