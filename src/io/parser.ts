// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Parser / Serializer
 *
 * Converts text to the raw hierarchical representation (JSON5 or YAML) and
 * raw values to DOM trees. The only wire convention imposed on raw data:
 * an object whose single key is the reference key is a reference.
 */

import JSON5 from 'json5';
import * as yaml from 'js-yaml';
import * as path from 'path';
import { CLI_CONFIG, DOM_CONFIG } from '../constants.js';
import {
  ArrayNode,
  ObjectNode,
  RefNode,
  ValueNode,
  type DomNode,
  type RawValue,
} from '../dom/nodes.js';
import { exportNode, type ExportOptions } from '../dom/tree.js';

/**
 * Text formats understood by the boundary.
 */
export type SourceFormat = 'json' | 'json5' | 'yaml';

export interface ParseOptions {
  /** Key that marks a reference object (default "$ref") */
  refKey?: string;
}

/**
 * Malformed raw input. Callers turn this into a LoadError diagnostic for
 * the offending source unit.
 */
export class SourceParseError extends Error {
  constructor(
    message: string,
    public readonly location: string
  ) {
    super(location ? `${message} at ${location}` : message);
    this.name = 'SourceParseError';
  }
}

/**
 * Infer the text format from a unit identifier's extension.
 */
export function formatFromId(id: string): SourceFormat {
  switch (path.extname(id).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.json5':
      return 'json5';
    default:
      return 'json';
  }
}

/**
 * Parse text into an untyped raw value.
 * JSON is read with the JSON5 parser so that commented (.jsonc style)
 * files load too.
 */
export function parseText(text: string, format: SourceFormat): unknown {
  try {
    if (format === 'yaml') {
      return yaml.load(text, { schema: yaml.JSON_SCHEMA });
    }
    return JSON5.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceParseError(`Invalid ${format}: ${message}`, '');
  }
}

/**
 * Render a raw value as text.
 */
export function formatText(raw: RawValue, format: SourceFormat): string {
  switch (format) {
    case 'yaml':
      return yaml.dump(raw, { noRefs: true, lineWidth: -1 });
    case 'json5':
      return JSON5.stringify(raw, null, CLI_CONFIG.JSON_INDENT) + '\n';
    case 'json':
      return JSON.stringify(raw, null, CLI_CONFIG.JSON_INDENT) + '\n';
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeType(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value instanceof Date) return 'date';
  return typeof value;
}

function parseValue(raw: unknown, name: string, location: string, refKey: string): DomNode {
  if (raw === null || typeof raw === 'string' || typeof raw === 'boolean') {
    return new ValueNode(name, raw);
  }
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new SourceParseError(`Non-finite number ${raw}`, location || '/');
    }
    return new ValueNode(name, raw);
  }
  if (Array.isArray(raw)) {
    const array = new ArrayNode(name);
    raw.forEach((item, index) => {
      array.append(parseValue(item, String(index), `${location}/${index}`, refKey));
    });
    return array;
  }
  if (isPlainObject(raw)) {
    const keys = Object.keys(raw);
    if (keys.length === 1 && keys[0] === refKey) {
      const target = raw[refKey];
      if (typeof target !== 'string' || target.trim() === '') {
        throw new SourceParseError(`"${refKey}" must be a non-empty string`, location || '/');
      }
      return new RefNode(name, target);
    }
    const object = new ObjectNode(name);
    for (const key of keys) {
      object.addChild(parseValue(raw[key], key, `${location}/${key}`, refKey));
    }
    return object;
  }
  throw new SourceParseError(`Unsupported value of type ${describeType(raw)}`, location || '/');
}

/**
 * Build a DOM tree from a raw value.
 * @throws SourceParseError for values with no DOM counterpart
 */
export function parseRaw(raw: unknown, options: ParseOptions = {}, name: string = DOM_CONFIG.ROOT_NAME): DomNode {
  return parseValue(raw, name, '', options.refKey ?? DOM_CONFIG.REF_KEY);
}

/**
 * Parse text straight into a DOM tree.
 */
export function parseSource(text: string, format: SourceFormat, options: ParseOptions = {}): DomNode {
  const raw = parseText(text, format);
  if (raw === undefined) {
    throw new SourceParseError('Empty document', '');
  }
  return parseRaw(raw, options);
}

/**
 * Serialize a DOM subtree to text. References stay as markers.
 */
export function serialize(node: DomNode, format: SourceFormat, options: ExportOptions = {}): string {
  return formatText(exportNode(node, options), format);
}
