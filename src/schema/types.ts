// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Schema Types
 *
 * Declarative schema trees that mirror the DOM shape, and the builder
 * helpers used to write them in code.
 */

import type { RawValue, Scalar } from '../dom/nodes.js';

/**
 * Scalar types a value schema can require.
 */
export type ValueType = 'string' | 'number' | 'integer' | 'boolean' | 'any';

export interface ValueSchema {
  kind: 'value';
  type: ValueType;
  /** Allow null in addition to the declared type */
  nullable?: boolean;
  /** Inclusive lower bound for numbers */
  min?: number;
  /** Inclusive upper bound for numbers */
  max?: number;
  /** Regular expression strings must match */
  pattern?: string;
  /** Permitted values; strings compare case-insensitively */
  allowedValues?: readonly Scalar[];
  description?: string;
}

export interface ArraySchema {
  kind: 'array';
  items: SchemaNode;
  minItems?: number;
  maxItems?: number;
  description?: string;
}

export interface PropertySchema {
  required: boolean;
  schema: SchemaNode;
  /** Filled in by applySchemaDefaults when the property is absent */
  default?: RawValue;
}

export interface ObjectSchema {
  kind: 'object';
  properties: Readonly<Record<string, PropertySchema>>;
  /** Schema for keys not listed in properties (dictionary-style objects) */
  additionalProperties?: SchemaNode;
  description?: string;
}

export type SchemaNode = ObjectSchema | ArraySchema | ValueSchema;

/**
 * Schemas keyed by mount path.
 */
export type SchemaMap = ReadonlyMap<string, SchemaNode>;

type ValueOptions = Omit<ValueSchema, 'kind' | 'type'>;

/**
 * Property entry accepted by s.object: a bare schema is required.
 */
export type PropertyInput = SchemaNode | PropertySchema;

function isPropertySchema(input: PropertyInput): input is PropertySchema {
  return 'schema' in input && 'required' in input;
}

/**
 * Schema builders.
 *
 * @example
 * const server = s.object({
 *   host: s.string(),
 *   port: s.integer({ min: 1, max: 65535 }),
 *   tags: s.optional(s.array(s.string())),
 * });
 */
export const s = {
  object(
    properties: Record<string, PropertyInput>,
    options: { additionalProperties?: SchemaNode; description?: string } = {}
  ): ObjectSchema {
    const normalized: Record<string, PropertySchema> = {};
    for (const [name, input] of Object.entries(properties)) {
      normalized[name] = isPropertySchema(input) ? input : { required: true, schema: input };
    }
    return { kind: 'object', properties: normalized, ...options };
  },

  array(items: SchemaNode, options: Omit<ArraySchema, 'kind' | 'items'> = {}): ArraySchema {
    return { kind: 'array', items, ...options };
  },

  string(options: ValueOptions = {}): ValueSchema {
    return { kind: 'value', type: 'string', ...options };
  },

  number(options: ValueOptions = {}): ValueSchema {
    return { kind: 'value', type: 'number', ...options };
  },

  integer(options: ValueOptions = {}): ValueSchema {
    return { kind: 'value', type: 'integer', ...options };
  },

  boolean(options: ValueOptions = {}): ValueSchema {
    return { kind: 'value', type: 'boolean', ...options };
  },

  any(options: ValueOptions = {}): ValueSchema {
    return { kind: 'value', type: 'any', ...options };
  },

  /** Mark a property optional, with an optional default */
  optional(schema: SchemaNode, defaultValue?: RawValue): PropertySchema {
    return defaultValue === undefined
      ? { required: false, schema }
      : { required: false, schema, default: defaultValue };
  },
};
