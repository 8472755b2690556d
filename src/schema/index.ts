// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Schema Module
 *
 * - types.ts     - Schema trees and the `s` builder
 * - validator.ts - Lockstep validation of DOM against schema
 * - defaults.ts  - Filling absent properties from defaults
 * - loader.ts    - Schema documents written as YAML/JSON
 */

export type {
  ValueType,
  ValueSchema,
  ArraySchema,
  PropertySchema,
  PropertyInput,
  ObjectSchema,
  SchemaNode,
  SchemaMap,
} from './types.js';
export { s } from './types.js';
export { SchemaValidator, validateTree, validateMounts } from './validator.js';
export type { ValidationOptions } from './validator.js';
export { applySchemaDefaults } from './defaults.js';
export type { DefaultsResult } from './defaults.js';
export { parseSchemaDocument, loadSchemaFile } from './loader.js';
