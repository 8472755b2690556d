// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Schema Validator
 *
 * Walks a DOM tree and a schema tree in lockstep and reports mismatches as
 * diagnostics. References are resolved on the side and their targets are
 * validated at the reference's position. The tree is never modified.
 */

import type { DomNode, Scalar } from '../dom/nodes.js';
import { childPath, findNode } from '../dom/tree.js';
import {
  assertNever,
  ContractError,
  diagnostic,
  Severity,
  sortDiagnostics,
  type Diagnostic,
  type DiagnosticKind,
} from '../errors.js';
import { ReferenceResolver } from '../refs/resolver.js';
import type { ArraySchema, ObjectSchema, SchemaMap, SchemaNode, ValueSchema } from './types.js';

export interface ValidationOptions {
  /** Report properties the schema doesn't declare */
  strict?: boolean;
}

function describeNode(node: DomNode): string {
  return node.kind === 'value' ? `value of type ${describeScalar(node.value)}` : node.kind;
}

function describeScalar(value: Scalar): string {
  return value === null ? 'null' : typeof value;
}

function matchesType(value: Exclude<Scalar, null>, type: ValueSchema['type']): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'any':
      return true;
    default:
      return assertNever(type, 'value type');
  }
}

function isAllowed(value: Scalar, allowed: readonly Scalar[]): boolean {
  return allowed.some((candidate) =>
    typeof candidate === 'string' && typeof value === 'string'
      ? candidate.toLowerCase() === value.toLowerCase()
      : candidate === value
  );
}

/**
 * Validator bound to one tree. Reuse it to validate several mounts so that
 * reference resolution is shared.
 */
export class SchemaValidator {
  private readonly resolver: ReferenceResolver;
  private readonly patterns = new Map<string, RegExp | null>();
  private issues: Diagnostic[] = [];

  constructor(
    private readonly root: DomNode,
    private readonly options: ValidationOptions = {}
  ) {
    if (!root) {
      throw new ContractError('SchemaValidator requires a tree');
    }
    this.resolver = new ReferenceResolver(root);
  }

  /**
   * Validate the node at `path` (default: the root) against a schema.
   */
  validate(schema: SchemaNode, path: string = '/'): Diagnostic[] {
    if (!schema) {
      throw new ContractError('SchemaValidator.validate requires a schema');
    }
    this.issues = [];
    const node = findNode(this.root, path);
    if (!node) {
      this.report('MissingRequiredField', path, 'Required section is missing');
    } else {
      this.validateNode(node, schema, path);
    }
    return sortDiagnostics(this.issues);
  }

  private report(kind: DiagnosticKind, path: string, message: string, severity: Severity = Severity.ERROR): void {
    this.issues.push(diagnostic(kind, path, message, severity));
  }

  private validateNode(node: DomNode, schema: SchemaNode, path: string): void {
    if (node.kind === 'ref') {
      const resolution = this.resolver.resolveAt(path);
      if (!resolution.ok) {
        this.report('UnresolvedReference', path, resolution.message);
        return;
      }
      node = resolution.node;
      if (node.kind === 'ref') return;
    }

    switch (schema.kind) {
      case 'value':
        if (node.kind !== 'value') {
          this.report('StructuralMismatch', path, `Expected a value, found ${describeNode(node)}`);
          return;
        }
        this.validateValue(node.value, schema, path);
        return;
      case 'array':
        if (node.kind !== 'array') {
          this.report('StructuralMismatch', path, `Expected an array, found ${describeNode(node)}`);
          return;
        }
        this.validateArray(node.toArray(), schema, path);
        return;
      case 'object':
        if (node.kind !== 'object') {
          this.report('StructuralMismatch', path, `Expected an object, found ${describeNode(node)}`);
          return;
        }
        this.validateObject(node.entries(), schema, path);
        return;
      default:
        assertNever(schema, 'schema kind');
    }
  }

  private validateObject(entries: Array<[string, DomNode]>, schema: ObjectSchema, path: string): void {
    const children = new Map(entries);
    for (const [name, property] of Object.entries(schema.properties)) {
      const child = children.get(name);
      const propertyPath = childPath(path, name);
      if (!child) {
        if (property.required) {
          this.report('MissingRequiredField', propertyPath, `Required property "${name}" is missing`);
        }
        continue;
      }
      this.validateNode(child, property.schema, propertyPath);
    }

    for (const [name, child] of entries) {
      if (Object.prototype.hasOwnProperty.call(schema.properties, name)) continue;
      const propertyPath = childPath(path, name);
      if (schema.additionalProperties) {
        this.validateNode(child, schema.additionalProperties, propertyPath);
      } else if (this.options.strict) {
        this.report('UnexpectedField', propertyPath, `Property "${name}" is not declared in the schema`, Severity.WARNING);
      }
    }
  }

  private validateArray(items: DomNode[], schema: ArraySchema, path: string): void {
    if (schema.minItems !== undefined && items.length < schema.minItems) {
      this.report('RangeViolation', path, `Array has ${items.length} items, fewer than the minimum ${schema.minItems}`);
    }
    if (schema.maxItems !== undefined && items.length > schema.maxItems) {
      this.report('RangeViolation', path, `Array has ${items.length} items, more than the maximum ${schema.maxItems}`);
    }
    items.forEach((item, index) => {
      this.validateNode(item, schema.items, childPath(path, String(index)));
    });
  }

  private compile(pattern: string): RegExp | null {
    if (!this.patterns.has(pattern)) {
      try {
        this.patterns.set(pattern, new RegExp(pattern));
      } catch {
        this.patterns.set(pattern, null);
      }
    }
    return this.patterns.get(pattern) ?? null;
  }

  private validateValue(value: Scalar, schema: ValueSchema, path: string): void {
    if (value === null) {
      if (schema.type !== 'any' && !schema.nullable) {
        this.report('TypeMismatch', path, `Expected ${schema.type}, found null`);
      }
      return;
    }
    if (!matchesType(value, schema.type)) {
      const found = typeof value === 'number' ? `number ${value}` : typeof value;
      this.report('TypeMismatch', path, `Expected ${schema.type}, found ${found}`);
      return;
    }

    if (typeof value === 'number') {
      if (schema.min !== undefined && value < schema.min) {
        this.report('RangeViolation', path, `Value ${value} is below the minimum ${schema.min}`);
      }
      if (schema.max !== undefined && value > schema.max) {
        this.report('RangeViolation', path, `Value ${value} is above the maximum ${schema.max}`);
      }
    }

    if (typeof value === 'string' && schema.pattern !== undefined) {
      const regex = this.compile(schema.pattern);
      if (!regex) {
        this.report('PatternViolation', path, `Schema pattern "${schema.pattern}" is not a valid regular expression`);
      } else if (!regex.test(value)) {
        this.report('PatternViolation', path, `Value "${value}" does not match pattern "${schema.pattern}"`);
      }
    }

    if (schema.allowedValues && !isAllowed(value, schema.allowedValues)) {
      const allowed = schema.allowedValues.map((v) => JSON.stringify(v)).join(', ');
      this.report('EnumViolation', path, `Value ${JSON.stringify(value)} is not one of: ${allowed}`);
    }
  }
}

/**
 * Validate a whole tree against one schema.
 */
export function validateTree(root: DomNode, schema: SchemaNode, options: ValidationOptions = {}): Diagnostic[] {
  return new SchemaValidator(root, options).validate(schema);
}

/**
 * Validate each mounted section against its schema. A missing section is
 * reported as a missing required field.
 */
export function validateMounts(root: DomNode, schemas: SchemaMap, options: ValidationOptions = {}): Diagnostic[] {
  if (!schemas) {
    throw new ContractError('validateMounts requires a schema map');
  }
  const validator = new SchemaValidator(root, options);
  const issues: Diagnostic[] = [];
  for (const mountPath of [...schemas.keys()].sort()) {
    const schema = schemas.get(mountPath);
    if (schema) issues.push(...validator.validate(schema, mountPath));
  }
  return sortDiagnostics(issues);
}
