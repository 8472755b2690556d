// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * DOM Node Types
 *
 * The configuration tree is a closed union of four node kinds. Containers
 * own their children; every child keeps a non-owning link back to its
 * container, used only to compute paths.
 */

import { DOM_CONFIG } from '../constants.js';
import { ContractError } from '../errors.js';

/**
 * Scalar payload of a value node.
 */
export type Scalar = string | number | boolean | null;

/**
 * Raw hierarchical representation exchanged with parsers and serializers.
 */
export type RawValue = Scalar | RawValue[] | { [key: string]: RawValue };

/**
 * Any node in a configuration tree.
 */
export type DomNode = ObjectNode | ArrayNode | ValueNode | RefNode;

/**
 * Nodes that own children.
 */
export type ContainerNode = ObjectNode | ArrayNode;

/**
 * Discriminant of the DomNode union.
 */
export type DomNodeKind = DomNode['kind'];

abstract class BaseNode {
  private nodeName: string;
  private owner: ContainerNode | null = null;

  constructor(name: string) {
    this.nodeName = name;
  }

  /** Name of this node, unique among its siblings */
  get name(): string {
    return this.nodeName;
  }

  /** Owning container, or null for a root or detached node */
  get parent(): ContainerNode | null {
    return this.owner;
  }

  /**
   * Rebind ownership. Containers call this when attaching or renumbering;
   * other callers should use the container methods.
   * @internal
   */
  bindTo(parent: ContainerNode | null, name: string): void {
    this.owner = parent;
    this.nodeName = name;
  }

  /**
   * Remove this node from its container. No-op for roots.
   */
  detach(): void {
    const parent = this.owner;
    if (!parent) return;
    if (parent.kind === 'object') {
      parent.removeChild(this.nodeName);
    } else {
      parent.removeAt(Number(this.nodeName));
    }
  }
}

function assertUnowned(child: DomNode, target: string): void {
  if (child.parent !== null) {
    throw new ContractError(
      `Node "${child.name}" is already owned by another container and cannot be attached to ${target}`
    );
  }
}

/**
 * Mapping from names to child nodes.
 */
export class ObjectNode extends BaseNode {
  readonly kind = 'object';
  private readonly children = new Map<string, DomNode>();

  /** Number of children */
  get size(): number {
    return this.children.size;
  }

  get(name: string): DomNode | undefined {
    return this.children.get(name);
  }

  has(name: string): boolean {
    return this.children.has(name);
  }

  keys(): string[] {
    return [...this.children.keys()];
  }

  values(): DomNode[] {
    return [...this.children.values()];
  }

  entries(): Array<[string, DomNode]> {
    return [...this.children.entries()];
  }

  /**
   * Attach a new child under its own name.
   * Throws if the name is taken or the child already has an owner.
   */
  addChild<T extends DomNode>(child: T): T {
    if (this.children.has(child.name)) {
      throw new ContractError(`Duplicate property "${child.name}"`);
    }
    assertUnowned(child, `"${this.name}"`);
    child.bindTo(this, child.name);
    this.children.set(child.name, child);
    return child;
  }

  /**
   * Attach a child, replacing any existing child of the same name.
   * Returns the replaced (now detached) node.
   */
  setChild(child: DomNode): DomNode | undefined {
    assertUnowned(child, `"${this.name}"`);
    const previous = this.children.get(child.name);
    if (previous) {
      previous.bindTo(null, previous.name);
    }
    child.bindTo(this, child.name);
    this.children.set(child.name, child);
    return previous;
  }

  /**
   * Detach and return the named child.
   */
  removeChild(name: string): DomNode | undefined {
    const child = this.children.get(name);
    if (!child) return undefined;
    this.children.delete(name);
    child.bindTo(null, child.name);
    return child;
  }

  /**
   * Rename a child: removed, then reinserted under the new name.
   */
  renameChild(oldName: string, newName: string): DomNode {
    if (oldName === newName) {
      const same = this.children.get(oldName);
      if (!same) throw new ContractError(`No property "${oldName}"`);
      return same;
    }
    if (this.children.has(newName)) {
      throw new ContractError(`Duplicate property "${newName}"`);
    }
    const child = this.removeChild(oldName);
    if (!child) {
      throw new ContractError(`No property "${oldName}"`);
    }
    child.bindTo(null, newName);
    return this.addChild(child);
  }
}

/**
 * Dense ordered sequence. Item names are their indices.
 */
export class ArrayNode extends BaseNode {
  readonly kind = 'array';
  private readonly items: DomNode[] = [];

  get length(): number {
    return this.items.length;
  }

  at(index: number): DomNode | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      return undefined;
    }
    return this.items[index];
  }

  toArray(): DomNode[] {
    return [...this.items];
  }

  append<T extends DomNode>(item: T): T {
    assertUnowned(item, `array "${this.name}"`);
    item.bindTo(this, String(this.items.length));
    this.items.push(item);
    return item;
  }

  insert<T extends DomNode>(index: number, item: T): T {
    if (!Number.isInteger(index) || index < 0 || index > this.items.length) {
      throw new ContractError(`Index ${index} out of range for array "${this.name}"`);
    }
    assertUnowned(item, `array "${this.name}"`);
    this.items.splice(index, 0, item);
    this.renumber(index);
    return item;
  }

  removeAt(index: number): DomNode | undefined {
    const item = this.at(index);
    if (!item) return undefined;
    this.items.splice(index, 1);
    item.bindTo(null, item.name);
    this.renumber(index);
    return item;
  }

  /**
   * Replace the item at an index. Returns the replaced (detached) node.
   */
  replaceAt(index: number, item: DomNode): DomNode {
    const previous = this.at(index);
    if (!previous) {
      throw new ContractError(`Index ${index} out of range for array "${this.name}"`);
    }
    assertUnowned(item, `array "${this.name}"`);
    previous.bindTo(null, previous.name);
    item.bindTo(this, String(index));
    this.items[index] = item;
    return previous;
  }

  private renumber(from: number): void {
    for (let i = from; i < this.items.length; i++) {
      this.items[i].bindTo(this, String(i));
    }
  }
}

/**
 * Leaf holding a scalar. Updates replace the payload wholesale.
 */
export class ValueNode extends BaseNode {
  readonly kind = 'value';
  private payload: Scalar;

  constructor(name: string, value: Scalar) {
    super(name);
    this.payload = value;
  }

  get value(): Scalar {
    return this.payload;
  }

  setValue(value: Scalar): void {
    this.payload = value;
  }
}

/**
 * Symbolic link to another location in the same tree.
 */
export class RefNode extends BaseNode {
  readonly kind = 'ref';

  constructor(
    name: string,
    public readonly refPath: string
  ) {
    super(name);
    if (refPath.trim() === '') {
      throw new ContractError(`Reference "${name}" has an empty target path`);
    }
  }
}

/**
 * Create an empty tree root.
 */
export function createRoot(): ObjectNode {
  return new ObjectNode(DOM_CONFIG.ROOT_NAME);
}
