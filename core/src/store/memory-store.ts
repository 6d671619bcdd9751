import { StoreErrorCode, createStoreError } from '../errors/index.js';
import type { AttributeNode, AttributeStore, NodeArray } from './types.js';

/**
 * Raw attribute values held by the in-memory store.
 *
 * A reference names a node by id; it dangles when no node has that id.
 */
export type AttributeValue =
  | { kind: 'string'; value: string }
  | { kind: 'name'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'reference'; id: string }
  | { kind: 'array'; items: AttributeValue[] }
  | { kind: 'null' };

export interface MemoryStoreOptions {
  /** Prefix for generated node ids. */
  idPrefix?: string;
}

/**
 * In-memory attribute store. Node identity is stable: the same id always
 * resolves to the same `MemoryNode` instance.
 */
export class MemoryAttributeStore implements AttributeStore {
  private readonly nodes = new Map<string, MemoryNode>();
  private readonly idPrefix: string;
  private nextId = 1;

  constructor(options: MemoryStoreOptions = {}) {
    this.idPrefix = options.idPrefix ?? '#';
  }

  createNode(id?: string): MemoryNode {
    const nodeId = id ?? this.generateId();
    if (this.nodes.has(nodeId)) {
      throw createStoreError(StoreErrorCode.DUPLICATE_NODE_ID, `Node "${nodeId}" already exists.`, {
        nodeId,
      });
    }
    const node = new MemoryNode(this, nodeId);
    this.nodes.set(nodeId, node);
    return node;
  }

  getNode(id: string): MemoryNode | undefined {
    return this.nodes.get(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Returns the id under which `node` is stored, or throws for a node of another store. */
  referenceTo(node: AttributeNode): AttributeValue {
    if (this.nodes.get(node.id) !== node) {
      throw createStoreError(
        StoreErrorCode.FOREIGN_NODE,
        `Node "${node.id}" does not belong to this store.`,
        { nodeId: node.id },
      );
    }
    return { kind: 'reference', id: node.id };
  }

  private generateId(): string {
    let candidate = `${this.idPrefix}${this.nextId++}`;
    while (this.nodes.has(candidate)) {
      candidate = `${this.idPrefix}${this.nextId++}`;
    }
    return candidate;
  }
}

export class MemoryNode implements AttributeNode {
  private readonly entries = new Map<string, AttributeValue>();

  constructor(
    private readonly store: MemoryAttributeStore,
    readonly id: string,
  ) {}

  has(key: string): boolean {
    return this.entries.has(key);
  }

  remove(key: string): void {
    this.entries.delete(key);
  }

  getRaw(key: string): AttributeValue | undefined {
    return this.entries.get(key);
  }

  setRaw(key: string, value: AttributeValue): void {
    this.entries.set(key, value);
  }

  getString(key: string): string | undefined {
    const value = this.entries.get(key);
    return value?.kind === 'string' ? value.value : undefined;
  }

  setString(key: string, value: string): void {
    this.entries.set(key, { kind: 'string', value });
  }

  getName(key: string): string | undefined {
    const value = this.entries.get(key);
    if (value?.kind === 'name' || value?.kind === 'string') {
      return value.value;
    }
    return undefined;
  }

  setName(key: string, value: string): void {
    this.entries.set(key, { kind: 'name', value });
  }

  getInteger(key: string): number | undefined {
    const value = this.entries.get(key);
    if (value === undefined || value.kind === 'null') {
      return undefined;
    }
    if (value.kind !== 'integer') {
      throw this.unexpectedKind(key, 'integer', value.kind);
    }
    return value.value;
  }

  setInteger(key: string, value: number): void {
    this.entries.set(key, { kind: 'integer', value });
  }

  getNode(primary: string, fallback?: string): MemoryNode | undefined {
    let key = primary;
    let value = this.entries.get(primary);
    if (value === undefined && fallback !== undefined) {
      key = fallback;
      value = this.entries.get(fallback);
    }
    if (value === undefined || value.kind === 'null') {
      return undefined;
    }
    if (value.kind !== 'reference') {
      throw this.unexpectedKind(key, 'reference', value.kind);
    }
    return this.store.getNode(value.id);
  }

  setNode(key: string, node: AttributeNode): void {
    this.entries.set(key, this.store.referenceTo(node));
  }

  getArray(key: string): NodeArray | undefined {
    const value = this.entries.get(key);
    if (value === undefined || value.kind === 'null') {
      return undefined;
    }
    if (value.kind !== 'array') {
      throw this.unexpectedKind(key, 'array', value.kind);
    }
    return new MemoryNodeArray(this.store, this.id, key, value.items);
  }

  ensureArray(key: string): NodeArray {
    const existing = this.getArray(key);
    if (existing) {
      return existing;
    }
    const items: AttributeValue[] = [];
    this.entries.set(key, { kind: 'array', items });
    return new MemoryNodeArray(this.store, this.id, key, items);
  }

  private unexpectedKind(key: string, expected: string, actual: string) {
    return createStoreError(
      StoreErrorCode.UNEXPECTED_VALUE_KIND,
      `Attribute "${key}" of node "${this.id}" has kind ${actual}, expected ${expected}.`,
      { nodeId: this.id, context: `attribute '${key}'` },
    );
  }
}

/**
 * View over the items of one array attribute. The items array is shared with
 * the owning node, so every write is visible to later reads of the node.
 */
class MemoryNodeArray implements NodeArray {
  constructor(
    private readonly store: MemoryAttributeStore,
    private readonly ownerId: string,
    private readonly key: string,
    private readonly items: AttributeValue[],
  ) {}

  get length(): number {
    return this.items.length;
  }

  get(index: number): MemoryNode | undefined {
    this.checkIndex(index, this.items.length - 1);
    const item = this.items[index];
    if (item === undefined || item.kind === 'null') {
      return undefined;
    }
    if (item.kind !== 'reference') {
      throw createStoreError(
        StoreErrorCode.MALFORMED_ARRAY_ENTRY,
        `Entry ${index} of "${this.key}" on node "${this.ownerId}" has kind ${item.kind}, expected reference.`,
        { nodeId: this.ownerId, context: `entry #${index} of '${this.key}'` },
      );
    }
    return this.store.getNode(item.id);
  }

  indexOf(node: AttributeNode): number {
    return this.items.findIndex((item) => item.kind === 'reference' && item.id === node.id);
  }

  set(index: number, node: AttributeNode): void {
    this.checkIndex(index, this.items.length - 1);
    this.items[index] = this.store.referenceTo(node);
  }

  push(node: AttributeNode): void {
    this.items.push(this.store.referenceTo(node));
  }

  insert(index: number, node: AttributeNode): void {
    this.checkIndex(index, this.items.length);
    this.items.splice(index, 0, this.store.referenceTo(node));
  }

  removeAt(index: number): void {
    this.checkIndex(index, this.items.length - 1);
    this.items.splice(index, 1);
  }

  private checkIndex(index: number, max: number): void {
    if (!Number.isInteger(index) || index < 0 || index > max) {
      throw createStoreError(
        StoreErrorCode.INDEX_OUT_OF_RANGE,
        `Index ${index} is out of range for "${this.key}" (length ${this.items.length}).`,
        { nodeId: this.ownerId, context: `attribute '${this.key}'` },
      );
    }
  }
}

export function createMemoryStore(options: MemoryStoreOptions = {}): MemoryAttributeStore {
  return new MemoryAttributeStore(options);
}
