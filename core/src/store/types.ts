/**
 * The attribute store the field tree reads from.
 *
 * Nodes are generic key/value dictionaries. The tree only needs typed reads
 * and writes of named attributes, references to other nodes, and arrays of
 * node references. Implementations throw store errors (S-codes) when a value
 * exists but cannot be read as the requested kind.
 */

/** Attribute keys used by the field tree. */
export const FieldKey = {
  PartialName: 'T',
  FieldType: 'FT',
  Flags: 'Ff',
  Parent: 'Parent',
  LegacyParent: 'P',
  Kids: 'Kids',
  Subtype: 'Subtype',
} as const;

/** Attribute keys used on the form root node. */
export const FormKey = {
  Fields: 'Fields',
} as const;

export interface AttributeNode {
  readonly id: string;

  has(key: string): boolean;
  remove(key: string): void;

  /** Text value; undefined when absent or not text. */
  getString(key: string): string | undefined;
  setString(key: string, value: string): void;

  /** Name value (type and subtype tags); a text value is accepted too. */
  getName(key: string): string | undefined;
  setName(key: string, value: string): void;

  getInteger(key: string): number | undefined;
  setInteger(key: string, value: number): void;

  /**
   * Resolves a node reference, trying `fallback` when `primary` is absent.
   * Returns undefined for absent or dangling references.
   */
  getNode(primary: string, fallback?: string): AttributeNode | undefined;
  setNode(key: string, node: AttributeNode): void;

  getArray(key: string): NodeArray | undefined;
  /** Returns the array under `key`, creating an empty one when absent. */
  ensureArray(key: string): NodeArray;
}

/**
 * A live view over an array attribute. Writes go straight to the node.
 */
export interface NodeArray {
  readonly length: number;
  /** The node at `index`; undefined for a dangling or null entry. */
  get(index: number): AttributeNode | undefined;
  indexOf(node: AttributeNode): number;
  set(index: number, node: AttributeNode): void;
  push(node: AttributeNode): void;
  insert(index: number, node: AttributeNode): void;
  removeAt(index: number): void;
}

export interface AttributeStore {
  createNode(id?: string): AttributeNode;
  getNode(id: string): AttributeNode | undefined;
}
