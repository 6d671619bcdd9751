import { RuntimeErrorCode, createRuntimeError } from '../errors/index.js';
import type { FormField } from '../fields/field.js';
import type { WidgetAnnotation } from '../fields/widget.js';
import type { AttributeNode, NodeArray } from '../store/types.js';
import type { FieldKid } from './types.js';

export function kidNode(kid: FieldKid): AttributeNode {
  return kid.kind === 'widget' ? kid.widget.getNode() : kid.field.getNode();
}

/**
 * The resolved children of a field, in document order.
 *
 * Dangling entries of the backing `Kids` array are not listed, so positions
 * here and in the backing array can differ. Writes locate the backing entry
 * by node identity and apply to both. A node listed more than once maps its
 * n-th entry here to its n-th entry in the backing array.
 */
export class FieldKids implements Iterable<FieldKid> {
  constructor(
    private readonly entries: FieldKid[],
    private readonly backing: NodeArray,
  ) {}

  get length(): number {
    return this.entries.length;
  }

  at(index: number): FieldKid | undefined {
    return this.entries[index];
  }

  [Symbol.iterator](): Iterator<FieldKid> {
    return this.entries[Symbol.iterator]();
  }

  toArray(): FieldKid[] {
    return [...this.entries];
  }

  fields(): FormField[] {
    return this.entries.flatMap((kid) => (kid.kind === 'field' ? [kid.field] : []));
  }

  widgets(): WidgetAnnotation[] {
    return this.entries.flatMap((kid) => (kid.kind === 'widget' ? [kid.widget] : []));
  }

  push(kid: FieldKid): void {
    this.backing.push(kidNode(kid));
    this.entries.push(kid);
  }

  set(index: number, kid: FieldKid): void {
    const position = this.backingIndex(index);
    this.backing.set(position, kidNode(kid));
    this.entries[index] = kid;
  }

  removeAt(index: number): void {
    const position = this.backingIndex(index);
    this.backing.removeAt(position);
    this.entries.splice(index, 1);
  }

  private backingIndex(index: number): number {
    const current = this.entries[index];
    if (!Number.isInteger(index) || current === undefined) {
      throw createRuntimeError(
        RuntimeErrorCode.KID_INDEX_OUT_OF_RANGE,
        `Kid index ${index} is out of range (length ${this.entries.length}).`,
      );
    }
    const node = kidNode(current);
    let occurrence = 0;
    for (let i = 0; i < index; i += 1) {
      const earlier = this.entries[i];
      if (earlier !== undefined && kidNode(earlier).id === node.id) {
        occurrence += 1;
      }
    }
    const position = this.nthBackingPosition(node, occurrence);
    if (position < 0) {
      throw createRuntimeError(
        RuntimeErrorCode.KID_NOT_IN_BACKING_ARRAY,
        `Node "${node.id}" is no longer in the backing kids array.`,
        { nodeId: node.id },
      );
    }
    return position;
  }

  private nthBackingPosition(node: AttributeNode, occurrence: number): number {
    let seen = 0;
    for (let position = 0; position < this.backing.length; position += 1) {
      if (this.backing.get(position)?.id !== node.id) {
        continue;
      }
      if (seen === occurrence) {
        return position;
      }
      seen += 1;
    }
    return -1;
  }
}
