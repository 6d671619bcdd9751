import { FieldKey, type AttributeNode } from '../store/types.js';
import type { FieldKids } from '../tree/kids.js';
import type { FormContext } from '../tree/types.js';
import type { WidgetAnnotation } from './widget.js';

/**
 * Field flag bits (the `Ff` attribute).
 */
export const FieldFlag = {
  READ_ONLY: 1,
  REQUIRED: 1 << 1,
  NO_EXPORT: 1 << 2,
} as const;

export type FieldFlagValue = (typeof FieldFlag)[keyof typeof FieldFlag];

/**
 * A node of the form's field tree.
 *
 * The wrapper holds no state besides its form and node: every accessor reads
 * the store, and parents and kids are rebuilt on each call.
 */
export class FormField {
  private readonly form: FormContext;
  private readonly node: AttributeNode;

  /**
   * @param node - existing node to wrap; a fresh empty node is created in the
   *   form's store when omitted
   */
  constructor(form: FormContext, node?: AttributeNode) {
    this.form = form;
    this.node = node ?? form.store.createNode();
  }

  getForm(): FormContext {
    return this.form;
  }

  getNode(): AttributeNode {
    return this.node;
  }

  partialName(): string | undefined {
    return this.node.getString(FieldKey.PartialName);
  }

  /** Passing undefined removes the name. */
  setPartialName(name: string | undefined): void {
    if (name === undefined) {
      this.node.remove(FieldKey.PartialName);
      return;
    }
    this.node.setString(FieldKey.PartialName, name);
  }

  /**
   * The declared field type, looked up on this node and then on each
   * ancestor. Undefined when no node in the chain declares one.
   */
  fieldType(): string | undefined {
    return this.form.resolver.findInheritedName(this.node, FieldKey.FieldType);
  }

  /** Flags of this node only; 0 when unset. */
  flags(): number {
    return this.node.getInteger(FieldKey.Flags) ?? 0;
  }

  setFlags(flags: number): void {
    this.node.setInteger(FieldKey.Flags, flags);
  }

  hasFlag(flag: FieldFlagValue): boolean {
    return (this.flags() & flag) !== 0;
  }

  setFlag(flag: FieldFlagValue, enabled: boolean): void {
    const flags = this.flags();
    // unsigned, so bit 31 never turns the stored value negative
    this.setFlags((enabled ? flags | flag : flags & ~flag) >>> 0);
  }

  isReadOnly(): boolean {
    return this.hasFlag(FieldFlag.READ_ONLY);
  }

  isRequired(): boolean {
    return this.hasFlag(FieldFlag.REQUIRED);
  }

  isNoExport(): boolean {
    return this.hasFlag(FieldFlag.NO_EXPORT);
  }

  parent(): FormField | undefined {
    const parent = this.form.resolver.resolveParent(this.node);
    return parent ? this.form.resolver.createField(this.form, parent) : undefined;
  }

  /** Partial names from the root down, joined with `.`; unnamed nodes are skipped. */
  fullyQualifiedName(): string {
    return this.form.resolver.fullyQualifiedName(this.node);
  }

  /**
   * Widgets and fields under this one, or undefined when the node has no
   * `Kids` entry at all. The result writes through to the document.
   */
  kids(): FieldKids | undefined {
    return this.form.resolver.listKids(this.form, this.node);
  }

  /**
   * The widget of a field that keeps its single widget merged into its own
   * node, or the first widget reachable through its first kid.
   */
  widget(): WidgetAnnotation | undefined {
    return this.form.resolver.findWidget(this.form, this.node);
  }

  /**
   * Descends by partial name, matching `name[nameIndex]` against the kids of
   * this field, then the next segment one level down.
   */
  findKid(name: readonly string[], nameIndex = 0): FormField | undefined {
    return this.form.resolver.findKid(this.form, this.node, name, nameIndex);
  }
}
