import type { FormField } from '../fields/field.js';
import type { WidgetAnnotation } from '../fields/widget.js';
import type { AttributeNode, AttributeStore } from '../store/types.js';
import type { TreeResolver } from './resolver.js';

/**
 * The owner every field is bound to. Fields reach the store and the resolver
 * only through it.
 */
export interface FormContext {
  readonly store: AttributeStore;
  readonly resolver: TreeResolver;
}

/**
 * Maps a raw node to the field wrapper for it. Implementations may pick a
 * `FormField` subclass from the node's declared field type.
 */
export interface FieldFactory {
  createField(form: FormContext, node: AttributeNode): FormField;
}

export type FieldKidKind = 'field' | 'widget';

/** One resolved child of a field. */
export type FieldKid =
  | { kind: 'widget'; widget: WidgetAnnotation }
  | { kind: 'field'; field: FormField };
