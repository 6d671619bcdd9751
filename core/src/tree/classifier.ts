import { WIDGET_SUBTYPE } from '../fields/widget.js';
import { FieldKey, type AttributeNode } from '../store/types.js';
import type { FieldKidKind } from './types.js';

/**
 * Decides whether a raw child node is a field or a widget.
 *
 * First match wins:
 * 1. the node declares a field type
 * 2. its parent declares a field type (the node inherits it)
 * 3. its subtype is `Widget`
 * 4. anything else is a grouping field
 */
export function classifyNode(node: AttributeNode, parent?: AttributeNode): FieldKidKind {
  if (node.has(FieldKey.FieldType)) {
    return 'field';
  }
  if (parent?.has(FieldKey.FieldType)) {
    return 'field';
  }
  if (node.getName(FieldKey.Subtype) === WIDGET_SUBTYPE) {
    return 'widget';
  }
  return 'field';
}
