import { FieldKey, type AttributeNode } from '../store/types.js';

/** Subtype marking an interactive-widget annotation. */
export const WIDGET_SUBTYPE = 'Widget';

/**
 * A terminal child of a field: one renderable instance of it. The node may
 * be the field's own node when the widget attributes are merged into it.
 */
export class WidgetAnnotation {
  constructor(private readonly node: AttributeNode) {}

  getNode(): AttributeNode {
    return this.node;
  }

  subtype(): string | undefined {
    return this.node.getName(FieldKey.Subtype);
  }
}
