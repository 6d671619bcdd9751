import type { ParentCyclePolicy } from './config.js';
import { defaultFieldFactory } from './fields/factory.js';
import type { FormField } from './fields/field.js';
import type { Logger } from './logger.js';
import { FormKey, type AttributeNode, type AttributeStore } from './store/types.js';
import { createTreeResolver, type TreeResolver } from './tree/resolver.js';
import type { FieldFactory, FormContext } from './tree/types.js';

export interface InteractiveFormOptions {
  /** Form root node holding the `Fields` array; created when omitted. */
  root?: AttributeNode;
  factory?: FieldFactory;
  logger?: Partial<Logger>;
  parentCycle?: ParentCyclePolicy;
}

const noopLogger: Partial<Logger> = {};

/**
 * The form context: owns the store, the resolver and the field factory that
 * every field of this form is bound to.
 */
export class InteractiveForm implements FormContext {
  readonly store: AttributeStore;
  readonly resolver: TreeResolver;
  readonly logger: Partial<Logger>;
  private readonly root: AttributeNode;

  constructor(store: AttributeStore, options: InteractiveFormOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? noopLogger;
    this.root = options.root ?? store.createNode();
    this.resolver = createTreeResolver({
      factory: options.factory ?? defaultFieldFactory,
      logger: this.logger,
      parentCycle: options.parentCycle,
    });
  }

  getRoot(): AttributeNode {
    return this.root;
  }

  /** Top-level fields; dangling entries are left out. */
  fields(): FormField[] {
    const raw = this.root.getArray(FormKey.Fields);
    if (!raw) {
      return [];
    }
    const fields: FormField[] = [];
    for (let index = 0; index < raw.length; index += 1) {
      const node = raw.get(index);
      if (node) {
        fields.push(this.resolver.createField(this, node));
      }
    }
    return fields;
  }

  /** A field on a fresh node. It is not part of the tree until added. */
  createField(): FormField {
    return this.resolver.createField(this, this.store.createNode());
  }

  addField(field: FormField): void {
    this.root.ensureArray(FormKey.Fields).push(field.getNode());
  }

  /**
   * Finds a field by its fully-qualified name, e.g. `person.address.city`.
   */
  findField(qualifiedName: string): FormField | undefined {
    const segments = qualifiedName.split('.');
    const top = this.fields().find((field) => field.partialName() === segments[0]);
    if (!top || segments.length === 1) {
      return top;
    }
    return top.findKid(segments, 1);
  }

  /** Depth-first over every field, widgets excluded. Each node is visited once. */
  *walk(): Generator<FormField> {
    const visited = new Set<string>();
    const stack = this.fields().reverse();
    let field = stack.pop();
    while (field) {
      const id = field.getNode().id;
      if (!visited.has(id)) {
        visited.add(id);
        yield field;
        const kids = field.kids()?.fields() ?? [];
        stack.push(...kids.reverse());
      }
      field = stack.pop();
    }
  }
}
