import { InteractiveForm, type InteractiveFormOptions } from '../form.js';
import { createMemoryStore, type MemoryAttributeStore, type MemoryNode } from '../store/memory-store.js';
import { FieldKey } from '../store/types.js';

export interface TestNodeSpec {
  id?: string;
  name?: string;
  fieldType?: string;
  flags?: number;
  subtype?: string;
  parent?: MemoryNode;
  legacyParent?: MemoryNode;
}

export function createTestNode(store: MemoryAttributeStore, spec: TestNodeSpec = {}): MemoryNode {
  const node = store.createNode(spec.id);
  if (spec.name !== undefined) {
    node.setString(FieldKey.PartialName, spec.name);
  }
  if (spec.fieldType !== undefined) {
    node.setName(FieldKey.FieldType, spec.fieldType);
  }
  if (spec.flags !== undefined) {
    node.setInteger(FieldKey.Flags, spec.flags);
  }
  if (spec.subtype !== undefined) {
    node.setName(FieldKey.Subtype, spec.subtype);
  }
  if (spec.parent) {
    node.setNode(FieldKey.Parent, spec.parent);
  }
  if (spec.legacyParent) {
    node.setNode(FieldKey.LegacyParent, spec.legacyParent);
  }
  return node;
}

/** Creates `spec` as a kid of `parent`: linked back through `Parent` and listed in its `Kids`. */
export function addTestKid(
  store: MemoryAttributeStore,
  parent: MemoryNode,
  spec: Omit<TestNodeSpec, 'parent'> = {},
): MemoryNode {
  const kid = createTestNode(store, { ...spec, parent });
  parent.ensureArray(FieldKey.Kids).push(kid);
  return kid;
}

export function createTestForm(options: Omit<InteractiveFormOptions, 'root'> = {}): {
  store: MemoryAttributeStore;
  form: InteractiveForm;
  root: MemoryNode;
} {
  const store = createMemoryStore();
  const root = store.createNode();
  const form = new InteractiveForm(store, { ...options, root });
  return { store, form, root };
}
