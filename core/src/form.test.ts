import { describe, expect, it } from 'vitest';
import { FormKey } from './store/types.js';
import { addTestKid, createTestForm, createTestNode } from './testing/tree-fixtures.js';

function createPersonForm() {
  const { store, form, root } = createTestForm();
  const person = createTestNode(store, { id: 'person', name: 'person' });
  addTestKid(store, person, { id: 'first', name: 'first', fieldType: 'Tx' });
  const address = addTestKid(store, person, { id: 'address', name: 'address' });
  addTestKid(store, address, { id: 'city', name: 'city', fieldType: 'Tx' });
  const agree = createTestNode(store, { id: 'agree', name: 'agree', fieldType: 'Btn' });

  const fields = form.getRoot().ensureArray(FormKey.Fields);
  fields.push(person);
  fields.push(agree);
  return { store, form, root };
}

describe('InteractiveForm', () => {
  it('lists top-level fields and drops dangling ones', () => {
    const { form, root } = createPersonForm();
    expect(form.getRoot()).toBe(root);
    root.setRaw(FormKey.Fields, {
      kind: 'array',
      items: [
        { kind: 'reference', id: 'person' },
        { kind: 'reference', id: 'missing' },
        { kind: 'reference', id: 'agree' },
      ],
    });
    expect(form.fields().map((field) => field.partialName())).toEqual(['person', 'agree']);
  });

  it('has no fields when the root has no fields entry', () => {
    const { form } = createTestForm();
    expect(form.fields()).toEqual([]);
  });

  it('finds fields by fully-qualified name', () => {
    const { form } = createPersonForm();
    expect(form.findField('person.address.city')?.getNode().id).toBe('city');
    expect(form.findField('agree')?.fieldType()).toBe('Btn');
    expect(form.findField('person.address.street')).toBeUndefined();
    expect(form.findField('nobody')).toBeUndefined();
  });

  it('walks fields depth-first and skips widgets', () => {
    const { form } = createPersonForm();
    expect([...form.walk()].map((field) => field.fullyQualifiedName())).toEqual([
      'person',
      'person.first',
      'person.address',
      'person.address.city',
      'agree',
    ]);
  });

  it('adds fields created on fresh nodes', () => {
    const { form } = createTestForm();
    const field = form.createField();
    field.setPartialName('comment');
    expect(form.fields()).toEqual([]);

    form.addField(field);
    expect(form.findField('comment')?.getNode()).toBe(field.getNode());
  });
});
