import { describe, expect, it } from 'vitest';
import { isStoreError } from '../errors/index.js';
import { createMemoryStore } from './memory-store.js';

describe('MemoryAttributeStore', () => {
  it('generates ids and resolves nodes by id', () => {
    const store = createMemoryStore();
    const first = store.createNode();
    const second = store.createNode('named');

    expect(first.id).toBe('#1');
    expect(second.id).toBe('named');
    expect(store.getNode('#1')).toBe(first);
    expect(store.getNode('missing')).toBeUndefined();
    expect(store.size).toBe(2);
  });

  it('skips generated ids that are already taken', () => {
    const store = createMemoryStore({ idPrefix: 'n' });
    store.createNode('n1');
    expect(store.createNode().id).toBe('n2');
  });

  it('rejects duplicate ids', () => {
    const store = createMemoryStore();
    store.createNode('a');
    expect(() => store.createNode('a')).toThrowError(/already exists/);
  });
});

describe('MemoryNode', () => {
  it('reads names from name and text values', () => {
    const node = createMemoryStore().createNode();
    node.setName('FT', 'Tx');
    node.setString('TU', 'tooltip');

    expect(node.getName('FT')).toBe('Tx');
    expect(node.getName('TU')).toBe('tooltip');
    expect(node.getString('FT')).toBeUndefined();
  });

  it('falls back to the secondary key for node references', () => {
    const store = createMemoryStore();
    const parent = store.createNode('parent');
    const node = store.createNode();
    node.setNode('P', parent);

    expect(node.getNode('Parent', 'P')).toBe(parent);
    expect(node.getNode('Parent')).toBeUndefined();
  });

  it('removes an attribute so the fallback key applies again', () => {
    const store = createMemoryStore();
    const primary = store.createNode();
    const legacy = store.createNode();
    const node = store.createNode();
    node.setNode('Parent', primary);
    node.setNode('P', legacy);
    node.remove('Parent');

    expect(node.has('Parent')).toBe(false);
    expect(node.getNode('Parent', 'P')).toBe(legacy);
  });

  it('returns undefined for a dangling reference', () => {
    const node = createMemoryStore().createNode();
    node.setRaw('Parent', { kind: 'reference', id: 'gone' });
    expect(node.getNode('Parent', 'P')).toBeUndefined();
  });

  it('throws a store error when a reference holds another kind of value', () => {
    const node = createMemoryStore().createNode('n');
    node.setInteger('Parent', 4);

    let caught: unknown;
    try {
      node.getNode('Parent', 'P');
    } catch (error) {
      caught = error;
    }
    expect(isStoreError(caught)).toBe(true);
    expect(caught).toMatchObject({
      code: 'S001',
      message: 'Attribute "Parent" of node "n" has kind integer, expected reference.',
    });
  });

  it('throws when an integer attribute holds text', () => {
    const node = createMemoryStore().createNode();
    node.setString('Ff', 'two');
    expect(() => node.getInteger('Ff')).toThrowError(/expected integer/);
  });

  it('refuses nodes from another store', () => {
    const node = createMemoryStore().createNode();
    const foreign = createMemoryStore().createNode();
    expect(() => node.setNode('Parent', foreign)).toThrowError(/does not belong to this store/);
  });
});

describe('node arrays', () => {
  it('creates an array on demand and writes through to the node', () => {
    const store = createMemoryStore();
    const owner = store.createNode();
    const a = store.createNode('a');
    const b = store.createNode('b');

    expect(owner.getArray('Kids')).toBeUndefined();
    owner.ensureArray('Kids').push(a);
    owner.ensureArray('Kids').push(b);

    const kids = owner.getArray('Kids');
    expect(kids?.length).toBe(2);
    expect(kids?.get(1)).toBe(b);
    expect(kids?.indexOf(b)).toBe(1);
  });

  it('yields undefined for null and dangling entries', () => {
    const store = createMemoryStore();
    const owner = store.createNode();
    owner.setRaw('Kids', {
      kind: 'array',
      items: [{ kind: 'null' }, { kind: 'reference', id: 'nowhere' }],
    });
    const kids = owner.getArray('Kids');
    expect(kids?.get(0)).toBeUndefined();
    expect(kids?.get(1)).toBeUndefined();
  });

  it('throws for entries that are not references', () => {
    const owner = createMemoryStore().createNode('owner');
    owner.setRaw('Kids', { kind: 'array', items: [{ kind: 'integer', value: 3 }] });
    expect(() => owner.getArray('Kids')?.get(0)).toThrowError(
      'Entry 0 of "Kids" on node "owner" has kind integer, expected reference.',
    );
  });

  it('inserts, replaces and removes entries', () => {
    const store = createMemoryStore();
    const owner = store.createNode();
    const [a, b, c] = [store.createNode('a'), store.createNode('b'), store.createNode('c')];
    const kids = owner.ensureArray('Kids');

    kids.push(a);
    kids.insert(0, b);
    kids.set(1, c);
    expect([kids.get(0)?.id, kids.get(1)?.id]).toEqual(['b', 'c']);

    kids.removeAt(0);
    expect(kids.length).toBe(1);
    expect(owner.getArray('Kids')?.get(0)).toBe(c);
  });

  it('rejects out of range indexes', () => {
    const kids = createMemoryStore().createNode().ensureArray('Kids');
    expect(() => kids.get(0)).toThrowError(/out of range/);
    expect(() => kids.removeAt(-1)).toThrowError(/out of range/);
  });
});
