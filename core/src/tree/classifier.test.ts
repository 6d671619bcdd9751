import { describe, expect, it } from 'vitest';
import { createMemoryStore } from '../store/memory-store.js';
import { createTestNode } from '../testing/tree-fixtures.js';
import { classifyNode } from './classifier.js';

describe('classifyNode', () => {
  const store = createMemoryStore();

  it('treats a node with its own field type as a field', () => {
    const node = createTestNode(store, { fieldType: 'Tx', subtype: 'Widget' });
    expect(classifyNode(node)).toBe('field');
  });

  it('treats a node whose parent declares a field type as a field', () => {
    const parent = createTestNode(store, { fieldType: 'Btn' });
    const node = createTestNode(store, { subtype: 'Widget', parent });
    expect(classifyNode(node, parent)).toBe('field');
  });

  it('treats a widget subtype without any field type as a widget', () => {
    const parent = createTestNode(store, { name: 'group' });
    const node = createTestNode(store, { subtype: 'Widget', parent });
    expect(classifyNode(node, parent)).toBe('widget');
    expect(classifyNode(node)).toBe('widget');
  });

  it('falls back to field for nodes with no type information', () => {
    expect(classifyNode(createTestNode(store))).toBe('field');
    expect(classifyNode(createTestNode(store, { subtype: 'Link' }))).toBe('field');
  });

  it('does not look past the direct parent', () => {
    const grandparent = createTestNode(store, { fieldType: 'Tx' });
    const parent = createTestNode(store, { parent: grandparent });
    const node = createTestNode(store, { subtype: 'Widget', parent });
    expect(classifyNode(node, parent)).toBe('widget');
  });

  it('gives the same answer for the same node state', () => {
    const node = createTestNode(store, { subtype: 'Widget' });
    expect(classifyNode(node)).toBe(classifyNode(node));
  });
});
