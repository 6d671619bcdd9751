/**
 * Tree resolution for form fields.
 *
 * Everything here reads the store on each call; no node is cached. Parents
 * are looked up through the `Parent` reference, falling back to the legacy
 * `P` key.
 */

import type { ParentCyclePolicy } from '../config.js';
import { RuntimeErrorCode, createRuntimeError } from '../errors/index.js';
import type { FormField } from '../fields/field.js';
import { WidgetAnnotation } from '../fields/widget.js';
import type { Logger } from '../logger.js';
import { FieldKey, type AttributeNode } from '../store/types.js';
import { classifyNode } from './classifier.js';
import { FieldKids } from './kids.js';
import type { FieldFactory, FieldKid, FormContext } from './types.js';

export interface TreeResolverOptions {
  factory: FieldFactory;
  logger?: Partial<Logger>;
  parentCycle?: ParentCyclePolicy;
}

export interface TreeResolver {
  createField(form: FormContext, node: AttributeNode): FormField;
  resolveParent(node: AttributeNode): AttributeNode | undefined;
  /** `node` followed by its ancestors, nearest first. */
  lineage(node: AttributeNode): Generator<AttributeNode>;
  findInheritedName(node: AttributeNode, key: string): string | undefined;
  fullyQualifiedName(node: AttributeNode): string;
  classifyKid(form: FormContext, node: AttributeNode): FieldKid;
  listKids(form: FormContext, node: AttributeNode): FieldKids | undefined;
  findWidget(form: FormContext, node: AttributeNode): WidgetAnnotation | undefined;
  findKid(
    form: FormContext,
    node: AttributeNode,
    segments: readonly string[],
    index: number,
  ): FormField | undefined;
}

const noopLogger: Partial<Logger> = {};

export function createTreeResolver(options: TreeResolverOptions): TreeResolver {
  const { factory } = options;
  const logger = options.logger ?? noopLogger;
  const parentCycle = options.parentCycle ?? 'error';

  const resolveParent = (node: AttributeNode) => node.getNode(FieldKey.Parent, FieldKey.LegacyParent);

  function* lineage(node: AttributeNode): Generator<AttributeNode> {
    const visited = new Set<string>();
    let current: AttributeNode | undefined = node;
    while (current) {
      if (visited.has(current.id)) {
        if (parentCycle === 'error') {
          throw createRuntimeError(
            RuntimeErrorCode.PARENT_CYCLE,
            `Parent chain of node "${node.id}" loops back to node "${current.id}".`,
            {
              nodeId: current.id,
              suggestion: 'Fix the Parent references in the document, or set FORMTREE_PARENT_CYCLE=stop.',
            },
          );
        }
        logger.warn?.('tree.parent.cycle', { nodeId: node.id, repeatedId: current.id });
        return;
      }
      visited.add(current.id);
      yield current;
      current = resolveParent(current);
    }
  }

  const findInheritedName = (node: AttributeNode, key: string) => {
    for (const current of lineage(node)) {
      const value = current.getName(key);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  };

  const fullyQualifiedName = (node: AttributeNode) => {
    const names: string[] = [];
    for (const current of lineage(node)) {
      const name = current.getString(FieldKey.PartialName);
      if (name !== undefined) {
        names.unshift(name);
      }
    }
    return names.join('.');
  };

  const classifyKid = (form: FormContext, node: AttributeNode): FieldKid => {
    const kind = classifyNode(node, resolveParent(node));
    return kind === 'widget'
      ? { kind: 'widget', widget: new WidgetAnnotation(node) }
      : { kind: 'field', field: factory.createField(form, node) };
  };

  const listKids = (form: FormContext, node: AttributeNode) => {
    const raw = node.getArray(FieldKey.Kids);
    if (!raw) {
      return undefined;
    }
    const entries: FieldKid[] = [];
    for (let index = 0; index < raw.length; index += 1) {
      const kid = raw.get(index);
      if (!kid) {
        logger.debug?.('tree.kids.dangling', { nodeId: node.id, index });
        continue;
      }
      entries.push(classifyKid(form, kid));
    }
    return new FieldKids(entries, raw);
  };

  const findWidget = (form: FormContext, node: AttributeNode) => {
    const kids = listKids(form, node);
    if (!kids) {
      return new WidgetAnnotation(node);
    }
    const first = kids.at(0);
    if (!first) {
      return undefined;
    }
    return first.kind === 'widget' ? first.widget : first.field.widget();
  };

  const findKid = (
    form: FormContext,
    node: AttributeNode,
    segments: readonly string[],
    index: number,
  ): FormField | undefined => {
    if (!Number.isInteger(index) || index < 0 || index >= segments.length) {
      throw createRuntimeError(
        RuntimeErrorCode.INVALID_PATH_INDEX,
        `Path index ${index} is outside the ${segments.length} name segment(s).`,
        { nodeId: node.id, fieldPath: [...segments] },
      );
    }
    const raw = node.getArray(FieldKey.Kids);
    if (!raw) {
      return undefined;
    }
    const segment = segments[index];
    for (let position = 0; position < raw.length; position += 1) {
      const kid = raw.get(position);
      if (!kid || kid.getString(FieldKey.PartialName) !== segment) {
        continue;
      }
      const field = factory.createField(form, kid);
      return index + 1 < segments.length ? field.findKid(segments, index + 1) : field;
    }
    return undefined;
  };

  return {
    createField: (form, node) => factory.createField(form, node),
    resolveParent,
    lineage,
    findInheritedName,
    fullyQualifiedName,
    classifyKid,
    listKids,
    findWidget,
    findKid,
  };
}
