import { parse as parseYaml } from 'yaml';
import { promises as fs } from 'node:fs';
import { resolve } from 'node:path';
import type { ParentCyclePolicy } from '../config.js';
import { ParserErrorCode, createParserError } from '../errors/index.js';
import { InteractiveForm } from '../form.js';
import type { Logger } from '../logger.js';
import {
  createMemoryStore,
  type AttributeValue,
  type MemoryAttributeStore,
  type MemoryNode,
} from '../store/memory-store.js';
import { FieldKey, FormKey } from '../store/types.js';
import type { FieldFactory } from '../tree/types.js';

/**
 * Form documents describe a field tree in YAML:
 *
 * ```yaml
 * fields:
 *   - name: person
 *     fieldType: Tx
 *     kids:
 *       - name: first
 *         flags: 2
 *       - subtype: Widget
 *       - ref: shared-node
 * ```
 */

export interface FormDocumentOptions {
  /** Used in error locations only. */
  filePath?: string;
  factory?: FieldFactory;
  logger?: Partial<Logger>;
  parentCycle?: ParentCyclePolicy;
}

export interface FormDocument {
  form: InteractiveForm;
  store: MemoryAttributeStore;
}

type ParentKeyOption = 'Parent' | 'P' | 'none';

/** Ids of nodes the loader creates itself; document ids and refs may not use it. */
const GENERATED_ID_PREFIX = '#';

const MAX_FLAGS = 0xffffffff;

const ENTRY_KEYS = new Set(['id', 'name', 'fieldType', 'flags', 'subtype', 'parentKey', 'kids', 'ref']);

interface EntryContext {
  store: MemoryAttributeStore;
  filePath?: string;
}

export function parseFormDocument(contents: string, options: FormDocumentOptions = {}): FormDocument {
  const { filePath } = options;
  const raw = parseDocumentYaml(contents, filePath);
  const fields = isRecord(raw) ? raw.fields : undefined;
  if (!Array.isArray(fields)) {
    throw createParserError(
      ParserErrorCode.INVALID_FIELDS_SECTION,
      'Form document must be a mapping with a "fields" list.',
      { filePath, suggestion: 'Start the document with "fields:" followed by a list of field entries.' },
    );
  }

  const store = createMemoryStore({ idPrefix: GENERATED_ID_PREFIX });
  const context: EntryContext = { store, filePath };
  const root = store.createNode();
  const items = fields.map((entry: unknown, index: number) =>
    buildEntry(entry, context, undefined, [`fields[${index}]`]),
  );
  root.setRaw(FormKey.Fields, { kind: 'array', items });

  const form = new InteractiveForm(store, {
    root,
    factory: options.factory,
    logger: options.logger,
    parentCycle: options.parentCycle,
  });
  options.logger?.debug?.('document.loaded', {
    filePath,
    nodes: store.size,
    topLevelFields: items.length,
  });
  return { form, store };
}

export async function loadFormDocument(
  filePath: string,
  options: Omit<FormDocumentOptions, 'filePath'> = {},
): Promise<FormDocument> {
  const absolute = resolve(filePath);
  const contents = await fs.readFile(absolute, 'utf8');
  return parseFormDocument(contents, { ...options, filePath: absolute });
}

function parseDocumentYaml(contents: string, filePath: string | undefined): unknown {
  try {
    return parseYaml(contents);
  } catch (error) {
    throw createParserError(
      ParserErrorCode.INVALID_YAML_DOCUMENT,
      `Form document is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
      { filePath, cause: error },
    );
  }
}

function buildEntry(
  raw: unknown,
  context: EntryContext,
  parent: MemoryNode | undefined,
  path: string[],
): AttributeValue {
  if (raw === null) {
    return { kind: 'null' };
  }
  if (!isRecord(raw)) {
    throw entryError(context, path, 'Field entry must be a mapping.');
  }
  for (const key of Object.keys(raw)) {
    if (!ENTRY_KEYS.has(key)) {
      throw entryError(context, path, `Unknown key "${key}" in field entry.`);
    }
  }

  const { ref, flags, kids } = raw;
  if (ref !== undefined) {
    if (typeof ref !== 'string' || Object.keys(raw).length !== 1) {
      throw entryError(context, path, 'A "ref" entry must hold a single node id and nothing else.');
    }
    if (ref.startsWith(GENERATED_ID_PREFIX)) {
      throw reservedIdError(context, path, 'ref');
    }
    return { kind: 'reference', id: ref };
  }

  const node = createEntryNode(raw.id, context, path);

  if (raw.name !== undefined) {
    node.setString(FieldKey.PartialName, expectString(raw.name, 'name', context, path));
  }
  if (raw.fieldType !== undefined) {
    node.setName(FieldKey.FieldType, expectString(raw.fieldType, 'fieldType', context, path));
  }
  if (raw.subtype !== undefined) {
    node.setName(FieldKey.Subtype, expectString(raw.subtype, 'subtype', context, path));
  }
  if (flags !== undefined) {
    if (typeof flags !== 'number' || !Number.isInteger(flags) || flags < 0 || flags > MAX_FLAGS) {
      throw attributeError(context, path, 'flags', 'an unsigned 32-bit integer');
    }
    node.setInteger(FieldKey.Flags, flags);
  }

  const parentKey = parseParentKey(raw.parentKey, context, path);
  if (parent && parentKey !== 'none') {
    node.setNode(parentKey === 'P' ? FieldKey.LegacyParent : FieldKey.Parent, parent);
  }

  if (kids !== undefined) {
    if (!Array.isArray(kids)) {
      throw attributeError(context, path, 'kids', 'a list');
    }
    const items = kids.map((kid: unknown, index: number) =>
      buildEntry(kid, context, node, [...path, `kids[${index}]`]),
    );
    node.setRaw(FieldKey.Kids, { kind: 'array', items });
  }

  return { kind: 'reference', id: node.id };
}

function createEntryNode(id: unknown, context: EntryContext, path: string[]): MemoryNode {
  if (id === undefined) {
    return context.store.createNode();
  }
  if (typeof id !== 'string' || id.length === 0) {
    throw attributeError(context, path, 'id', 'a non-empty string');
  }
  if (id.startsWith(GENERATED_ID_PREFIX)) {
    throw reservedIdError(context, path, 'id');
  }
  if (context.store.getNode(id)) {
    throw createParserError(ParserErrorCode.DUPLICATE_NODE_ID, `Node id "${id}" is declared twice.`, {
      filePath: context.filePath,
      fieldPath: path,
    });
  }
  return context.store.createNode(id);
}

function parseParentKey(value: unknown, context: EntryContext, path: string[]): ParentKeyOption {
  if (value === undefined) {
    return 'Parent';
  }
  if (value === 'Parent' || value === 'P' || value === 'none') {
    return value;
  }
  throw attributeError(context, path, 'parentKey', 'one of Parent, P, none');
}

function expectString(value: unknown, key: string, context: EntryContext, path: string[]): string {
  if (typeof value !== 'string') {
    throw attributeError(context, path, key, 'a string');
  }
  return value;
}

function entryError(context: EntryContext, path: string[], message: string) {
  return createParserError(ParserErrorCode.INVALID_FIELD_ENTRY, message, {
    filePath: context.filePath,
    fieldPath: path,
  });
}

function attributeError(context: EntryContext, path: string[], key: string, expected: string) {
  return createParserError(
    ParserErrorCode.INVALID_ATTRIBUTE_VALUE,
    `Field attribute "${key}" must be ${expected}.`,
    { filePath: context.filePath, fieldPath: path, context: `attribute '${key}'` },
  );
}

function reservedIdError(context: EntryContext, path: string[], key: string) {
  return createParserError(
    ParserErrorCode.INVALID_ATTRIBUTE_VALUE,
    `Field attribute "${key}" must not start with "${GENERATED_ID_PREFIX}".`,
    {
      filePath: context.filePath,
      fieldPath: path,
      context: `attribute '${key}'`,
      suggestion: `Ids starting with "${GENERATED_ID_PREFIX}" are reserved for generated nodes.`,
    },
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
