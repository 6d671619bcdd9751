import {
  loadFormDocument,
  type Logger,
  type ParentCyclePolicy,
} from '@formtree/core';
import { summarizeField, type FieldSummary } from '../lib/field-summary.js';
import { expandPath } from '../lib/path.js';

export interface FieldFindOptions {
  documentPath: string;
  qualifiedName: string;
  parentCycle?: ParentCyclePolicy;
  logger?: Partial<Logger>;
}

export interface FieldFindResult {
  path: string;
  qualifiedName: string;
  found: boolean;
  field?: FieldSummary;
  /** Kids of the field as `field <name>` or `widget`, in document order. */
  kids?: string[];
}

export async function runFieldFind(options: FieldFindOptions): Promise<FieldFindResult> {
  const normalized = options.documentPath?.trim();
  const qualifiedName = options.qualifiedName?.trim();
  if (!normalized || !qualifiedName) {
    throw new Error('Usage: formtree find <document.yaml> <qualified.name>.');
  }
  const path = expandPath(normalized);
  const { form } = await loadFormDocument(path, {
    parentCycle: options.parentCycle,
    logger: options.logger,
  });

  const field = form.findField(qualifiedName);
  if (!field) {
    return { path, qualifiedName, found: false };
  }
  const kids = field.kids()?.toArray().map((kid) =>
    kid.kind === 'widget' ? 'widget' : `field ${kid.field.partialName() ?? '(unnamed)'}`,
  );
  return { path, qualifiedName, found: true, field: summarizeField(field), kids };
}
