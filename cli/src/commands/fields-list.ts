import {
  loadFormDocument,
  type Logger,
  type ParentCyclePolicy,
} from '@formtree/core';
import { summarizeField, type FieldSummary } from '../lib/field-summary.js';
import { expandPath } from '../lib/path.js';

export interface FieldsListOptions {
  documentPath: string;
  parentCycle?: ParentCyclePolicy;
  logger?: Partial<Logger>;
}

export interface FieldsListResult {
  path: string;
  fields: FieldSummary[];
}

export async function runFieldsList(options: FieldsListOptions): Promise<FieldsListResult> {
  const normalized = options.documentPath?.trim();
  if (!normalized) {
    throw new Error('Document path is required for fields. Usage: formtree fields <document.yaml>.');
  }
  const path = expandPath(normalized);
  const { form } = await loadFormDocument(path, {
    parentCycle: options.parentCycle,
    logger: options.logger,
  });

  const fields = [...form.walk()].map(summarizeField);
  options.logger?.debug?.('cli.fields.listed', { path, count: fields.length });
  return { path, fields };
}
