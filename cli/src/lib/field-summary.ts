import { FieldFlag, type FormField } from '@formtree/core';

export interface FieldSummary {
  qualifiedName: string;
  partialName?: string;
  fieldType?: string;
  flags: number;
  /** Number of ancestors above the field. */
  depth: number;
  /** Widgets listed as kids, or 1 for a field whose widget is merged into its own node. */
  widgetCount: number;
}

export function summarizeField(field: FormField): FieldSummary {
  const kids = field.kids();
  const ancestors = [...field.getForm().resolver.lineage(field.getNode())].length - 1;
  return {
    qualifiedName: field.fullyQualifiedName(),
    partialName: field.partialName(),
    fieldType: field.fieldType(),
    flags: field.flags(),
    depth: ancestors,
    widgetCount: kids ? kids.widgets().length : 1,
  };
}

export function describeFlags(flags: number): string {
  const labels: Array<[number, string]> = [
    [FieldFlag.READ_ONLY, 'read-only'],
    [FieldFlag.REQUIRED, 'required'],
    [FieldFlag.NO_EXPORT, 'no-export'],
  ];
  const names = labels.filter(([flag]) => (flags & flag) !== 0).map(([, label]) => label);
  return names.length > 0 ? names.join(', ') : 'none';
}
