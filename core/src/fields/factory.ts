import type { FieldFactory } from '../tree/types.js';
import { FormField } from './field.js';

export const defaultFieldFactory: FieldFactory = {
  createField: (form, node) => new FormField(form, node),
};
