/**
 * Which fields appear in generated request bodies.
 */

import type { FieldSpec } from '../registry/types.js';

/** Data types that only shape a form and never carry a value. */
export const LAYOUT_DATA_TYPES: ReadonlySet<string> = new Set([
  'section_break',
  'column_break',
  'tab_break',
  'html',
  'button',
]);

/** 'Section Break', 'section-break' and 'section_break' name the same type. */
export function normalizeDataType(dataType: string): string {
  return dataType.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function isExcludedField(field: FieldSpec): boolean {
  return field.isSystem || field.isAuditable || LAYOUT_DATA_TYPES.has(normalizeDataType(field.dataType));
}

/** Fields that belong in an example body, in declaration order. */
export function bodyFields(fields: readonly FieldSpec[]): FieldSpec[] {
  return fields.filter((f) => !isExcludedField(f));
}
