/**
 * Placeholder values for example request bodies, keyed by field data type.
 */

import { normalizeDataType } from '../extractor/field-filter.js';
import type { JsonValue } from './types.js';

const NUMERIC_TYPES = new Set(['int', 'integer', 'float', 'currency', 'percent', 'check', 'duration', 'rating']);
const LIST_TYPES = new Set(['table', 'table_multiselect']);

export function placeholderFor(dataType: string): JsonValue {
  const normalized = normalizeDataType(dataType);
  if (NUMERIC_TYPES.has(normalized)) return 0;
  if (LIST_TYPES.has(normalized)) return [];
  if (normalized === 'geolocation') return { latitude: 0, longitude: 0 };
  if (normalized === 'json') return {};
  return '';
}
