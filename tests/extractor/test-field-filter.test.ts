import { describe, it, expect } from 'vitest';
import { bodyFields, isExcludedField, normalizeDataType } from '../../src/extractor/field-filter.js';
import { field } from '../helpers.js';

describe('normalizeDataType', () => {
  it('lowercases and joins words with underscores', () => {
    expect(normalizeDataType('Section Break')).toBe('section_break');
    expect(normalizeDataType(' column-break ')).toBe('column_break');
    expect(normalizeDataType('Currency')).toBe('currency');
  });
});

describe('isExcludedField', () => {
  it('excludes system and auditable fields', () => {
    expect(isExcludedField(field('name', { isSystem: true }))).toBe(true);
    expect(isExcludedField(field('modified', { isAuditable: true }))).toBe(true);
    expect(isExcludedField(field('amount'))).toBe(false);
  });

  it('excludes layout-only fields', () => {
    expect(isExcludedField(field('details_section', { dataType: 'Section Break' }))).toBe(true);
    expect(isExcludedField(field('col', { dataType: 'Column Break' }))).toBe(true);
    expect(isExcludedField(field('submit_btn', { dataType: 'Button' }))).toBe(true);
  });
});

describe('bodyFields', () => {
  it('keeps declaration order of the remaining fields', () => {
    const fields = [
      field('name', { isSystem: true }),
      field('customer'),
      field('sb', { dataType: 'Section Break' }),
      field('amount'),
      field('owner', { isAuditable: true }),
    ];
    expect(bodyFields(fields).map((f) => f.name)).toEqual(['customer', 'amount']);
  });
});
