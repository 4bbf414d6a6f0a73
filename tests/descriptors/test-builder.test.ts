import { describe, it, expect } from 'vitest';
import {
  buildCrudDescriptors,
  buildDescriptors,
  buildMethodDescriptor,
  exampleBodyFor,
} from '../../src/descriptors/builder.js';
import { methodPath, ownerTypeOfPath, resourcePath } from '../../src/descriptors/paths.js';
import { placeholderFor } from '../../src/descriptors/placeholders.js';
import { contentHash } from '../../src/utils/hash.js';
import { field, invoiceType, method } from '../helpers.js';

describe('paths', () => {
  it('builds resource and method paths', () => {
    expect(resourcePath('Invoice')).toBe('/api/resource/Invoice');
    expect(resourcePath('Sales Order', true)).toBe('/api/resource/Sales%20Order/{id}');
    expect(methodPath('Invoice', 'calculate_discount')).toBe('/api/method/Invoice/calculate_discount');
  });

  it('recovers the owner type from generated paths only', () => {
    expect(ownerTypeOfPath('/api/resource/Sales%20Order/{id}')).toBe('Sales Order');
    expect(ownerTypeOfPath('/api/method/Invoice/submit')).toBe('Invoice');
    expect(ownerTypeOfPath('/api/method/ping')).toBeNull();
    expect(ownerTypeOfPath('/api/resource/')).toBeNull();
    expect(ownerTypeOfPath('/custom/ping')).toBeNull();
    expect(ownerTypeOfPath('/api/resource/%E0%A4%A')).toBeNull();
  });
});

describe('placeholderFor', () => {
  it('picks a value by data type', () => {
    expect(placeholderFor('Currency')).toBe(0);
    expect(placeholderFor('Int')).toBe(0);
    expect(placeholderFor('Table')).toEqual([]);
    expect(placeholderFor('Table MultiSelect')).toEqual([]);
    expect(placeholderFor('Geolocation')).toEqual({ latitude: 0, longitude: 0 });
    expect(placeholderFor('JSON')).toEqual({});
    expect(placeholderFor('Link')).toBe('');
    expect(placeholderFor('data')).toBe('');
  });
});

describe('exampleBodyFor', () => {
  it('holds only non-excluded fields, first occurrence wins', () => {
    const body = exampleBodyFor([
      field('name', { isSystem: true }),
      field('amount', { dataType: 'Currency' }),
      field('creation', { isAuditable: true }),
      field('customer'),
      field('amount', { dataType: 'Data' }),
    ]);
    expect(body).toEqual({ amount: 0, customer: '' });
    expect(Object.keys(body)).toEqual(['amount', 'customer']);
  });

  it('handles field names that shadow object members', () => {
    expect(exampleBodyFor([field('constructor'), field('toString')])).toEqual({ constructor: '', toString: '' });
  });
});

describe('buildCrudDescriptors', () => {
  it('produces the five CRUD endpoints in order', () => {
    const descriptors = buildCrudDescriptors('Invoice', [field('amount')]);
    expect(descriptors.map((d) => [d.name, d.kind, d.verb, d.pathTemplate])).toEqual([
      ['List Invoice', 'list', 'GET', '/api/resource/Invoice'],
      ['Retrieve Invoice', 'retrieve', 'GET', '/api/resource/Invoice/{id}'],
      ['Create Invoice', 'create', 'POST', '/api/resource/Invoice'],
      ['Update Invoice', 'update', 'PUT', '/api/resource/Invoice/{id}'],
      ['Delete Invoice', 'delete', 'DELETE', '/api/resource/Invoice/{id}'],
    ]);
    expect(descriptors.map((d) => d.exampleBody)).toEqual([null, null, { amount: '' }, { amount: '' }, null]);
    expect(descriptors[0].description).toBe('Get list of Invoice records');
  });
});

describe('buildMethodDescriptor', () => {
  it('posts the parameter names as args', () => {
    const d = buildMethodDescriptor('Invoice', method('Invoice', 'calculate_discount', ['discount_percent'], 'inv.py'));
    expect(d.verb).toBe('POST');
    expect(d.kind).toBe('method');
    expect(d.pathTemplate).toBe('/api/method/Invoice/calculate_discount');
    expect(d.exampleBody).toEqual({ args: ['discount_percent'] });
    expect(d.description).toBe('Call Invoice.calculate_discount(discount_percent), defined in inv.py');
    expect(d.contentHash).toBe(contentHash('POST', '/api/method/Invoice/calculate_discount', { args: ['discount_percent'] }));
  });
});

describe('buildDescriptors', () => {
  it('builds six descriptors for the Invoice owner', () => {
    const invoice = invoiceType();
    const descriptors = buildDescriptors('Invoice', invoice.fields, invoice.methods);

    expect(descriptors).toHaveLength(6);
    for (const d of descriptors.slice(0, 5)) {
      if (d.exampleBody !== null) {
        expect(d.exampleBody).toEqual({ amount: 0, customer: '' });
        expect(Object.keys(d.exampleBody)).not.toContain('name');
      }
    }
    expect(descriptors[5].verb).toBe('POST');
    expect(descriptors[5].exampleBody).toEqual({ args: ['discount_percent'] });
  });

  it('is deterministic', () => {
    const invoice = invoiceType();
    const first = buildDescriptors('Invoice', invoice.fields, invoice.methods);
    const second = buildDescriptors('Invoice', invoice.fields, invoice.methods);
    expect(second).toEqual(first);
    expect(second.map((d) => d.contentHash)).toEqual(first.map((d) => d.contentHash));
  });

  it('gives every descriptor a distinct name and (verb, path)', () => {
    const invoice = invoiceType();
    const descriptors = buildDescriptors('Invoice', invoice.fields, invoice.methods);
    expect(new Set(descriptors.map((d) => d.name)).size).toBe(6);
    expect(new Set(descriptors.map((d) => `${d.verb} ${d.pathTemplate}`)).size).toBe(6);
  });

  it('skips methods whose name is already taken', () => {
    const descriptors = buildDescriptors('Invoice', [], [
      method('Invoice', 'submit'),
      method('Invoice', 'submit', ['again']),
    ]);
    expect(descriptors.map((d) => d.name)).toEqual([
      'List Invoice',
      'Retrieve Invoice',
      'Create Invoice',
      'Update Invoice',
      'Delete Invoice',
      'submit',
    ]);
  });

  it('freezes descriptors', () => {
    const [d] = buildDescriptors('Invoice', [], []);
    expect(Object.isFrozen(d)).toBe(true);
  });
});
