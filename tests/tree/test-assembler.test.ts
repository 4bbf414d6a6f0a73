import { describe, it, expect } from 'vitest';
import { assembleTree } from '../../src/tree/assembler.js';
import { countLeaves, walkTree, type OwnerDescriptors } from '../../src/tree/types.js';
import { buildDescriptors } from '../../src/descriptors/builder.js';
import { InvalidInputError } from '../../src/errors.js';
import { customerType, invoiceType } from '../helpers.js';

function groups(): OwnerDescriptors[] {
  return [invoiceType(), customerType()].map((t) => ({
    ownerType: t.name,
    module: t.module,
    descriptors: buildDescriptors(t.name, t.fields, t.methods),
  }));
}

describe('assembleTree', () => {
  it('places one folder per owner under the root with flat grouping', () => {
    const root = assembleTree(groups(), 'flat');
    expect(root.name).toBe('API');
    expect(root.remoteId).toBeNull();
    expect(root.children.map((c) => c.name)).toEqual(['Customer', 'Invoice']);
    expect(countLeaves(root)).toBe(11);
  });

  it('orders leaves by name', () => {
    const root = assembleTree(groups(), 'flat', 'Backend');
    expect(root.name).toBe('Backend');
    const invoice = root.children[1];
    expect(invoice.kind).toBe('folder');
    if (invoice.kind !== 'folder') return;
    expect(invoice.children.map((c) => c.name)).toEqual([
      'Create Invoice',
      'Delete Invoice',
      'List Invoice',
      'Retrieve Invoice',
      'Update Invoice',
      'calculate_discount',
    ]);
  });

  it('nests owner folders inside module folders with module grouping', () => {
    const root = assembleTree(groups(), 'module');
    const keys = [...walkTree(root)].filter(({ node }) => node.kind === 'folder').map(({ key }) => key);
    expect(keys).toEqual(['', 'Accounts', 'Accounts/Invoice', 'Selling', 'Selling/Customer']);
  });

  it('does not depend on input order', () => {
    expect(assembleTree([...groups()].reverse(), 'flat')).toEqual(assembleTree(groups(), 'flat'));
  });

  it('returns a frozen tree', () => {
    const root = assembleTree(groups(), 'flat');
    expect(Object.isFrozen(root)).toBe(true);
    expect(Object.isFrozen(root.children)).toBe(true);
    expect(Object.isFrozen(root.children[0])).toBe(true);
  });

  it('rejects duplicate owners', () => {
    const g = groups();
    expect(() => assembleTree([...g, g[0]], 'flat')).toThrow(InvalidInputError);
  });

  it('rejects duplicate leaf names under one owner', () => {
    const [invoice] = groups();
    const duplicated = { ...invoice, descriptors: [...invoice.descriptors, invoice.descriptors[0]] };
    expect(() => assembleTree([duplicated], 'flat')).toThrow("Duplicate endpoint name 'List Invoice' under 'Invoice'");
  });

  it('builds an empty root for no owners', () => {
    const root = assembleTree([], 'flat');
    expect(root.children).toEqual([]);
    expect(countLeaves(root)).toBe(0);
  });
});
