import { describe, it, expect } from 'vitest';
import { MetadataExtractor, Scope, mergeMethods, scopeKey } from '../../src/extractor/extractor.js';
import { StaticSchemaReader, type SchemaReader } from '../../src/registry/reader.js';
import { NotFoundError } from '../../src/errors.js';
import { ContextLogger, MemoryOutput } from '../../src/observability/context-logger.js';
import { customerType, invoiceType, method, sampleIndex, typeDef } from '../helpers.js';

describe('scopeKey', () => {
  it('names each scope kind', () => {
    expect(scopeKey(Scope.type('Invoice'))).toBe('type:Invoice');
    expect(scopeKey(Scope.module('Accounts'))).toBe('module:Accounts');
    expect(scopeKey(Scope.all())).toBe('all');
  });
});

describe('mergeMethods', () => {
  it('lets controller methods shadow hook methods and drops other owners', () => {
    const controller = [method('Invoice', 'submit', [], 'controller')];
    const hooks = [
      method('Invoice', 'submit', ['force'], 'hooks'),
      method('Invoice', 'remind', ['days'], 'hooks'),
      method('Customer', 'merge', [], 'hooks'),
    ];
    const merged = mergeMethods('Invoice', controller, hooks);
    expect(merged.map((m) => [m.name, m.sourceLocation])).toEqual([
      ['submit', 'controller'],
      ['remind', 'hooks'],
    ]);
  });
});

describe('MetadataExtractor', () => {
  it('extracts a single type with controller and hook methods', async () => {
    const reader = new StaticSchemaReader(
      sampleIndex({ hookMethods: [method('Invoice', 'send_reminder', ['days'], 'accounts/hooks.yaml')] }),
    );
    const { entries, failures } = await new MetadataExtractor({ reader }).extract(Scope.type('Invoice'));
    expect(failures).toEqual([]);
    expect(entries).toHaveLength(1);
    expect(entries[0].ownerType).toBe('Invoice');
    expect(entries[0].module).toBe('Accounts');
    expect(entries[0].fields.map((f) => f.name)).toEqual(['name', 'amount', 'customer']);
    expect(entries[0].methods.map((m) => m.name)).toEqual(['calculate_discount', 'send_reminder']);
  });

  it('extracts every type of a module', async () => {
    const reader = new StaticSchemaReader({
      types: [invoiceType(), customerType(), typeDef('Payment Entry', { module: 'Accounts' })],
      hookMethods: [],
    });
    const { entries } = await new MetadataExtractor({ reader }).extract(Scope.module('Accounts'));
    expect(entries.map((e) => e.ownerType)).toEqual(['Invoice', 'Payment Entry']);
  });

  it('extracts all types except excluded ones', async () => {
    const reader = new StaticSchemaReader({
      types: [invoiceType(), customerType(), typeDef('Test Record')],
      hookMethods: [],
    });
    const extractor = new MetadataExtractor({ reader, excludedTypes: ['Test*'] });
    const { entries } = await extractor.extract(Scope.all());
    expect(entries.map((e) => e.ownerType)).toEqual(['Invoice', 'Customer']);
  });

  it('throws NotFoundError for an unknown or excluded type scope', async () => {
    const reader = new StaticSchemaReader(sampleIndex());
    const extractor = new MetadataExtractor({ reader, excludedTypes: ['Customer'] });
    await expect(extractor.extract(Scope.type('Ghost'))).rejects.toThrow(NotFoundError);
    await expect(extractor.extract(Scope.type('Customer'))).rejects.toThrow('Type not found: Customer');
  });

  it('yields nothing for an unknown module', async () => {
    const reader = new StaticSchemaReader(sampleIndex());
    const result = await new MetadataExtractor({ reader }).extract(Scope.module('Nowhere'));
    expect(result).toEqual({ entries: [], failures: [] });
  });

  it('records a failing type and continues with the rest', async () => {
    const base = new StaticSchemaReader(sampleIndex());
    const reader: SchemaReader = {
      listTypes: (module) => base.listTypes(module),
      hasType: (name) => base.hasType(name),
      getModule: (name) => base.getModule(name),
      getFields: async (name) => {
        if (name === 'Invoice') throw new Error('registry offline');
        return base.getFields(name);
      },
      getMethods: (name) => base.getMethods(name),
      getHookMethods: () => base.getHookMethods(),
    };
    const output = new MemoryOutput();
    const extractor = new MetadataExtractor({ reader, logger: new ContextLogger({ output }) });

    const { entries, failures } = await extractor.extract(Scope.all());
    expect(entries.map((e) => e.ownerType)).toEqual(['Customer']);
    expect(failures).toHaveLength(1);
    expect(failures[0].ownerType).toBe('Invoice');
    expect(failures[0].error.message).toBe('registry offline');
    expect(output.entries()[0].message).toBe('Failed to read type metadata');
  });

  it('streams owners one at a time', async () => {
    const reader = new StaticSchemaReader(sampleIndex());
    const seen: string[] = [];
    for await (const item of new MetadataExtractor({ reader }).stream(Scope.all())) {
      if (item.status === 'ok') seen.push(item.owner.ownerType);
    }
    expect(seen).toEqual(['Invoice', 'Customer']);
  });
});
