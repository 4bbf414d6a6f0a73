/**
 * Shared fixtures for tests.
 */

import type { FieldSpec, MethodSpec, RegistryIndex, TypeDefinition } from '../src/registry/types.js';

export function field(name: string, overrides: Partial<Omit<FieldSpec, 'name'>> = {}): FieldSpec {
  return { name, dataType: 'data', isSystem: false, isAuditable: false, ...overrides };
}

export function method(ownerType: string, name: string, parameterNames: string[] = [], sourceLocation = 'controller'): MethodSpec {
  return { ownerType, name, parameterNames, sourceLocation };
}

export function typeDef(
  name: string,
  options: { module?: string; fields?: readonly FieldSpec[]; methods?: readonly MethodSpec[] } = {},
): TypeDefinition {
  return {
    name,
    module: options.module ?? 'Core',
    fields: options.fields ?? [],
    methods: options.methods ?? [],
  };
}

/** Invoice: one system field, two body fields, one exported method. */
export function invoiceType(): TypeDefinition {
  return typeDef('Invoice', {
    module: 'Accounts',
    fields: [
      field('name', { isSystem: true }),
      field('amount', { dataType: 'currency' }),
      field('customer', { dataType: 'link' }),
    ],
    methods: [method('Invoice', 'calculate_discount', ['discount_percent'], 'accounts/invoice.py')],
  });
}

export function customerType(): TypeDefinition {
  return typeDef('Customer', {
    module: 'Selling',
    fields: [field('customer_name'), field('modified', { isAuditable: true })],
  });
}

export function sampleIndex(extra: Partial<RegistryIndex> = {}): RegistryIndex {
  return {
    types: extra.types ?? [invoiceType(), customerType()],
    hookMethods: extra.hookMethods ?? [],
  };
}

/** Sleep stand-in that records requested delays and returns immediately. */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
