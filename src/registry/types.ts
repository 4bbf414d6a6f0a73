/**
 * Registry types: FieldSpec, MethodSpec, and the serialisable registry index.
 */

import { Type, type Static } from '@sinclair/typebox';

export interface FieldSpec {
  readonly name: string;
  readonly dataType: string;
  readonly isSystem: boolean;
  readonly isAuditable: boolean;
}

export interface MethodSpec {
  readonly ownerType: string;
  readonly name: string;
  readonly parameterNames: readonly string[];
  readonly sourceLocation: string;
}

export interface TypeDefinition {
  readonly name: string;
  readonly module: string;
  readonly fields: readonly FieldSpec[];
  readonly methods: readonly MethodSpec[];
}

/** A snapshot of everything the extractor needs from the registry. */
export interface RegistryIndex {
  readonly types: readonly TypeDefinition[];
  readonly hookMethods: readonly MethodSpec[];
}

// ── On-disk shapes (snake_case, as written in YAML/JSON) ───────────

export const IDENTIFIER_PATTERN = '^[A-Za-z_][A-Za-z0-9_]*$';

export const FieldEntrySchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  data_type: Type.Optional(Type.String({ minLength: 1 })),
  system: Type.Optional(Type.Boolean()),
  auditable: Type.Optional(Type.Boolean()),
});

export const MethodEntrySchema = Type.Object({
  name: Type.String({ pattern: IDENTIFIER_PATTERN }),
  params: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  source: Type.Optional(Type.String()),
});

export const HookMethodEntrySchema = Type.Object({
  owner: Type.String({ minLength: 1 }),
  name: Type.String({ pattern: IDENTIFIER_PATTERN }),
  params: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  source: Type.Optional(Type.String()),
});

export const TypeEntrySchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  module: Type.Optional(Type.String({ minLength: 1 })),
  fields: Type.Optional(Type.Array(FieldEntrySchema)),
  methods: Type.Optional(Type.Array(MethodEntrySchema)),
});

export const RegistryIndexFileSchema = Type.Object({
  types: Type.Array(TypeEntrySchema),
  hook_methods: Type.Optional(Type.Array(HookMethodEntrySchema)),
});

export const HooksFileSchema = Type.Object({
  exported_methods: Type.Optional(Type.Array(HookMethodEntrySchema)),
});

export type FieldEntry = Static<typeof FieldEntrySchema>;
export type MethodEntry = Static<typeof MethodEntrySchema>;
export type HookMethodEntry = Static<typeof HookMethodEntrySchema>;
export type TypeEntry = Static<typeof TypeEntrySchema>;
export type RegistryIndexFile = Static<typeof RegistryIndexFileSchema>;
export type HooksFile = Static<typeof HooksFileSchema>;

export const DEFAULT_DATA_TYPE = 'data';
export const DEFAULT_MODULE = 'Core';

export function toFieldSpec(entry: FieldEntry): FieldSpec {
  return {
    name: entry.name,
    dataType: entry.data_type ?? DEFAULT_DATA_TYPE,
    isSystem: entry.system ?? false,
    isAuditable: entry.auditable ?? false,
  };
}

export function toMethodSpec(ownerType: string, entry: MethodEntry, defaultSource: string): MethodSpec {
  return {
    ownerType,
    name: entry.name,
    parameterNames: [...(entry.params ?? [])],
    sourceLocation: entry.source ?? defaultSource,
  };
}

export function toHookMethodSpec(entry: HookMethodEntry, defaultSource: string): MethodSpec {
  return toMethodSpec(entry.owner, entry, defaultSource);
}

export function toTypeDefinition(entry: TypeEntry, defaultModule: string, defaultSource: string): TypeDefinition {
  return {
    name: entry.name,
    module: entry.module ?? defaultModule,
    fields: (entry.fields ?? []).map(toFieldSpec),
    methods: (entry.methods ?? []).map((m) => toMethodSpec(entry.name, m, defaultSource)),
  };
}
