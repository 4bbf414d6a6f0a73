/**
 * Loading and dumping the serialisable registry index.
 */

import { existsSync, readFileSync } from 'node:fs';
import type { TSchema, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError, toError } from '../errors.js';
import {
  DEFAULT_MODULE,
  RegistryIndexFileSchema,
  toHookMethodSpec,
  toTypeDefinition,
  type MethodSpec,
  type RegistryIndex,
  type RegistryIndexFile,
} from './types.js';

/** Validate parsed YAML/JSON against a TypeBox schema, raising ConfigError with every problem found. */
export function checkFile<S extends TSchema>(schema: S, data: unknown, source: string): Static<S> {
  if (Value.Check(schema, data)) {
    return data;
  }
  const problems = [...Value.Errors(schema, data)].map((e) => `${e.path || '/'}: ${e.message}`);
  throw new ConfigError(`Invalid content in ${source}: ${problems.join('; ')}`);
}

export function readYamlFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new ConfigNotFoundError(filePath);
  }
  try {
    return yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${filePath}`, { cause: toError(e) });
  }
}

export function parseRegistryIndex(data: unknown, source: string = '<inline>'): RegistryIndex {
  const file = checkFile(RegistryIndexFileSchema, data, source);
  return {
    types: file.types.map((t) => toTypeDefinition(t, DEFAULT_MODULE, source)),
    hookMethods: (file.hook_methods ?? []).map((h) => toHookMethodSpec(h, source)),
  };
}

/** Read a registry index written as YAML or JSON (JSON is a YAML subset). */
export function loadRegistryIndex(indexPath: string): RegistryIndex {
  return parseRegistryIndex(readYamlFile(indexPath), indexPath);
}

export function dumpRegistryIndex(index: RegistryIndex, format: 'json' | 'yaml' = 'yaml'): string {
  const file: RegistryIndexFile = {
    types: index.types.map((t) => ({
      name: t.name,
      module: t.module,
      fields: t.fields.map((f) => ({
        name: f.name,
        data_type: f.dataType,
        system: f.isSystem,
        auditable: f.isAuditable,
      })),
      methods: t.methods.map(methodEntry),
    })),
    hook_methods: index.hookMethods.map((m) => ({ owner: m.ownerType, ...methodEntry(m) })),
  };
  if (format === 'yaml') {
    return yaml.dump(file, { flowLevel: -1, noRefs: true });
  }
  return JSON.stringify(file, null, 2);
}

function methodEntry(m: MethodSpec): { name: string; params: string[]; source: string } {
  return { name: m.name, params: [...m.parameterNames], source: m.sourceLocation };
}
