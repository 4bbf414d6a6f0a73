/**
 * Read-only facade over the schema registry.
 */

import { InvalidInputError, NotFoundError } from '../errors.js';
import type { FieldSpec, MethodSpec, RegistryIndex, TypeDefinition } from './types.js';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Capability the extractor consumes. Implementations may answer
 * synchronously or asynchronously.
 */
export interface SchemaReader {
  /** Type names, optionally restricted to one module. An unknown module yields []. */
  listTypes(module?: string): MaybePromise<readonly string[]>;
  hasType(typeName: string): MaybePromise<boolean>;
  getModule(typeName: string): MaybePromise<string>;
  getFields(typeName: string): MaybePromise<readonly FieldSpec[]>;
  /** Methods attached directly to the type's controller. */
  getMethods(typeName: string): MaybePromise<readonly MethodSpec[]>;
  /** Module-level hook-registered methods for every owner. */
  getHookMethods(): MaybePromise<readonly MethodSpec[]>;
}

export class StaticSchemaReader implements SchemaReader {
  private readonly _types: Map<string, TypeDefinition> = new Map();
  private readonly _hookMethods: readonly MethodSpec[];

  constructor(index: RegistryIndex) {
    for (const def of index.types) {
      if (this._types.has(def.name)) {
        throw new InvalidInputError(`Duplicate type in registry index: '${def.name}'`);
      }
      this._types.set(def.name, def);
    }
    this._hookMethods = index.hookMethods;
  }

  get size(): number {
    return this._types.size;
  }

  listTypes(module?: string): string[] {
    const names: string[] = [];
    for (const def of this._types.values()) {
      if (module === undefined || def.module === module) {
        names.push(def.name);
      }
    }
    return names;
  }

  hasType(typeName: string): boolean {
    return this._types.has(typeName);
  }

  getModule(typeName: string): string {
    return this._require(typeName).module;
  }

  getFields(typeName: string): readonly FieldSpec[] {
    return this._require(typeName).fields;
  }

  getMethods(typeName: string): readonly MethodSpec[] {
    return this._require(typeName).methods;
  }

  getHookMethods(): readonly MethodSpec[] {
    return this._hookMethods;
  }

  private _require(typeName: string): TypeDefinition {
    const def = this._types.get(typeName);
    if (def === undefined) {
      throw new NotFoundError('Type', typeName);
    }
    return def;
  }
}
