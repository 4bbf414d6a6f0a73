/**
 * Metadata extractor: resolves a scope against the schema registry and
 * yields one (owner type, fields, methods) entry per resolved type.
 */

import { NotFoundError, toError } from '../errors.js';
import { silentLogger, type ContextLogger } from '../observability/context-logger.js';
import type { SchemaReader } from '../registry/reader.js';
import type { FieldSpec, MethodSpec } from '../registry/types.js';
import { matchAny } from '../utils/pattern.js';

export type ExtractionScope =
  | { readonly kind: 'type'; readonly name: string }
  | { readonly kind: 'module'; readonly name: string }
  | { readonly kind: 'all' };

export const Scope = Object.freeze({
  type: (name: string): ExtractionScope => ({ kind: 'type', name }),
  module: (name: string): ExtractionScope => ({ kind: 'module', name }),
  all: (): ExtractionScope => ({ kind: 'all' }),
});

/** Stable string key for a scope, e.g. `type:Invoice`, `module:Accounts`, `all`. */
export function scopeKey(scope: ExtractionScope): string {
  return scope.kind === 'all' ? 'all' : `${scope.kind}:${scope.name}`;
}

export interface OwnerMetadata {
  readonly ownerType: string;
  readonly module: string;
  readonly fields: readonly FieldSpec[];
  readonly methods: readonly MethodSpec[];
}

export interface ExtractionFailure {
  readonly ownerType: string;
  readonly error: Error;
}

export type ExtractedOwner =
  | { readonly status: 'ok'; readonly owner: OwnerMetadata }
  | { readonly status: 'failed'; readonly failure: ExtractionFailure };

export interface ExtractionResult {
  readonly entries: OwnerMetadata[];
  readonly failures: ExtractionFailure[];
}

/**
 * Merge controller and hook methods for one owner. The first occurrence of
 * a name wins, so controller methods shadow hook methods of the same name.
 */
export function mergeMethods(
  ownerType: string,
  controllerMethods: readonly MethodSpec[],
  hookMethods: readonly MethodSpec[],
): MethodSpec[] {
  const seen = new Set<string>();
  const merged: MethodSpec[] = [];
  for (const method of [...controllerMethods, ...hookMethods]) {
    if (method.ownerType !== ownerType || seen.has(method.name)) continue;
    seen.add(method.name);
    merged.push(method);
  }
  return merged;
}

export class MetadataExtractor {
  private readonly _reader: SchemaReader;
  private readonly _excludedTypes: readonly string[];
  private readonly _logger: ContextLogger;

  constructor(options: {
    reader: SchemaReader;
    excludedTypes?: readonly string[];
    logger?: ContextLogger;
  }) {
    this._reader = options.reader;
    this._excludedTypes = options.excludedTypes ?? [];
    this._logger = options.logger ?? silentLogger();
  }

  isExcludedType(typeName: string): boolean {
    return matchAny(this._excludedTypes, typeName);
  }

  /**
   * Yield owners one at a time. Types are read lazily, so an `all` scope
   * never holds more than one type's metadata plus the hook list.
   *
   * A `type` scope naming an unknown or excluded type throws NotFoundError
   * on the first iteration. Per-type read errors are yielded as failures.
   */
  async *stream(scope: ExtractionScope): AsyncGenerator<ExtractedOwner> {
    const typeNames = await this._resolveTypeNames(scope);
    if (typeNames.length === 0) {
      this._logger.info('Scope resolved to no types', { scope: scopeKey(scope) });
      return;
    }

    const hooksByOwner = groupByOwner(await this._reader.getHookMethods());

    for (const ownerType of typeNames) {
      try {
        const [module, fields, controllerMethods] = await Promise.all([
          this._reader.getModule(ownerType),
          this._reader.getFields(ownerType),
          this._reader.getMethods(ownerType),
        ]);
        const methods = mergeMethods(ownerType, controllerMethods, hooksByOwner.get(ownerType) ?? []);
        yield { status: 'ok', owner: { ownerType, module, fields: [...fields], methods } };
      } catch (e) {
        const error = toError(e);
        this._logger.warn('Failed to read type metadata', { owner_type: ownerType, error: error.message });
        yield { status: 'failed', failure: { ownerType, error } };
      }
    }
  }

  async extract(scope: ExtractionScope): Promise<ExtractionResult> {
    const entries: OwnerMetadata[] = [];
    const failures: ExtractionFailure[] = [];
    for await (const item of this.stream(scope)) {
      if (item.status === 'ok') {
        entries.push(item.owner);
      } else {
        failures.push(item.failure);
      }
    }
    return { entries, failures };
  }

  private async _resolveTypeNames(scope: ExtractionScope): Promise<string[]> {
    if (scope.kind === 'type') {
      if (this.isExcludedType(scope.name) || !(await this._reader.hasType(scope.name))) {
        throw new NotFoundError('Type', scope.name);
      }
      return [scope.name];
    }

    const listed = scope.kind === 'module'
      ? await this._reader.listTypes(scope.name)
      : await this._reader.listTypes();

    const seen = new Set<string>();
    const names: string[] = [];
    for (const name of listed) {
      if (seen.has(name) || this.isExcludedType(name)) continue;
      seen.add(name);
      names.push(name);
    }
    return names;
  }
}

function groupByOwner(methods: readonly MethodSpec[]): Map<string, MethodSpec[]> {
  const grouped = new Map<string, MethodSpec[]>();
  for (const method of methods) {
    const list = grouped.get(method.ownerType);
    if (list === undefined) {
      grouped.set(method.ownerType, [method]);
    } else {
      list.push(method);
    }
  }
  return grouped;
}
