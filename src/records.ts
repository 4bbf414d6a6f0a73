/**
 * Generator records: what was last generated and synced for each scope.
 */

import type { MaybePromise } from './registry/reader.js';

export enum RecordStatus {
  GENERATED = 'generated',
  SYNCED = 'synced',
  PARTIALLY_SYNCED = 'partially_synced',
  SYNC_FAILED = 'sync_failed',
}

export interface GeneratorRecord {
  /** Scope key, e.g. `type:Invoice`. */
  readonly scope: string;
  readonly descriptorCount: number;
  readonly failedTypes: readonly string[];
  readonly status: RecordStatus;
  readonly generatedAt: string;
  readonly syncedAt: string | null;
  readonly lastRunId: string | null;
}

/** Persistence capability for generator records. */
export interface KeyValueStore<V> {
  get(key: string): MaybePromise<V | undefined>;
  set(key: string, value: V): MaybePromise<void>;
  delete(key: string): MaybePromise<boolean>;
  keys(): MaybePromise<readonly string[]>;
}

export class MemoryKeyValueStore<V> implements KeyValueStore<V> {
  private readonly _data: Map<string, V> = new Map();

  get size(): number {
    return this._data.size;
  }

  get(key: string): V | undefined {
    return this._data.get(key);
  }

  set(key: string, value: V): void {
    this._data.set(key, value);
  }

  delete(key: string): boolean {
    return this._data.delete(key);
  }

  keys(): string[] {
    return [...this._data.keys()].sort();
  }
}
