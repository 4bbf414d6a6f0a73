/**
 * CollectionGenerator: the entry point that ties extraction, building,
 * assembly and sync together for a scope.
 */

import type { CancelToken } from './cancel.js';
import { resolveGeneratorSettings, type Config, type GeneratorSettings, type SyncSettings } from './config.js';
import { buildDescriptors } from './descriptors/builder.js';
import { toError } from './errors.js';
import { MetadataExtractor, Scope, scopeKey, type ExtractionScope } from './extractor/extractor.js';
import { silentLogger, type ContextLogger } from './observability/context-logger.js';
import { MemoryKeyValueStore, RecordStatus, type GeneratorRecord, type KeyValueStore } from './records.js';
import type { SchemaReader } from './registry/reader.js';
import type { RemoteCollectionStore } from './remote/store.js';
import { SyncEngine } from './sync/engine.js';
import type { SyncReport } from './sync/types.js';
import { assembleTree } from './tree/assembler.js';
import type { FolderNode, OwnerDescriptors } from './tree/types.js';

export interface GenerationFailure {
  readonly ownerType: string;
  readonly stage: 'extract' | 'build';
  readonly error: Error;
}

export interface GenerationResult {
  readonly scope: ExtractionScope;
  readonly descriptorCount: number;
  readonly tree: FolderNode;
  readonly owners: readonly OwnerDescriptors[];
  readonly failures: readonly GenerationFailure[];
}

export interface GenerateAndSyncResult {
  readonly generation: GenerationResult;
  readonly report: SyncReport;
}

export class CollectionGenerator {
  private readonly _extractor: MetadataExtractor;
  private readonly _engine: SyncEngine;
  private readonly _settings: GeneratorSettings;
  private readonly _records: KeyValueStore<GeneratorRecord>;
  private readonly _logger: ContextLogger;

  constructor(options: {
    reader: SchemaReader;
    store: RemoteCollectionStore;
    config?: Config | null;
    syncSettings?: Partial<SyncSettings>;
    records?: KeyValueStore<GeneratorRecord>;
    logger?: ContextLogger;
    sleep?: (ms: number) => Promise<void>;
  }) {
    this._settings = resolveGeneratorSettings(options.config);
    this._logger = options.logger ?? silentLogger();
    this._records = options.records ?? new MemoryKeyValueStore<GeneratorRecord>();
    this._extractor = new MetadataExtractor({
      reader: options.reader,
      excludedTypes: this._settings.excludedTypes,
      logger: this._logger,
    });
    this._engine = new SyncEngine({
      store: options.store,
      config: options.config,
      settings: options.syncSettings,
      logger: this._logger,
      sleep: options.sleep,
    });
  }

  get settings(): Readonly<GeneratorSettings> {
    return this._settings;
  }

  get records(): KeyValueStore<GeneratorRecord> {
    return this._records;
  }

  /**
   * Build the canonical tree for `scope`. A type or module that fails to
   * read or build is reported in `failures` and left out of the tree; an
   * unknown type scope throws NotFoundError before anything is built.
   */
  async generate(scope: ExtractionScope): Promise<GenerationResult> {
    const owners: OwnerDescriptors[] = [];
    const failures: GenerationFailure[] = [];

    for await (const item of this._extractor.stream(scope)) {
      if (item.status === 'failed') {
        failures.push({ ownerType: item.failure.ownerType, stage: 'extract', error: item.failure.error });
        continue;
      }
      const { owner } = item;
      try {
        const descriptors = buildDescriptors(owner.ownerType, owner.fields, owner.methods);
        owners.push({ ownerType: owner.ownerType, module: owner.module, descriptors });
      } catch (e) {
        const error = toError(e);
        this._logger.child({ ownerType: owner.ownerType }).warn('Failed to build descriptors', { error: error.message });
        failures.push({ ownerType: owner.ownerType, stage: 'build', error });
      }
    }

    const tree = assembleTree(owners, this._settings.grouping, this._settings.rootName);
    const descriptorCount = owners.reduce((n, o) => n + o.descriptors.length, 0);
    this._logger.info('Generated descriptors', {
      scope: scopeKey(scope),
      owners: owners.length,
      descriptors: descriptorCount,
      failures: failures.length,
    });

    await this._writeRecord(scope, {
      descriptorCount,
      failedTypes: failures.map((f) => f.ownerType),
      status: RecordStatus.GENERATED,
      generatedAt: new Date().toISOString(),
      syncedAt: null,
      lastRunId: null,
    });

    return { scope, descriptorCount, tree, owners, failures };
  }

  /** Reconcile the remote collection with a canonical tree. */
  async sync(canonicalRoot: FolderNode, options?: { cancelToken?: CancelToken }): Promise<SyncReport> {
    return this._engine.sync(canonicalRoot, { cancelToken: options?.cancelToken });
  }

  async generateAndSync(scope: ExtractionScope, options?: { cancelToken?: CancelToken }): Promise<GenerateAndSyncResult> {
    const generation = await this.generate(scope);
    const key = scopeKey(scope);
    let report: SyncReport;
    try {
      report = await this.sync(generation.tree, options);
    } catch (e) {
      await this._updateRecord(key, { status: RecordStatus.SYNC_FAILED });
      throw e;
    }
    await this._updateRecord(key, {
      status: report.status === 'succeeded' ? RecordStatus.SYNCED : RecordStatus.PARTIALLY_SYNCED,
      syncedAt: report.finishedAt,
      lastRunId: report.runId,
    });
    return { generation, report };
  }

  /**
   * Regenerate and sync one type after it was saved in the registry.
   * Resolves to null, doing nothing, for excluded types.
   */
  async onTypeSaved(typeName: string, options?: { cancelToken?: CancelToken }): Promise<GenerateAndSyncResult | null> {
    if (this._extractor.isExcludedType(typeName)) {
      this._logger.debug('Skipping excluded type', { owner_type: typeName });
      return null;
    }
    return this.generateAndSync(Scope.type(typeName), options);
  }

  async getRecord(scope: ExtractionScope): Promise<GeneratorRecord | undefined> {
    return this._records.get(scopeKey(scope));
  }

  private async _writeRecord(scope: ExtractionScope, fields: Omit<GeneratorRecord, 'scope'>): Promise<void> {
    const key = scopeKey(scope);
    await this._records.set(key, { scope: key, ...fields });
  }

  private async _updateRecord(key: string, fields: Partial<Omit<GeneratorRecord, 'scope'>>): Promise<void> {
    const current = await this._records.get(key);
    if (current === undefined) return;
    await this._records.set(key, { ...current, ...fields });
  }
}
