/**
 * Configuration accessor with dot-path key support, plus typed settings.
 */

import { existsSync, readFileSync } from 'node:fs';
import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError, toError } from './errors.js';
import { isRecord } from './utils/index.js';

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  /** Load a YAML or JSON configuration file. An empty file yields an empty config. */
  static load(configPath: string): Config {
    if (!existsSync(configPath)) {
      throw new ConfigNotFoundError(configPath);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(configPath, 'utf-8'));
    } catch (e) {
      throw new ConfigError(`Invalid YAML in configuration file: ${configPath}`, { cause: toError(e) });
    }

    if (parsed === null || parsed === undefined) return new Config();
    if (!isRecord(parsed)) {
      throw new ConfigError(`Configuration file must be a mapping: ${configPath}`);
    }
    return new Config(parsed);
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isRecord(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }
}

export const SyncSettingsSchema = Type.Object({
  concurrency: Type.Integer({ minimum: 1 }),
  maxAttempts: Type.Integer({ minimum: 1 }),
  baseDelayMs: Type.Integer({ minimum: 0 }),
  maxDelayMs: Type.Integer({ minimum: 0 }),
  callTimeoutMs: Type.Integer({ minimum: 1 }),
});

export type SyncSettings = Static<typeof SyncSettingsSchema>;

export const GeneratorSettingsSchema = Type.Object({
  grouping: Type.Union([Type.Literal('flat'), Type.Literal('module')]),
  rootName: Type.String({ minLength: 1 }),
  excludedTypes: Type.Array(Type.String()),
});

export type GeneratorSettings = Static<typeof GeneratorSettingsSchema>;

export const DEFAULT_SYNC_SETTINGS: Readonly<SyncSettings> = Object.freeze<SyncSettings>({
  concurrency: 4,
  maxAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  callTimeoutMs: 10_000,
});

export const DEFAULT_GENERATOR_SETTINGS: Readonly<GeneratorSettings> = Object.freeze<GeneratorSettings>({
  grouping: 'flat',
  rootName: 'API',
  excludedTypes: [],
});

export function resolveSyncSettings(config?: Config | null): SyncSettings {
  const d = DEFAULT_SYNC_SETTINGS;
  const candidate = {
    concurrency: config?.get('sync.concurrency', d.concurrency) ?? d.concurrency,
    maxAttempts: config?.get('sync.max_attempts', d.maxAttempts) ?? d.maxAttempts,
    baseDelayMs: config?.get('sync.base_delay_ms', d.baseDelayMs) ?? d.baseDelayMs,
    maxDelayMs: config?.get('sync.max_delay_ms', d.maxDelayMs) ?? d.maxDelayMs,
    callTimeoutMs: config?.get('sync.call_timeout_ms', d.callTimeoutMs) ?? d.callTimeoutMs,
  };
  return checkSettings(SyncSettingsSchema, candidate, 'sync');
}

export function resolveGeneratorSettings(config?: Config | null): GeneratorSettings {
  const d = DEFAULT_GENERATOR_SETTINGS;
  const candidate = {
    grouping: config?.get('generator.grouping', d.grouping) ?? d.grouping,
    rootName: config?.get('generator.root_name', d.rootName) ?? d.rootName,
    excludedTypes: config?.get('generator.excluded_types', d.excludedTypes) ?? d.excludedTypes,
  };
  return checkSettings(GeneratorSettingsSchema, candidate, 'generator');
}

function checkSettings<S extends TSchema>(
  schema: S,
  candidate: unknown,
  section: string,
): Static<S> {
  if (Value.Check(schema, candidate)) {
    return candidate;
  }
  const problems = [...Value.Errors(schema, candidate)].map((e) => `${e.path || '/'}: ${e.message}`);
  throw new ConfigError(`Invalid '${section}' settings: ${problems.join('; ')}`);
}
