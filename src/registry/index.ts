export { StaticSchemaReader } from './reader.js';
export type { SchemaReader, MaybePromise } from './reader.js';
export { scanRegistry } from './scanner.js';
export type { ScanOptions, ScanFailure, ScanResult } from './scanner.js';
export { loadRegistryIndex, parseRegistryIndex, dumpRegistryIndex, checkFile, readYamlFile } from './index-file.js';
export type { FieldSpec, MethodSpec, TypeDefinition, RegistryIndex } from './types.js';
