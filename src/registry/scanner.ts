/**
 * Directory scanner that builds a registry index ahead of time.
 *
 * Expected layout under the root:
 *
 *   <module>/hooks.yaml                     exported_methods with a declared owner
 *   <module>/types/<slug>/<slug>.yaml       one type definition
 */

import { lstatSync, readdirSync, realpathSync, statSync } from 'node:fs';
import { basename, dirname, extname, join, relative, resolve, sep } from 'node:path';
import { ConfigNotFoundError, toError } from '../errors.js';
import { checkFile, readYamlFile } from './index-file.js';
import {
  HooksFileSchema,
  TypeEntrySchema,
  toHookMethodSpec,
  toTypeDefinition,
  type MethodSpec,
  type RegistryIndex,
  type TypeDefinition,
} from './types.js';

const SKIP_DIR_NAMES = new Set(['node_modules', '__pycache__']);
const TYPE_FILE_EXTENSIONS = new Set(['.yaml', '.yml']);
const HOOK_FILE_NAMES = ['hooks.yaml', 'hooks.yml'];
const TYPES_DIR_NAME = 'types';

export interface ScanOptions {
  maxDepth?: number;
  followSymlinks?: boolean;
}

export interface ScanFailure {
  filePath: string;
  error: Error;
}

export interface ScanResult {
  index: RegistryIndex;
  failures: ScanFailure[];
}

function existsAndIsDir(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function listEntries(dirPath: string): string[] {
  try {
    return readdirSync(dirPath)
      .filter((name) => !name.startsWith('.') && !name.startsWith('_') && !SKIP_DIR_NAMES.has(name))
      .sort();
  } catch (e) {
    console.warn(`[collection-sync:scanner] Cannot read directory: ${dirPath}: ${toError(e).message}`);
    return [];
  }
}

export function scanRegistry(root: string, options?: ScanOptions): ScanResult {
  const maxDepth = options?.maxDepth ?? 8;
  const followSymlinks = options?.followSymlinks ?? false;
  const rootResolved = resolve(root);
  if (!existsAndIsDir(rootResolved)) {
    throw new ConfigNotFoundError(rootResolved);
  }

  const visitedRealPaths = new Set([realpathSync(rootResolved)]);
  const types: TypeDefinition[] = [];
  const hookMethods: MethodSpec[] = [];
  const failures: ScanFailure[] = [];
  const seenTypes = new Map<string, string>();

  const relPath = (p: string): string => relative(rootResolved, p).split(sep).join('/');

  function enterDir(dirPath: string): boolean {
    let isLink: boolean;
    try {
      isLink = lstatSync(dirPath).isSymbolicLink();
    } catch {
      return false;
    }
    if (!isLink) return true;
    if (!followSymlinks) return false;
    const real = realpathSync(dirPath);
    if (visitedRealPaths.has(real)) return false;
    visitedRealPaths.add(real);
    return true;
  }

  function loadTypeFile(filePath: string, moduleName: string): void {
    const source = relPath(filePath);
    let def: TypeDefinition;
    try {
      const entry = checkFile(TypeEntrySchema, readYamlFile(filePath), source);
      def = toTypeDefinition(entry, moduleName, source);
    } catch (e) {
      console.warn(`[collection-sync:scanner] Skipping unreadable type file: ${source}`);
      failures.push({ filePath, error: toError(e) });
      return;
    }

    const previous = seenTypes.get(def.name);
    if (previous !== undefined) {
      console.warn(`[collection-sync:scanner] Duplicate type '${def.name}' in ${source}, already defined in ${previous}`);
      return;
    }
    seenTypes.set(def.name, source);
    types.push(def);
  }

  function scanTypesDir(dirPath: string, moduleName: string, depth: number): void {
    if (depth > maxDepth) {
      console.warn(`[collection-sync:scanner] Max depth ${maxDepth} exceeded at: ${dirPath}`);
      return;
    }

    for (const name of listEntries(dirPath)) {
      const entryPath = join(dirPath, name);
      let isDir: boolean;
      let isFile: boolean;
      try {
        const stat = statSync(entryPath);
        isDir = stat.isDirectory();
        isFile = stat.isFile();
      } catch {
        console.warn(`[collection-sync:scanner] Cannot stat entry: ${entryPath}`);
        continue;
      }

      if (isDir) {
        if (enterDir(entryPath)) scanTypesDir(entryPath, moduleName, depth + 1);
      } else if (isFile) {
        const ext = extname(name);
        if (!TYPE_FILE_EXTENSIONS.has(ext)) continue;
        // A controller file is named after its own directory.
        if (basename(name, ext) !== basename(dirname(entryPath))) continue;
        loadTypeFile(entryPath, moduleName);
      }
    }
  }

  function loadHooks(moduleDir: string): void {
    for (const fileName of HOOK_FILE_NAMES) {
      const filePath = join(moduleDir, fileName);
      try {
        if (!statSync(filePath).isFile()) continue;
      } catch {
        continue;
      }
      const source = relPath(filePath);
      try {
        const file = checkFile(HooksFileSchema, readYamlFile(filePath) ?? {}, source);
        for (const entry of file.exported_methods ?? []) {
          hookMethods.push(toHookMethodSpec(entry, source));
        }
      } catch (e) {
        console.warn(`[collection-sync:scanner] Skipping unreadable hooks file: ${source}`);
        failures.push({ filePath, error: toError(e) });
      }
    }
  }

  for (const moduleName of listEntries(rootResolved)) {
    const moduleDir = join(rootResolved, moduleName);
    if (!existsAndIsDir(moduleDir) || !enterDir(moduleDir)) continue;
    loadHooks(moduleDir);
    const typesDir = join(moduleDir, TYPES_DIR_NAME);
    if (existsAndIsDir(typesDir) && enterDir(typesDir)) {
      scanTypesDir(typesDir, moduleName, 1);
    }
  }

  return { index: { types, hookMethods }, failures };
}
