/**
 * File discovery for the CLI: directories, explicit files and glob
 * patterns, filtered through the configured include/exclude globs.
 */
import { existsSync, readdirSync, statSync } from 'fs';
import { join, relative, resolve } from 'path';
import { minimatch } from 'minimatch';
import type { DeclsortConfig } from '../config/ConfigLoader.js';
import { isSupportedFile } from '../parser/parseSource.js';

const SKIPPED_DIRECTORIES = new Set(['node_modules']);

export type DiscoveryConfig = Pick<DeclsortConfig, 'include' | 'exclude'>;

function toPosix(path: string): string {
  return path.replace(/\\/g, '/');
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Every supported file below `dir`, skipping node_modules and hidden
 * directories.
 */
export function walkDirectory(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (SKIPPED_DIRECTORIES.has(entry.name) || entry.name.startsWith('.')) continue;
      files.push(...walkDirectory(fullPath));
    } else if (entry.isFile() && isSupportedFile(entry.name)) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Check a path (relative to the project root) against include/exclude.
 */
export function matchesConfig(relativePath: string, config: DiscoveryConfig): boolean {
  const path = toPosix(relativePath);
  if (!config.include.some((pattern) => minimatch(path, pattern))) return false;
  return !config.exclude.some((pattern) => minimatch(path, pattern, { dot: true }));
}

/**
 * @param paths - files, directories or globs; empty means the whole project
 * @returns absolute paths, deduplicated and sorted
 */
export function discoverFiles(paths: readonly string[], config: DiscoveryConfig, cwd: string = process.cwd()): string[] {
  const found = new Set<string>();
  const keep = (file: string): void => {
    if (matchesConfig(relative(cwd, file), config)) found.add(file);
  };

  for (const arg of paths.length > 0 ? paths : ['.']) {
    const fullPath = resolve(cwd, arg);
    if (existsSync(fullPath)) {
      if (isDirectory(fullPath)) {
        walkDirectory(fullPath).forEach(keep);
      } else {
        // named explicitly: no include/exclude filtering
        found.add(fullPath);
      }
      continue;
    }
    const pattern = toPosix(arg);
    for (const file of walkDirectory(cwd)) {
      if (minimatch(toPosix(relative(cwd, file)), pattern)) keep(file);
    }
  }

  return [...found].sort();
}
