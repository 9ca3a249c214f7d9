/**
 * Version constant, read from the core package.json at module load time.
 */
import { existsSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
// src/ when run from sources, dist/packages/core/src/ when built
const manifestPath = [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', '..', '..', 'packages', 'core', 'package.json')].find(existsSync);
const pkg: unknown = manifestPath ? JSON.parse(readFileSync(manifestPath, 'utf-8')) : undefined;

function readVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Full version string (e.g. "0.3.0") */
export const DECLSORT_VERSION: string = readVersion(pkg);
