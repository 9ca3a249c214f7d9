import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import type { OrganizeOptions } from '@declsort/types';
import { ConfigError } from '../errors/DeclsortError.js';
import { isLogLevel, type LogLevel } from '../logging/Logger.js';

/**
 * declsort configuration schema.
 *
 * Location: .declsort.yaml (preferred) or .declsort.json (deprecated) in the
 * project root, or any file passed with --config.
 *
 * Example .declsort.yaml:
 *
 * ```yaml
 * include:
 *   - "src/**\/*.ts"
 * exclude:
 *   - "**\/generated/**"
 * backup: false
 * organize:
 *   objectProperties: false
 * ```
 */
export interface DeclsortConfig {
  /** Glob patterns a discovered file must match */
  include: string[];
  /** Glob patterns that drop a discovered file */
  exclude: string[];
  /** Write `<file>.bak` before overwriting */
  backup: boolean;
  /** Terminate written files with a newline */
  finalNewline: boolean;
  logLevel: LogLevel;
  organize: OrganizeOptions;
}

/**
 * Shape accepted from disk before validation; every field optional.
 */
export type PartialDeclsortConfig = Partial<Omit<DeclsortConfig, 'organize'>> & {
  organize?: Partial<OrganizeOptions>;
};

export const DEFAULT_ORGANIZE: OrganizeOptions = {
  imports: true,
  declarations: true,
  classMembers: true,
  objectProperties: true,
  jsxAttributes: true,
  unionTypes: true,
  enumMembers: true,
  parameterPatterns: true,
};

export const DEFAULT_CONFIG: DeclsortConfig = {
  include: ['**/*.{ts,tsx,mts,cts}'],
  exclude: ['**/node_modules/**', '**/.*/**'],
  backup: true,
  finalNewline: true,
  logLevel: 'info',
  organize: DEFAULT_ORGANIZE,
};

export const CONFIG_FILE_YAML = '.declsort.yaml';
export const CONFIG_FILE_JSON = '.declsort.json';

const ORGANIZE_KEYS: readonly (keyof OrganizeOptions)[] = [
  'imports',
  'declarations',
  'classMembers',
  'objectProperties',
  'jsxAttributes',
  'unionTypes',
  'enumMembers',
  'parameterPatterns',
];

const TOP_LEVEL_KEYS = new Set(['include', 'exclude', 'backup', 'finalNewline', 'logLevel', 'organize']);

/**
 * Load configuration.
 *
 * Priority:
 * 1. explicit path (must exist)
 * 2. .declsort.yaml in projectPath
 * 3. .declsort.json in projectPath (deprecated, logs a warning)
 * 4. DEFAULT_CONFIG
 *
 * Unparseable files and invalid values throw ConfigError.
 *
 * @param projectPath - Directory searched for config files
 * @param logger - Receives deprecation and validation warnings
 * @param explicitPath - Path given on the command line
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console,
  explicitPath?: string
): DeclsortConfig {
  if (explicitPath !== undefined) {
    const path = resolve(projectPath, explicitPath);
    if (!existsSync(path)) {
      throw new ConfigError(
        `Config file not found: ${explicitPath}`,
        'ERR_CONFIG_INVALID',
        { filePath: path },
        'Check the --config path'
      );
    }
    const parsed = path.endsWith('.json') ? readJson(path) : readYaml(path);
    return mergeConfig(DEFAULT_CONFIG, validateConfig(parsed, path, logger));
  }

  const yamlPath = join(projectPath, CONFIG_FILE_YAML);
  if (existsSync(yamlPath)) {
    return mergeConfig(DEFAULT_CONFIG, validateConfig(readYaml(yamlPath), yamlPath, logger));
  }

  const jsonPath = join(projectPath, CONFIG_FILE_JSON);
  if (existsSync(jsonPath)) {
    logger.warn(`⚠ ${CONFIG_FILE_JSON} is deprecated. Move its contents to ${CONFIG_FILE_YAML}`);
    return mergeConfig(DEFAULT_CONFIG, validateConfig(readJson(jsonPath), jsonPath, logger));
  }

  return DEFAULT_CONFIG;
}

function readYaml(path: string): unknown {
  try {
    return parseYAML(readFileSync(path, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${path}: ${message}`, 'ERR_CONFIG_INVALID', { filePath: path });
  }
}

function readJson(path: string): unknown {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return parsed;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${path}: ${message}`, 'ERR_CONFIG_INVALID', { filePath: path });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(message: string, filePath: string): never {
  throw new ConfigError(`Config error: ${message}`, 'ERR_CONFIG_INVALID', { filePath });
}

/**
 * Validate a parsed config document.
 * THROWS ConfigError on the first invalid field.
 *
 * An empty document (YAML `null`) is a valid, empty config. Unknown keys
 * are reported through the logger and ignored.
 */
export function validateConfig(
  raw: unknown,
  filePath: string,
  logger: { warn: (msg: string) => void }
): PartialDeclsortConfig {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    fail(`top level must be a mapping, got ${Array.isArray(raw) ? 'array' : typeof raw}`, filePath);
  }

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      logger.warn(`Unknown config key "${key}" in ${filePath} (ignored)`);
    }
  }

  const result: PartialDeclsortConfig = {};

  const include = validatePatterns(raw.include, 'include', filePath);
  if (include) {
    if (include.length === 0) {
      logger.warn('Warning: include is an empty array - no files will be processed');
    }
    result.include = include;
  }
  const exclude = validatePatterns(raw.exclude, 'exclude', filePath);
  if (exclude) result.exclude = exclude;

  const backup = validateBoolean(raw.backup, 'backup', filePath);
  if (backup !== undefined) result.backup = backup;
  const finalNewline = validateBoolean(raw.finalNewline, 'finalNewline', filePath);
  if (finalNewline !== undefined) result.finalNewline = finalNewline;

  if (raw.logLevel !== undefined && raw.logLevel !== null) {
    if (!isLogLevel(raw.logLevel)) {
      fail(`logLevel must be one of silent, errors, warnings, info, debug; got ${JSON.stringify(raw.logLevel)}`, filePath);
    }
    result.logLevel = raw.logLevel;
  }

  if (raw.organize !== undefined && raw.organize !== null) {
    const organize = raw.organize;
    if (!isRecord(organize)) {
      fail(`organize must be a mapping, got ${typeof organize}`, filePath);
    }
    const options: Partial<OrganizeOptions> = {};
    for (const key of Object.keys(organize)) {
      const known = ORGANIZE_KEYS.find((k) => k === key);
      if (!known) {
        logger.warn(`Unknown organize rule "${key}" in ${filePath} (ignored)`);
        continue;
      }
      const value = validateBoolean(organize[key], `organize.${key}`, filePath);
      if (value !== undefined) options[known] = value;
    }
    result.organize = options;
  }

  return result;
}

/**
 * Validate a glob pattern list.
 * THROWS on non-arrays, non-strings and blank entries.
 */
export function validatePatterns(value: unknown, field: string, filePath: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    fail(`${field} must be an array, got ${typeof value}`, filePath);
  }
  const patterns: string[] = [];
  value.forEach((entry: unknown, i) => {
    if (typeof entry !== 'string') {
      fail(`${field}[${i}] must be a string, got ${typeof entry}`, filePath);
    }
    if (!entry.trim()) {
      fail(`${field}[${i}] cannot be empty or whitespace-only`, filePath);
    }
    patterns.push(entry);
  });
  return patterns;
}

function validateBoolean(value: unknown, field: string, filePath: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    fail(`${field} must be a boolean, got ${typeof value}`, filePath);
  }
  return value;
}

/**
 * Merge user config with defaults. User values win; missing fields (and
 * missing organize rules) fall back to the defaults.
 */
export function mergeConfig(defaults: DeclsortConfig, user: PartialDeclsortConfig): DeclsortConfig {
  return {
    include: user.include ?? defaults.include,
    exclude: user.exclude ?? defaults.exclude,
    backup: user.backup ?? defaults.backup,
    finalNewline: user.finalNewline ?? defaults.finalNewline,
    logLevel: user.logLevel ?? defaults.logLevel,
    organize: { ...defaults.organize, ...user.organize },
  };
}
