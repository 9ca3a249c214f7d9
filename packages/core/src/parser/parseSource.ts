/**
 * Source parsing - Babel with TypeScript, JSX and decorators.
 */
import { parse, type ParserPlugin } from '@babel/parser';
import type { File } from '@babel/types';
import type { SourceComment } from '@declsort/types';
import { LanguageError } from '../errors/DeclsortError.js';
import { CommentStore, toSourceComment } from './CommentStore.js';

export interface ParsedSource {
  file: File;
  filename: string;
  source: string;
  /** Every comment in the file, in source order */
  comments: SourceComment[];
  store: CommentStore;
}

const TS_EXTENSIONS = ['.ts', '.mts', '.cts'];
const JSX_EXTENSIONS = ['.tsx', '.jsx', '.js', '.mjs', '.cjs'];

export const SUPPORTED_EXTENSIONS: readonly string[] = [...TS_EXTENSIONS, ...JSX_EXTENSIONS];

export function isSupportedFile(filename: string): boolean {
  return SUPPORTED_EXTENSIONS.some((ext) => filename.endsWith(ext));
}

function pluginsFor(filename: string): ParserPlugin[] {
  const plugins: ParserPlugin[] = [
    ['typescript', { dts: filename.endsWith('.d.ts') }],
    'decorators',
    'classProperties',
    'classPrivateProperties',
    'classPrivateMethods',
    'dynamicImport',
    'optionalChaining',
    'nullishCoalescingOperator',
    'topLevelAwait',
  ];
  // `<T>value` casts only parse without JSX
  if (JSX_EXTENSIONS.some((ext) => filename.endsWith(ext))) {
    plugins.push('jsx');
  }
  return plugins;
}

function hasLocation(err: Error): err is Error & { loc: { line: number; column: number } } {
  if (!('loc' in err)) return false;
  const loc = err.loc;
  return typeof loc === 'object' && loc !== null && 'line' in loc && typeof loc.line === 'number';
}

/**
 * Parse a file. Syntax errors are fatal for the file.
 *
 * @throws LanguageError ERR_UNSUPPORTED_LANG for unknown extensions,
 *         ERR_PARSE_FAILURE for syntax errors
 */
export function parseSource(source: string, filename: string): ParsedSource {
  if (!isSupportedFile(filename)) {
    throw new LanguageError(
      `Unsupported file type: ${filename}`,
      'ERR_UNSUPPORTED_LANG',
      { filePath: filename },
      `Supported extensions: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  let file: File;
  try {
    file = parse(source, {
      sourceType: 'unambiguous',
      sourceFilename: filename,
      plugins: pluginsFor(filename),
      errorRecovery: false,
    });
  } catch (err) {
    if (err instanceof Error) {
      throw new LanguageError(
        `Failed to parse ${filename}: ${err.message}`,
        'ERR_PARSE_FAILURE',
        { filePath: filename, lineNumber: hasLocation(err) ? err.loc.line : undefined }
      );
    }
    throw err;
  }

  const comments: SourceComment[] = [];
  for (const c of file.comments ?? []) {
    const record = toSourceComment(c);
    if (record) comments.push(record);
  }

  return {
    file,
    filename,
    source,
    comments,
    store: CommentStore.fromAst(file),
  };
}
