/**
 * Import and re-export ordering.
 *
 * Imports move to the top of the module, grouped External < Absolute <
 * Relative and sorted by source within a group. Side-effect imports are
 * fixed points: sorting happens within the runs between them. Re-exports
 * follow the imports.
 */
import type {
  ExportAllDeclaration,
  ExportNamedDeclaration,
  ImportDeclaration,
  ImportSpecifier,
  Statement,
  StringLiteral,
} from '@babel/types';
import { compareNames, compareText, sortStable } from './compare.js';

export type ImportCategory = 'external' | 'absolute' | 'relative';

const CATEGORY_RANK: Record<ImportCategory, number> = {
  external: 0,
  absolute: 1,
  relative: 2,
};

export function importCategory(source: string): ImportCategory {
  if (source.startsWith('.')) return 'relative';
  if (source.startsWith('@/') || source.startsWith('~') || source.startsWith('#')) return 'absolute';
  return 'external';
}

export type ReExport = ExportAllDeclaration | (ExportNamedDeclaration & { source: StringLiteral });

export function isReExport(stmt: Statement): stmt is ReExport {
  if (stmt.type === 'ExportAllDeclaration') return true;
  return stmt.type === 'ExportNamedDeclaration' && stmt.source != null;
}

export function isSideEffectImport(decl: ImportDeclaration): boolean {
  return decl.specifiers.length === 0 && decl.importKind !== 'type';
}

function compareSources(a: string, b: string): number {
  return CATEGORY_RANK[importCategory(a)] - CATEGORY_RANK[importCategory(b)] || compareText(a, b);
}

function importedName(specifier: ImportSpecifier): string {
  return specifier.imported.type === 'Identifier' ? specifier.imported.name : specifier.imported.value;
}

/**
 * Default and namespace specifiers first in their written order, then
 * named specifiers by imported name.
 */
export function sortImportSpecifiers(decl: ImportDeclaration): void {
  const head = decl.specifiers.filter((s) => s.type !== 'ImportSpecifier');
  const named = decl.specifiers.filter((s): s is ImportSpecifier => s.type === 'ImportSpecifier');
  decl.specifiers = [...head, ...sortStable(named, (a, b) => compareNames(importedName(a), importedName(b)))];
}

function sortImportRun(run: ImportDeclaration[]): ImportDeclaration[] {
  return sortStable(run, (a, b) => {
    const bySource = compareSources(a.source.value, b.source.value);
    if (bySource !== 0) return bySource;
    // `import type` after the value import of the same module
    return Number(a.importKind === 'type') - Number(b.importKind === 'type');
  });
}

/**
 * @returns the new body: sorted imports, sorted re-exports, then the rest
 *          in their original order
 */
export function organizeImports(body: readonly Statement[]): Statement[] {
  const imports: ImportDeclaration[] = [];
  const reExports: ReExport[] = [];
  const rest: Statement[] = [];

  for (const stmt of body) {
    if (stmt.type === 'ImportDeclaration') imports.push(stmt);
    else if (isReExport(stmt)) reExports.push(stmt);
    else rest.push(stmt);
  }

  const orderedImports: ImportDeclaration[] = [];
  let run: ImportDeclaration[] = [];
  for (const decl of imports) {
    if (isSideEffectImport(decl)) {
      orderedImports.push(...sortImportRun(run), decl);
      run = [];
    } else {
      sortImportSpecifiers(decl);
      run.push(decl);
    }
  }
  orderedImports.push(...sortImportRun(run));

  const orderedReExports = sortStable(reExports, (a, b) => compareSources(a.source.value, b.source.value));

  return [...orderedImports, ...orderedReExports, ...rest];
}
