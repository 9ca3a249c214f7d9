/**
 * Skeleton Printer - regenerates the reorganized tree as text without the
 * extracted comments.
 *
 * Top-level statements are generated one at a time and joined under a
 * blank-line policy, so the layout between statements is ours rather
 * than the generator's.
 */
import generatorModule from '@babel/generator';
import { traverseFast } from '@babel/types';
import type { Comment, File, Node, Statement } from '@babel/types';
import { getGenerateFunction } from '../parser/babelInterop.js';
import { importCategory, isReExport } from '../reorganize/imports.js';
import { isLocalExportList } from '../reorganize/declarations.js';

const generate = getGenerateFunction(generatorModule);

type Section = 'import' | 'reexport' | 'body' | 'exports';

interface PrintedStatement {
  code: string;
  section: Section;
  /** Import category, or the declaration kind for compact runs */
  group: string | undefined;
  exported: boolean;
  /** Function name for overload chains */
  functionName: string | undefined;
  signature: boolean;
}

interface Attachment {
  comment: Comment;
  trailingOf: Node[];
  leadingOf: Node[];
}

function attachmentOf(table: Map<number, Attachment>, comment: Comment): Attachment | undefined {
  if (comment.start == null) return undefined;
  let entry = table.get(comment.start);
  if (!entry) {
    entry = { comment, trailingOf: [], leadingOf: [] };
    table.set(comment.start, entry);
  }
  return entry;
}

const isKept = (extracted: ReadonlySet<number>) => (comment: Comment): boolean =>
  comment.start == null || !extracted.has(comment.start);

/**
 * Drop extracted comments from every node, and give each remaining comment
 * the parser hung on two nodes a single owner.
 */
export function prepareComments(file: File, extracted: ReadonlySet<number>): void {
  const keep = isKept(extracted);
  const table = new Map<number, Attachment>();

  traverseFast(file, (node) => {
    if (node.leadingComments) {
      node.leadingComments = node.leadingComments.filter(keep);
      for (const c of node.leadingComments) attachmentOf(table, c)?.leadingOf.push(node);
    }
    if (node.trailingComments) {
      node.trailingComments = node.trailingComments.filter(keep);
      for (const c of node.trailingComments) attachmentOf(table, c)?.trailingOf.push(node);
    }
    if (node.innerComments) {
      node.innerComments = node.innerComments.filter(keep);
    }
  });

  for (const { comment, trailingOf, leadingOf } of table.values()) {
    if (trailingOf.length === 0 || leadingOf.length === 0) continue;
    const line = comment.loc?.start.line;
    const sameLine = trailingOf.some((node) => node.loc?.end.line === line);
    const losers = sameLine ? leadingOf : trailingOf;
    for (const node of losers) {
      if (sameLine) {
        node.leadingComments = (node.leadingComments ?? []).filter((c) => c !== comment);
      } else {
        node.trailingComments = (node.trailingComments ?? []).filter((c) => c !== comment);
      }
    }
  }
}

function generateCode(node: Node): string {
  return generate(node, { comments: true, jsescOption: { minimal: true } }).code;
}

function describe(stmt: Statement): PrintedStatement {
  const code = generateCode(stmt);
  const base = { code, group: undefined, exported: false, functionName: undefined, signature: false };

  if (stmt.type === 'ImportDeclaration') {
    return { ...base, section: 'import', group: importCategory(stmt.source.value) };
  }
  if (isReExport(stmt)) {
    return { ...base, section: 'reexport', group: importCategory(stmt.source.value) };
  }
  if (isLocalExportList(stmt)) {
    return { ...base, section: 'exports' };
  }

  let decl: Node = stmt;
  let exported = false;
  if (stmt.type === 'ExportNamedDeclaration' && stmt.declaration) {
    decl = stmt.declaration;
    exported = true;
  }

  switch (decl.type) {
    case 'VariableDeclaration':
      return { ...base, section: 'body', group: decl.kind, exported };
    case 'TSTypeAliasDeclaration':
      return { ...base, section: 'body', group: 'type', exported };
    case 'ExpressionStatement':
      return { ...base, section: 'body', group: 'expression', exported };
    case 'TSDeclareFunction':
      return { ...base, section: 'body', exported, functionName: decl.id?.name, signature: true };
    case 'FunctionDeclaration':
      return { ...base, section: 'body', exported, functionName: decl.id?.name };
    default:
      return { ...base, section: 'body', exported };
  }
}

const isSingleLine = (code: string): boolean => !code.includes('\n');

export function needsBlankLine(prev: PrintedStatement, next: PrintedStatement): boolean {
  if (prev.section !== next.section) return true;
  switch (prev.section) {
    case 'import':
    case 'reexport':
      return prev.group !== next.group;
    case 'exports':
      return false;
    case 'body':
      if (prev.signature && prev.functionName !== undefined && prev.functionName === next.functionName) {
        return false;
      }
      return !(
        prev.group !== undefined &&
        prev.group === next.group &&
        prev.exported === next.exported &&
        isSingleLine(prev.code) &&
        isSingleLine(next.code)
      );
  }
}

export function printSkeleton(file: File, extracted: ReadonlySet<number>): string {
  prepareComments(file, extracted);
  const program = file.program;

  const header: string[] = [];
  if (program.interpreter) header.push(`#!${program.interpreter.value}`);
  const directives = program.directives.map(generateCode);

  const statements = program.body.map(describe);
  const body: string[] = [];
  statements.forEach((stmt, i) => {
    if (i > 0) body.push(needsBlankLine(statements[i - 1], stmt) ? '\n\n' : '\n');
    body.push(stmt.code);
  });

  const parts: string[] = [];
  if (header.length > 0) parts.push(header.join('\n'));
  if (directives.length > 0) parts.push(directives.join('\n'));
  if (body.length > 0) parts.push(body.join(''));

  let text = '';
  parts.forEach((part, i) => {
    // the interpreter line hugs what follows it
    const separator = i === 0 ? '' : i === 1 && program.interpreter ? '\n' : '\n\n';
    text += separator + part;
  });
  return text;
}
