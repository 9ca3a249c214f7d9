/**
 * Top-level declaration ordering.
 *
 * The module body is cut into segments at barrier statements (anything
 * whose position may be observable). Inside a segment declarations are
 * ordered exported-first, then by name, with a priority topological sort
 * keeping every eagerly referenced binding ahead of its user. Local
 * `export { ... }` lists move to the end of the module.
 */
import traverseModule from '@babel/traverse';
import type { NodePath } from '@babel/traverse';
import type { ClassDeclaration, File, Node, Statement, TSEnumDeclaration } from '@babel/types';
import { CycleError, toposort } from '../core/toposort.js';
import { getTraverseFunction } from '../parser/babelInterop.js';
import { compareNames, sortStable } from './compare.js';
import { isSideEffectFree } from './purity.js';

const traverse = getTraverseFunction(traverseModule);

export type DeclarationKind = 'function' | 'overload' | 'class' | 'variable' | 'enum' | 'type';

export interface DeclarationInfo {
  kind: DeclarationKind;
  /** Bindings introduced, in source order */
  names: string[];
  exported: boolean;
  /** Whether the declaration creates a runtime binding */
  runtime: boolean;
}

/** Statement -> identifiers it reads while the module body runs */
export type EagerReferences = Map<Node, Set<string>>;

export function boundNames(pattern: Node): string[] {
  switch (pattern.type) {
    case 'Identifier':
      return [pattern.name];
    case 'ObjectPattern':
      return pattern.properties.flatMap((p) => boundNames(p.type === 'RestElement' ? p : p.value));
    case 'ArrayPattern':
      return pattern.elements.flatMap((el) => (el ? boundNames(el) : []));
    case 'RestElement':
      return boundNames(pattern.argument);
    case 'AssignmentPattern':
      return boundNames(pattern.left);
    default:
      return [];
  }
}

function isInertClass(decl: ClassDeclaration): boolean {
  if (decl.decorators && decl.decorators.length > 0) return false;
  if (decl.superClass && !isSideEffectFree(decl.superClass)) return false;
  return decl.body.body.every((member) => {
    if (member.type === 'StaticBlock') return false;
    if ('decorators' in member && member.decorators && member.decorators.length > 0) return false;
    if ('computed' in member && member.computed && !isSideEffectFree(member.key)) return false;
    if (
      (member.type === 'ClassProperty' || member.type === 'ClassPrivateProperty' || member.type === 'ClassAccessorProperty') &&
      member.static
    ) {
      return isSideEffectFree(member.value, { allowThis: true });
    }
    return true;
  });
}

function isInertEnum(decl: TSEnumDeclaration): boolean {
  return decl.members.every((member) => isSideEffectFree(member.initializer));
}

/**
 * @returns undefined for barrier statements
 */
export function declarationInfo(stmt: Statement): DeclarationInfo | undefined {
  let exported = false;
  let decl: Node = stmt;
  if (stmt.type === 'ExportNamedDeclaration') {
    if (!stmt.declaration) return undefined;
    exported = true;
    decl = stmt.declaration;
  }

  switch (decl.type) {
    case 'FunctionDeclaration':
      return decl.id ? { kind: 'function', names: [decl.id.name], exported, runtime: true } : undefined;
    case 'TSDeclareFunction':
      return decl.id ? { kind: 'overload', names: [decl.id.name], exported, runtime: false } : undefined;
    case 'ClassDeclaration':
      if (!decl.id) return undefined;
      if (decl.declare) return { kind: 'type', names: [decl.id.name], exported, runtime: false };
      return isInertClass(decl) ? { kind: 'class', names: [decl.id.name], exported, runtime: true } : undefined;
    case 'VariableDeclaration': {
      if (decl.kind !== 'const' && decl.kind !== 'let' && decl.kind !== 'var') return undefined;
      const names = decl.declarations.flatMap((d) => boundNames(d.id));
      if (decl.declare) return { kind: 'type', names, exported, runtime: false };
      return decl.declarations.every((d) => isSideEffectFree(d.init))
        ? { kind: 'variable', names, exported, runtime: true }
        : undefined;
    }
    case 'TSInterfaceDeclaration':
    case 'TSTypeAliasDeclaration':
      return { kind: 'type', names: [decl.id.name], exported, runtime: false };
    case 'TSEnumDeclaration':
      if (decl.declare || decl.const) return { kind: 'type', names: [decl.id.name], exported, runtime: false };
      return isInertEnum(decl) ? { kind: 'enum', names: [decl.id.name], exported, runtime: true } : undefined;
    case 'TSModuleDeclaration':
      if (!decl.declare || decl.id.type !== 'Identifier') return undefined;
      return { kind: 'type', names: [decl.id.name], exported, runtime: false };
    default:
      return undefined;
  }
}

export function isLocalExportList(stmt: Statement): boolean {
  return stmt.type === 'ExportNamedDeclaration' && !stmt.declaration && !stmt.source;
}

/**
 * Does `path` sit where it is only evaluated later (function bodies,
 * instance field values) or never (type positions)?
 *
 * @returns the enclosing top-level statement, or null when not eager
 */
function eagerStatement(path: NodePath): Node | null {
  let child: NodePath = path;
  let parent = path.parentPath;
  while (parent) {
    if (parent.isProgram()) return child.node;
    if (parent.isFunction() && child.key !== 'key' && child.key !== 'decorators') return null;
    if (parent.isTSType() || parent.isTSTypeAnnotation() || parent.isTSTypeParameterInstantiation()) return null;
    if (
      (parent.isClassProperty() || parent.isClassPrivateProperty() || parent.isClassAccessorProperty()) &&
      !parent.node.static &&
      child.key === 'value'
    ) {
      return null;
    }
    child = parent;
    parent = parent.parentPath;
  }
  return null;
}

export function collectEagerReferences(file: File): EagerReferences {
  const references: EagerReferences = new Map();
  traverse(file, {
    noScope: true,
    enter(path) {
      if (!path.isReferencedIdentifier()) return;
      const statement = eagerStatement(path);
      if (!statement) return;
      let names = references.get(statement);
      if (!names) {
        names = new Set();
        references.set(statement, names);
      }
      names.add(path.node.name);
    },
  });
  return references;
}

interface DeclarationUnit {
  id: string;
  statements: Statement[];
  info: DeclarationInfo;
}

type SegmentItem = { barrier: Statement } | { unit: DeclarationUnit };

function overloadName(info: DeclarationInfo | undefined): string | undefined {
  return info && (info.kind === 'overload' || info.kind === 'function') ? info.names[0] : undefined;
}

/**
 * Groups consecutive overload signatures with their implementation and
 * marks barriers.
 */
function toItems(body: readonly Statement[]): SegmentItem[] {
  const items: SegmentItem[] = [];
  let open: DeclarationUnit | undefined;

  body.forEach((stmt, index) => {
    const info = declarationInfo(stmt);
    if (!info) {
      open = undefined;
      items.push({ barrier: stmt });
      return;
    }
    if (open && open.info.kind === 'overload' && overloadName(info) === open.info.names[0]) {
      open.statements.push(stmt);
      open.info = { ...open.info, kind: info.kind, runtime: info.runtime, exported: open.info.exported || info.exported };
      return;
    }
    open = { id: String(index), statements: [stmt], info };
    items.push({ unit: open });
  });
  return items;
}

function compareUnits(a: DeclarationUnit, b: DeclarationUnit): number {
  return Number(b.info.exported) - Number(a.info.exported) || compareNames(a.info.names[0] ?? '', b.info.names[0] ?? '');
}

function orderSegment(segment: DeclarationUnit[], references: EagerReferences): DeclarationUnit[] {
  if (segment.length < 2) return segment;

  const owners = new Map<string, DeclarationUnit>();
  for (const unit of segment) {
    if (!unit.info.runtime || unit.info.kind === 'function') continue;
    for (const name of unit.info.names) owners.set(name, unit);
  }

  const desired = sortStable(segment, compareUnits);
  const byId = new Map(segment.map((unit) => [unit.id, unit]));
  const items = desired.map((unit) => {
    const dependencies: string[] = [];
    if (unit.info.kind !== 'function') {
      for (const stmt of unit.statements) {
        for (const name of references.get(stmt) ?? []) {
          const owner = owners.get(name);
          if (owner && owner !== unit) dependencies.push(owner.id);
        }
      }
    }
    return { id: unit.id, dependencies };
  });

  try {
    return toposort(items).flatMap((id) => {
      const unit = byId.get(id);
      return unit ? [unit] : [];
    });
  } catch (err) {
    if (err instanceof CycleError) return segment;
    throw err;
  }
}

export function organizeDeclarations(body: readonly Statement[], references: EagerReferences): Statement[] {
  const exportLists = body.filter(isLocalExportList);
  const items = toItems(body.filter((stmt) => !isLocalExportList(stmt)));

  const result: Statement[] = [];
  let segment: DeclarationUnit[] = [];
  const flush = (): void => {
    for (const unit of orderSegment(segment, references)) result.push(...unit.statements);
    segment = [];
  };

  for (const item of items) {
    if ('barrier' in item) {
      flush();
      result.push(item.barrier);
    } else {
      segment.push(item.unit);
    }
  }
  flush();

  return [...result, ...exportLists];
}
