/**
 * Identity Assigner - content-derived identities for nodes that can own
 * comments.
 *
 * Identity = `<kind>:<name>@<hash>`, where the hash mixes a kind tag, the
 * declared name and a coarse signature fingerprint. Nothing positional goes
 * in, so a node keeps its identity wherever the reorganizer moves it.
 *
 * Known gap: structurally identical siblings (two `init();` calls, two
 * objects with the same key path inside one function) get the same
 * identity. Their comments then share one position.
 */
import type { NodePath } from '@babel/traverse';
import type {
  Node,
  ImportDeclaration,
  ExportNamedDeclaration,
  ClassDeclaration,
  ClassExpression,
  ObjectProperty,
  ObjectMethod,
  SpreadElement,
  JSXAttribute,
  JSXSpreadAttribute,
  TSEnumMember,
  TSTypeElement,
} from '@babel/types';
import type { NodeIdentity } from '@declsort/types';
import { shortHash } from '../core/HashUtils.js';
import { canonicalDigest } from './canonicalDigest.js';
import {
  keyName,
  expressionLabel,
  entityName,
  patternName,
  signatureParts,
  jsxElementName,
  jsxAttributeName,
} from './fingerprints.js';

/**
 * Identity ingredients before hashing.
 */
export interface IdentityParts {
  kind: string;
  name: string;
  parts: string[];
}

/**
 * The single place an identity string gets its brand.
 */
function brandIdentity(value: string): NodeIdentity {
  return value as NodeIdentity;
}

export function makeIdentity({ kind, name, parts }: IdentityParts): NodeIdentity {
  return brandIdentity(`${kind}:${name}@${shortHash([kind, name, ...parts])}`);
}

// ─── Top-level statements ────────────────────────────────────────────

function declarationParts(decl: Node): IdentityParts | undefined {
  switch (decl.type) {
    case 'FunctionDeclaration': {
      const name = decl.id?.name ?? 'default';
      return { kind: 'function', name, parts: signatureParts(decl) };
    }
    case 'TSDeclareFunction': {
      const name = decl.id?.name ?? 'default';
      return { kind: 'function', name, parts: ['overload', ...signatureParts(decl)] };
    }
    case 'ClassDeclaration':
      return {
        kind: 'class',
        name: decl.id?.name ?? 'default',
        parts: [decl.superClass ? expressionLabel(decl.superClass) : '', decl.abstract ? 'abstract' : ''],
      };
    case 'VariableDeclaration': {
      const names = decl.declarations.map((d) => patternName(d.id));
      return { kind: 'variable', name: names.join(','), parts: [decl.kind, ...names] };
    }
    case 'TSInterfaceDeclaration':
      return {
        kind: 'interface',
        name: decl.id.name,
        parts: (decl.extends ?? []).map((h) =>
          h.expression.type === 'Identifier' || h.expression.type === 'TSQualifiedName'
            ? entityName(h.expression)
            : expressionLabel(h.expression)
        ),
      };
    case 'TSTypeAliasDeclaration':
      return { kind: 'type', name: decl.id.name, parts: [] };
    case 'TSEnumDeclaration':
      return { kind: 'enum', name: decl.id.name, parts: [decl.const ? 'const' : ''] };
    case 'TSModuleDeclaration': {
      const id = decl.id;
      const name = id.type === 'StringLiteral' ? id.value : expressionLabel(id);
      return { kind: 'namespace', name, parts: [] };
    }
    default:
      return undefined;
  }
}

function importParts(decl: ImportDeclaration): IdentityParts {
  const specifiers = decl.specifiers
    .map((s) => {
      switch (s.type) {
        case 'ImportDefaultSpecifier':
          return `default:${s.local.name}`;
        case 'ImportNamespaceSpecifier':
          return `namespace:${s.local.name}`;
        case 'ImportSpecifier': {
          const imported = s.imported.type === 'Identifier' ? s.imported.name : s.imported.value;
          return `named:${imported}:${s.local.name}:${s.importKind ?? 'value'}`;
        }
      }
    })
    .sort();
  return {
    kind: 'import',
    name: decl.source.value,
    parts: [decl.importKind ?? 'value', ...specifiers],
  };
}

function exportSpecifierParts(decl: ExportNamedDeclaration): string[] {
  return decl.specifiers
    .map((s) => {
      if (s.type === 'ExportSpecifier') {
        const exported = s.exported.type === 'Identifier' ? s.exported.name : s.exported.value;
        return `named:${s.local.name}:${exported}:${s.exportKind ?? 'value'}`;
      }
      if (s.type === 'ExportNamespaceSpecifier') {
        return `namespace:${s.exported.name}`;
      }
      return `default:${s.exported.name}`;
    })
    .sort();
}

const statementCache = new WeakMap<Node, IdentityParts | null>();

/**
 * Identity ingredients of a top-level statement, or undefined for
 * statement kinds that carry no identity (if, for, throw, ...).
 */
export function statementParts(stmt: Node): IdentityParts | undefined {
  const cached = statementCache.get(stmt);
  if (cached !== undefined) return cached ?? undefined;
  const parts = computeStatementParts(stmt);
  statementCache.set(stmt, parts ?? null);
  return parts;
}

function computeStatementParts(stmt: Node): IdentityParts | undefined {
  switch (stmt.type) {
    case 'ImportDeclaration':
      return importParts(stmt);
    case 'ExportNamedDeclaration': {
      if (stmt.declaration) {
        const inner = declarationParts(stmt.declaration);
        return inner && { ...inner, parts: ['export', ...inner.parts] };
      }
      const specifiers = exportSpecifierParts(stmt);
      if (stmt.source) {
        return { kind: 'reexport', name: stmt.source.value, parts: [stmt.exportKind ?? 'value', ...specifiers] };
      }
      return { kind: 'export', name: 'list', parts: [stmt.exportKind ?? 'value', ...specifiers] };
    }
    case 'ExportAllDeclaration':
      return {
        kind: 'reexport',
        name: stmt.source.value,
        parts: ['all', stmt.exportKind ?? 'value'],
      };
    case 'ExportDefaultDeclaration': {
      const decl = stmt.declaration;
      if (decl.type === 'FunctionDeclaration' || decl.type === 'ClassDeclaration' || decl.type === 'TSDeclareFunction') {
        const inner = declarationParts(decl);
        return inner && { kind: 'export-default', name: inner.name, parts: [inner.kind, ...inner.parts] };
      }
      return { kind: 'export-default', name: expressionLabel(decl), parts: [canonicalDigest(decl)] };
    }
    case 'ExpressionStatement':
      return { kind: 'expression', name: expressionLabel(stmt.expression), parts: [canonicalDigest(stmt.expression)] };
    case 'TSExportAssignment':
      return { kind: 'export-assign', name: expressionLabel(stmt.expression), parts: [canonicalDigest(stmt.expression)] };
    case 'TSImportEqualsDeclaration':
      return { kind: 'import-equals', name: stmt.id.name, parts: [stmt.isExport ? 'export' : ''] };
    default:
      return declarationParts(stmt);
  }
}

export function identifyStatement(stmt: Node): NodeIdentity | undefined {
  const parts = statementParts(stmt);
  return parts && makeIdentity(parts);
}

// ─── Class members ───────────────────────────────────────────────────

/**
 * Name a class goes by: its own id, the variable it is assigned to, or
 * "default" for an anonymous default export.
 */
export function className(classPath: NodePath<ClassDeclaration | ClassExpression>): string {
  const node = classPath.node;
  if (node.id) return node.id.name;
  const parent = classPath.parentPath;
  if (parent?.isVariableDeclarator()) return patternName(parent.node.id);
  if (parent?.isExportDefaultDeclaration()) return 'default';
  return '<anonymous>';
}

/**
 * @param container - container path of the class (see containerPath)
 */
export function classMemberParts(member: Node, owner: string, container: string): IdentityParts | undefined {
  const base = (name: string, kind: string, parts: string[]): IdentityParts => ({
    kind: 'member',
    name: `${owner}.${name}`,
    parts: [container, kind, ...parts],
  });

  switch (member.type) {
    case 'ClassMethod':
      if (member.kind === 'constructor') {
        return base('constructor', 'constructor', [String(member.params.length)]);
      }
      return base(keyName(member.key, member.computed), 'method', [
        member.kind,
        member.static ? 'static' : 'instance',
        member.accessibility ?? 'public',
        ...signatureParts(member),
      ]);
    case 'ClassPrivateMethod':
      return base(keyName(member.key, false), 'private-method', [
        member.kind,
        member.static ? 'static' : 'instance',
        ...signatureParts(member),
      ]);
    case 'TSDeclareMethod':
      return base(keyName(member.key, member.computed), 'method', [
        'overload',
        member.kind,
        member.static ? 'static' : 'instance',
        member.accessibility ?? 'public',
        ...signatureParts(member),
      ]);
    case 'ClassProperty':
    case 'ClassAccessorProperty':
      return base(keyName(member.key, member.computed), 'property', [
        member.static ? 'static' : 'instance',
        member.type === 'ClassProperty' ? member.accessibility ?? 'public' : 'accessor',
      ]);
    case 'ClassPrivateProperty':
      return base(keyName(member.key, false), 'private-property', [member.static ? 'static' : 'instance']);
    case 'TSIndexSignature':
      return base('[index]', 'index', [member.static ? 'static' : 'instance', ...member.parameters.map((p) => p.name)]);
    case 'StaticBlock':
      return base('static', 'static-block', []);
    default:
      return undefined;
  }
}

// ─── Object literal properties and JSX attributes ───────────────────

export function objectMemberParts(
  member: ObjectProperty | ObjectMethod | SpreadElement,
  container: string
): IdentityParts | undefined {
  if (member.type === 'SpreadElement') return undefined;
  const key = keyName(member.key, member.computed);
  const accessor = member.type === 'ObjectMethod' ? member.kind : 'init';
  return { kind: 'prop', name: key, parts: [container, accessor] };
}

export function jsxAttributeParts(
  attribute: JSXAttribute | JSXSpreadAttribute,
  container: string,
  element: string
): IdentityParts | undefined {
  if (attribute.type === 'JSXSpreadAttribute') return undefined;
  const name = jsxAttributeName(attribute);
  return { kind: 'jsx_attr', name: `${element}.${name}`, parts: [container] };
}

// ─── Enum and type members ──────────────────────────────────────────

export function enumMemberParts(member: TSEnumMember, container: string): IdentityParts {
  const name = member.id.type === 'Identifier' ? member.id.name : member.id.value;
  return { kind: 'enum_member', name, parts: [container] };
}

/**
 * Interface and type-literal members. Optional and readonly flags count,
 * as do method signatures.
 */
export function typeMemberParts(member: TSTypeElement, container: string): IdentityParts {
  const flags = (optional: boolean | null | undefined, readonly: boolean | null | undefined): string[] => [
    optional ? 'optional' : 'required',
    readonly ? 'readonly' : 'mutable',
  ];
  switch (member.type) {
    case 'TSPropertySignature':
      return {
        kind: 'type_member',
        name: keyName(member.key, member.computed ?? false),
        parts: [container, 'property', ...flags(member.optional, member.readonly)],
      };
    case 'TSMethodSignature':
      return {
        kind: 'type_member',
        name: keyName(member.key, member.computed ?? false),
        parts: [
          container,
          'method',
          member.kind,
          ...flags(member.optional, false),
          ...signatureParts({ params: member.parameters, returnType: member.typeAnnotation }),
        ],
      };
    case 'TSCallSignatureDeclaration':
    case 'TSConstructSignatureDeclaration':
      return {
        kind: 'type_member',
        name: member.type === 'TSCallSignatureDeclaration' ? '()' : 'new()',
        parts: [container, ...signatureParts({ params: member.parameters, returnType: member.typeAnnotation })],
      };
    case 'TSIndexSignature':
      return {
        kind: 'type_member',
        name: '[index]',
        parts: [container, ...flags(false, member.readonly), ...member.parameters.map((p) => p.name)],
      };
  }
}

// ─── Container paths ────────────────────────────────────────────────

/** List keys whose element order the reorganizer never changes */
const INDEXED_LISTS = new Set(['arguments', 'elements', 'children', 'expressions', 'params']);

function nodeLabel(path: NodePath): string {
  const node = path.node;
  let label: string;
  switch (node.type) {
    case 'ObjectProperty':
    case 'ObjectMethod':
    case 'ClassProperty':
    case 'ClassMethod':
    case 'ClassAccessorProperty':
    case 'TSDeclareMethod':
      label = keyName(node.key, node.computed);
      break;
    case 'ClassPrivateProperty':
    case 'ClassPrivateMethod':
      label = keyName(node.key, false);
      break;
    case 'TSPropertySignature':
    case 'TSMethodSignature':
      label = keyName(node.key, node.computed ?? false);
      break;
    case 'VariableDeclarator':
      label = `var:${patternName(node.id)}`;
      break;
    case 'FunctionDeclaration':
    case 'FunctionExpression':
    case 'ClassDeclaration':
    case 'ClassExpression':
      label = `${node.type}:${node.id?.name ?? ''}`;
      break;
    case 'CallExpression':
    case 'OptionalCallExpression':
    case 'NewExpression':
      label = `${expressionLabel(node.callee)}()`;
      break;
    case 'JSXElement':
      label = `<${jsxElementName(node.openingElement)}>`;
      break;
    case 'JSXAttribute':
      label = `@${jsxAttributeName(node)}`;
      break;
    case 'ReturnStatement':
      label = 'return';
      break;
    default:
      label = node.type;
  }
  if (path.listKey !== undefined && INDEXED_LISTS.has(path.listKey)) {
    label += `[${String(path.key)}]`;
  }
  return label;
}

/**
 * Position-free path from the enclosing top-level statement down to `path`
 * (inclusive). The top-level statement contributes its identity.
 *
 * e.g. `variable:config@.../var:config/ObjectExpression/server/ObjectExpression`
 */
export function containerPath(path: NodePath): string {
  const labels: string[] = [];
  let current: NodePath | null = path;
  while (current) {
    const parent: NodePath | null = current.parentPath;
    if (!parent) break;
    if (parent.isProgram()) {
      labels.push(identifyStatement(current.node) ?? `stmt:${current.node.type}`);
      break;
    }
    labels.push(nodeLabel(current));
    current = parent;
  }
  return labels.reverse().join('/');
}
