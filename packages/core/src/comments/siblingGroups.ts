/**
 * Sibling groups - the lists of nodes whose order the reorganizer changes
 * and whose comments therefore travel by identity.
 *
 * One dispatch entry per container kind:
 *   Program            -> top-level statements
 *   ClassBody          -> class members (qualified by class name)
 *   ObjectExpression   -> properties
 *   JSXOpeningElement  -> attributes
 *   TSEnumDeclaration  -> enum members
 *   TSInterfaceBody,
 *   TSTypeLiteral      -> property, method and index signatures
 *
 * Both the extractor (original tree) and the position recoverer (skeleton
 * tree) build their view through this module, so identities on both sides
 * come from the same code.
 */
import traverseModule from '@babel/traverse';
import type { NodePath } from '@babel/traverse';
import type { File, Node, TSTypeElement } from '@babel/types';
import type { NodeIdentity } from '@declsort/types';
import { getTraverseFunction } from '../parser/babelInterop.js';
import {
  identifyStatement,
  classMemberParts,
  objectMemberParts,
  jsxAttributeParts,
  enumMemberParts,
  typeMemberParts,
  className,
  containerPath,
  makeIdentity,
  type IdentityParts,
} from '../identity/IdentityAssigner.js';
import { jsxElementName } from '../identity/fingerprints.js';

const traverse = getTraverseFunction(traverseModule);

export type GroupKind = 'program' | 'class' | 'object' | 'jsx' | 'enum' | 'type';

export interface SiblingMember {
  node: Node;
  identity: NodeIdentity | undefined;
}

export interface SiblingGroup {
  kind: GroupKind;
  /** Indentation level of the members when printed */
  depth: number;
  members: SiblingMember[];
}

const NESTING_TYPES = new Set([
  'BlockStatement',
  'StaticBlock',
  'ClassBody',
  'ObjectExpression',
  'TSModuleBlock',
  'TSInterfaceBody',
  'TSTypeLiteral',
  'TSEnumDeclaration',
  'SwitchCase',
  'JSXElement',
]);

function depthOf(path: NodePath): number {
  let depth = 0;
  let current: NodePath | null = path;
  while (current) {
    if (NESTING_TYPES.has(current.node.type)) depth++;
    current = current.parentPath;
  }
  return depth;
}

function toIdentity(parts: IdentityParts | undefined): NodeIdentity | undefined {
  return parts && makeIdentity(parts);
}

function typeGroup(path: NodePath, members: readonly TSTypeElement[]): SiblingGroup {
  const container = containerPath(path);
  return {
    kind: 'type',
    depth: depthOf(path),
    members: members.map((node) => ({ node, identity: makeIdentity(typeMemberParts(node, container)) })),
  };
}

/**
 * All sibling groups of a file, program first, nested groups in document
 * order.
 */
export function collectSiblingGroups(file: File): SiblingGroup[] {
  const groups: SiblingGroup[] = [];

  traverse(file, {
    noScope: true,

    Program(path) {
      groups.push({
        kind: 'program',
        depth: 0,
        members: path.node.body.map((node) => ({ node, identity: identifyStatement(node) })),
      });
    },

    ClassBody(path) {
      const classPath = path.parentPath;
      if (!classPath.isClass()) return;
      const container = containerPath(classPath);
      const owner = className(classPath);
      groups.push({
        kind: 'class',
        depth: depthOf(path),
        members: path.node.body.map((node) => ({
          node,
          identity: toIdentity(classMemberParts(node, owner, container)),
        })),
      });
    },

    ObjectExpression(path) {
      const container = containerPath(path);
      groups.push({
        kind: 'object',
        depth: depthOf(path),
        members: path.node.properties.map((node) => ({
          node,
          identity: toIdentity(objectMemberParts(node, container)),
        })),
      });
    },

    JSXOpeningElement(path) {
      if (path.node.attributes.length === 0) return;
      const container = containerPath(path);
      const element = jsxElementName(path.node);
      groups.push({
        kind: 'jsx',
        depth: depthOf(path),
        members: path.node.attributes.map((node) => ({
          node,
          identity: toIdentity(jsxAttributeParts(node, container, element)),
        })),
      });
    },

    TSEnumDeclaration(path) {
      const container = containerPath(path);
      groups.push({
        kind: 'enum',
        depth: depthOf(path),
        members: path.node.members.map((node) => ({
          node,
          identity: makeIdentity(enumMemberParts(node, container)),
        })),
      });
    },

    TSInterfaceBody(path) {
      groups.push(typeGroup(path, path.node.body));
    },

    TSTypeLiteral(path) {
      if (path.node.members.length === 0) return;
      groups.push(typeGroup(path, path.node.members));
    },
  });

  return groups;
}
