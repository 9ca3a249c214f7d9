/**
 * Destructured parameter ordering: `function f({ b, a })` binds the same
 * names as `function f({ a, b })`, so object patterns in parameter lists
 * are sorted by key. Positional parameters and array patterns keep their
 * order; object patterns nested inside them are still sorted.
 */
import { traverseFast } from '@babel/types';
import type { Function as FunctionNode, Node, ObjectPattern } from '@babel/types';
import { keyName } from '../identity/fingerprints.js';
import { compareNames, sortStable } from './compare.js';
import { boundNames } from './declarations.js';
import { isSideEffectFree } from './purity.js';

type PatternMember = ObjectPattern['properties'][number];

function mentions(node: Node, names: ReadonlySet<string>): boolean {
  let found = false;
  traverseFast(node, (child) => {
    if (child.type === 'Identifier' && names.has(child.name)) found = true;
  });
  return found;
}

/**
 * Defaults run left to right and may read bindings made before them, so a
 * pattern is only sortable when no default can observe the order.
 */
function defaultsAreInert(pattern: ObjectPattern, names: ReadonlySet<string>): boolean {
  let inert = true;
  traverseFast(pattern, (node) => {
    if (node.type !== 'AssignmentPattern') return;
    if (!isSideEffectFree(node.right) || mentions(node.right, names)) inert = false;
  });
  return inert;
}

function hasStaticKeys(pattern: ObjectPattern): boolean {
  return pattern.properties.every(
    (member) =>
      member.type === 'RestElement' ||
      !member.computed ||
      member.key.type === 'StringLiteral' ||
      member.key.type === 'NumericLiteral'
  );
}

function memberKey(member: PatternMember): string {
  return member.type === 'RestElement' ? '' : keyName(member.key, member.computed);
}

/** Every object pattern reachable without crossing a default value. */
function nestedPatterns(node: Node, found: ObjectPattern[] = []): ObjectPattern[] {
  switch (node.type) {
    case 'ObjectPattern':
      found.push(node);
      for (const member of node.properties) {
        nestedPatterns(member.type === 'RestElement' ? member.argument : member.value, found);
      }
      break;
    case 'ArrayPattern':
      for (const element of node.elements) {
        if (element) nestedPatterns(element, found);
      }
      break;
    case 'AssignmentPattern':
      nestedPatterns(node.left, found);
      break;
    case 'RestElement':
      nestedPatterns(node.argument, found);
      break;
    case 'TSParameterProperty':
      nestedPatterns(node.parameter, found);
      break;
  }
  return found;
}

/**
 * Sort one pattern's properties by key; the rest element stays last.
 *
 * @returns whether the properties were reordered
 */
export function sortObjectPattern(pattern: ObjectPattern, names: ReadonlySet<string> = new Set()): boolean {
  if (!hasStaticKeys(pattern) || !defaultsAreInert(pattern, names)) return false;

  const before = pattern.properties;
  const rest = before.filter((member) => member.type === 'RestElement');
  const keyed = before.filter((member) => member.type !== 'RestElement');
  const after = [...sortStable(keyed, (a, b) => compareNames(memberKey(a), memberKey(b))), ...rest];

  pattern.properties = after;
  return after.some((member, i) => member !== before[i]);
}

/**
 * @returns whether any parameter pattern was reordered
 */
export function sortParameterPatterns(fn: FunctionNode): boolean {
  // a default may read any name bound anywhere in the parameter list
  const names = new Set(
    fn.params.flatMap((param) => boundNames(param.type === 'TSParameterProperty' ? param.parameter : param))
  );
  let changed = false;
  for (const param of fn.params) {
    for (const pattern of nestedPatterns(param)) {
      if (sortObjectPattern(pattern, names)) changed = true;
    }
  }
  return changed;
}
