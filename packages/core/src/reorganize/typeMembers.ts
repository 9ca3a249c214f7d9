/**
 * Union/intersection member ordering and string enum ordering.
 */
import type { TSEnumDeclaration, TSIntersectionType, TSType, TSUnionType } from '@babel/types';
import { entityName } from '../identity/fingerprints.js';
import { compareNames, sortStable } from './compare.js';

interface TypeSortKey {
  group: number;
  text: string;
}

/**
 * References first, then literals, then keywords (`null`, `undefined`
 * last in practice). Undefined for members that are not simple.
 */
export function typeSortKey(type: TSType): TypeSortKey | undefined {
  if (type.type === 'TSTypeReference') {
    return { group: 0, text: entityName(type.typeName) };
  }
  if (type.type === 'TSLiteralType') {
    const literal = type.literal;
    switch (literal.type) {
      case 'StringLiteral':
        return { group: 1, text: literal.value };
      case 'NumericLiteral':
      case 'BooleanLiteral':
        return { group: 1, text: String(literal.value) };
      default:
        return undefined;
    }
  }
  if (type.type.endsWith('Keyword')) {
    return { group: 2, text: type.type };
  }
  return undefined;
}

/**
 * @returns whether the members were reordered
 */
export function sortTypeMembers(node: TSUnionType | TSIntersectionType): boolean {
  const keyed: Array<{ type: TSType; key: TypeSortKey }> = [];
  for (const type of node.types) {
    const key = typeSortKey(type);
    if (!key) return false;
    keyed.push({ type, key });
  }

  const before = node.types;
  const after = sortStable(keyed, (a, b) => a.key.group - b.key.group || compareNames(a.key.text, b.key.text)).map(
    ({ type }) => type
  );
  node.types = after;
  return after.some((type, i) => type !== before[i]);
}

/**
 * Only enums whose every member has a string initializer; numeric members
 * would change value when moved.
 */
export function sortEnumMembers(decl: TSEnumDeclaration): boolean {
  const before = decl.members;
  if (!before.every((member) => member.initializer?.type === 'StringLiteral')) return false;
  const name = (member: (typeof before)[number]): string =>
    member.id.type === 'Identifier' ? member.id.name : member.id.value;
  const after = sortStable(before, (a, b) => compareNames(name(a), name(b)));
  decl.members = after;
  return after.some((member, i) => member !== before[i]);
}
