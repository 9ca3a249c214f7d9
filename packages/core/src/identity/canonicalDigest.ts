/**
 * Structural digest of an AST subtree.
 *
 * Used for statements that have no declared name (expression statements,
 * default exports). The digest ignores positions, comments and parser
 * bookkeeping, and treats the lists the reorganizer may permute as
 * unordered, so the same statement digests identically before and after
 * reorganization and reprinting.
 */
import { hashParts } from '../core/HashUtils.js';

const IGNORED_KEYS = new Set([
  'type',
  'start',
  'end',
  'loc',
  'range',
  'extra',
  'leadingComments',
  'trailingComments',
  'innerComments',
  'comments',
  'tokens',
]);

/** `${parentType}.${key}` of lists whose order carries no meaning for us */
const UNORDERED_LISTS = new Set([
  'ObjectExpression.properties',
  'ObjectPattern.properties',
  'JSXOpeningElement.attributes',
  'ClassBody.body',
  'TSUnionType.types',
  'TSIntersectionType.types',
  'TSEnumDeclaration.members',
  'TSEnumBody.members',
  'ImportDeclaration.specifiers',
  'ExportNamedDeclaration.specifiers',
]);

function isTyped(value: object): value is { type: string } {
  return 'type' in value && typeof value.type === 'string';
}

function serialize(value: unknown): string {
  if (value === null || value === undefined) return '_';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(serialize).join(',')}]`;
  }
  if (typeof value !== 'object') return '_';

  const type = isTyped(value) ? value.type : '';
  const fields: string[] = [];
  for (const [key, field] of Object.entries(value)) {
    if (IGNORED_KEYS.has(key)) continue;
    if (Array.isArray(field) && UNORDERED_LISTS.has(`${type}.${key}`)) {
      fields.push(`${key}={${field.map(serialize).sort().join(',')}}`);
    } else {
      fields.push(`${key}=${serialize(field)}`);
    }
  }
  fields.sort();
  return `${type}(${fields.join(';')})`;
}

/**
 * Order-insensitive (for permutable lists) digest of a subtree.
 */
export function canonicalDigest(node: object): string {
  return hashParts([serialize(node)]);
}
