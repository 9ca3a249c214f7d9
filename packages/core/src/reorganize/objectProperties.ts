/**
 * Object literal property ordering: by key, case-insensitive, within the
 * runs between spread elements.
 */
import type { ObjectExpression } from '@babel/types';
import { keyName } from '../identity/fingerprints.js';
import { compareNames, sortStable } from './compare.js';
import { isSideEffectFree } from './purity.js';

type ObjectMember = ObjectExpression['properties'][number];

function isLiteralKey(member: ObjectMember): boolean {
  if (member.type === 'SpreadElement' || !member.computed) return true;
  return member.key.type === 'StringLiteral' || member.key.type === 'NumericLiteral';
}

function isProtoSetter(member: ObjectMember): boolean {
  if (member.type !== 'ObjectProperty' || member.computed) return false;
  return keyName(member.key, false) === '__proto__';
}

function isSortable(obj: ObjectExpression): boolean {
  return obj.properties.every((member) => {
    if (!isLiteralKey(member) || isProtoSetter(member)) return false;
    if (member.type === 'SpreadElement') return isSideEffectFree(member.argument);
    return member.type === 'ObjectMethod' || isSideEffectFree(member.value);
  });
}

function propertyName(member: ObjectMember): string {
  return member.type === 'SpreadElement' ? '' : keyName(member.key, member.computed);
}

/**
 * @returns whether the properties were reordered
 */
export function sortObjectProperties(obj: ObjectExpression): boolean {
  if (!isSortable(obj)) return false;

  const before = obj.properties;
  const after: ObjectMember[] = [];
  let run: ObjectMember[] = [];
  const flush = (): void => {
    after.push(...sortStable(run, (a, b) => compareNames(propertyName(a), propertyName(b))));
    run = [];
  };
  for (const member of before) {
    if (member.type === 'SpreadElement') {
      flush();
      after.push(member);
    } else {
      run.push(member);
    }
  }
  flush();

  obj.properties = after;
  return after.some((member, i) => member !== before[i]);
}
