/**
 * Class member ordering:
 *
 *   index signatures
 *   static fields (public, private)
 *   static methods (public, private)
 *   instance fields (public, private)
 *   constructor
 *   methods (public, private)
 *
 * then by name. Classes whose member order could be observed are left
 * alone: static blocks, decorators, and field initializers that have side
 * effects, read `this`, or mention the class itself.
 */
import { traverseFast } from '@babel/types';
import type { ClassBody, ClassDeclaration, ClassExpression, Node } from '@babel/types';
import { keyName } from '../identity/fingerprints.js';
import { compareNames, sortStable } from './compare.js';
import { isSideEffectFree } from './purity.js';

type ClassMember = ClassBody['body'][number];

const RANK = {
  indexSignature: 0,
  staticField: 1,
  staticPrivateField: 2,
  staticMethod: 3,
  staticPrivateMethod: 4,
  field: 5,
  privateField: 6,
  ctor: 7,
  method: 8,
  privateMethod: 9,
  other: 10,
} as const;

function isField(member: ClassMember): boolean {
  return member.type === 'ClassProperty' || member.type === 'ClassPrivateProperty' || member.type === 'ClassAccessorProperty';
}

function isPrivate(member: ClassMember): boolean {
  if (member.type === 'ClassPrivateProperty' || member.type === 'ClassPrivateMethod') return true;
  if (member.type === 'StaticBlock' || member.type === 'TSIndexSignature') return false;
  return member.key.type === 'PrivateName' || member.accessibility === 'private';
}

export function memberRank(member: ClassMember): number {
  if (member.type === 'TSIndexSignature') return RANK.indexSignature;
  if (member.type === 'StaticBlock') return RANK.other;
  if ((member.type === 'ClassMethod' || member.type === 'TSDeclareMethod') && member.kind === 'constructor') {
    return RANK.ctor;
  }
  const priv = isPrivate(member);
  if (isField(member)) {
    if (member.static) return priv ? RANK.staticPrivateField : RANK.staticField;
    return priv ? RANK.privateField : RANK.field;
  }
  if (member.static) return priv ? RANK.staticPrivateMethod : RANK.staticMethod;
  return priv ? RANK.privateMethod : RANK.method;
}

export function memberName(member: ClassMember): string {
  if (member.type === 'StaticBlock' || member.type === 'TSIndexSignature') return '';
  if (member.type === 'ClassPrivateProperty' || member.type === 'ClassPrivateMethod') return `#${member.key.id.name}`;
  return keyName(member.key, member.computed);
}

function mentions(node: Node | null | undefined, name: string): boolean {
  if (!node) return false;
  let found = false;
  traverseFast(node, (child) => {
    if (child.type === 'Identifier' && child.name === name) found = true;
  });
  return found;
}

function isSortable(cls: ClassDeclaration | ClassExpression): boolean {
  if (cls.decorators && cls.decorators.length > 0) return false;
  const ownName = cls.id?.name;
  return cls.body.body.every((member) => {
    if (member.type === 'StaticBlock') return false;
    if (member.type === 'TSIndexSignature') return true;
    if (member.decorators && member.decorators.length > 0) return false;
    if (member.type !== 'ClassPrivateProperty' && member.type !== 'ClassPrivateMethod' && member.computed) {
      if (!isSideEffectFree(member.key)) return false;
    }
    if (member.type === 'ClassProperty' || member.type === 'ClassPrivateProperty' || member.type === 'ClassAccessorProperty') {
      if (!isSideEffectFree(member.value, { allowThis: false })) return false;
      if (ownName && mentions(member.value, ownName)) return false;
    }
    return true;
  });
}

/**
 * @returns whether the members were reordered
 */
export function sortClassMembers(cls: ClassDeclaration | ClassExpression): boolean {
  if (!isSortable(cls)) return false;
  const before = cls.body.body;
  const after = sortStable(before, (a, b) => memberRank(a) - memberRank(b) || compareNames(memberName(a), memberName(b)));
  cls.body.body = after;
  return after.some((member, i) => member !== before[i]);
}
