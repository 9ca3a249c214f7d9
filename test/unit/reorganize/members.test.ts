/**
 * Ordering rules for nested containers: class bodies, object literals,
 * JSX attributes, union types and enums. Also the purity check they share.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseExpression } from '@babel/parser';
import {
  isClass,
  isJSXOpeningElement,
  isObjectExpression,
  isTSEnumDeclaration,
  isTSUnionType,
  traverseFast,
} from '@babel/types';
import type { Node, ObjectExpression } from '@babel/types';
import {
  parseSource,
  reorganize,
  sortClassMembers,
  sortObjectProperties,
  sortJsxAttributes,
  sortTypeMembers,
  sortEnumMembers,
  memberName,
  attributeRank,
  isSideEffectFree,
  DEFAULT_ORGANIZE,
} from '@declsort/core';

function findNode<T extends Node>(source: string, filename: string, guard: (node: Node) => node is T): T {
  const found: T[] = [];
  traverseFast(parseSource(source, filename).file, (node) => {
    if (guard(node)) found.push(node);
  });
  const [first] = found;
  assert.ok(first, 'node not found');
  return first;
}

function propertyLabels(obj: ObjectExpression): string[] {
  return obj.properties.map((p) => {
    if (p.type === 'SpreadElement') return '...';
    return p.key.type === 'Identifier' ? p.key.name : p.key.type;
  });
}

describe('sortClassMembers', () => {
  it('should order members by kind, then by name', () => {
    const source = [
      'class A {',
      '  run() {}',
      '  constructor() {}',
      '  static create() {}',
      '  #secret = 1;',
      "  name = 'x';",
      '  static count = 0;',
      '  [key: string]: unknown;',
      '}',
    ].join('\n');
    const cls = findNode(source, 'sample.ts', isClass);

    assert.strictEqual(sortClassMembers(cls), true);
    assert.deepStrictEqual(cls.body.body.map(memberName), [
      '',
      'count',
      'create',
      'name',
      '#secret',
      'constructor',
      'run',
    ]);
  });

  it('should put private methods after public ones', () => {
    const cls = findNode('class A {\n  private a() {}\n  b() {}\n}', 'sample.ts', isClass);
    sortClassMembers(cls);
    assert.deepStrictEqual(cls.body.body.map(memberName), ['b', 'a']);
  });

  it('should leave classes with static blocks alone', () => {
    const cls = findNode('class A {\n  b() {}\n  static { init(); }\n  a() {}\n}', 'sample.ts', isClass);
    assert.strictEqual(sortClassMembers(cls), false);
    assert.deepStrictEqual(cls.body.body.map(memberName), ['b', '', 'a']);
  });

  it('should leave classes whose fields mention the class', () => {
    const cls = findNode('class B {\n  b() {}\n  static self = B;\n  a() {}\n}', 'sample.ts', isClass);
    assert.strictEqual(sortClassMembers(cls), false);
  });

  it('should report no change for an already ordered class', () => {
    const cls = findNode('class A {\n  a() {}\n  b() {}\n}', 'sample.ts', isClass);
    assert.strictEqual(sortClassMembers(cls), false);
  });
});

describe('sortObjectProperties', () => {
  it('should sort keys within runs between spreads', () => {
    const obj = findNode('x = { b: 1, a: 2, ...rest, d: 4, c: 3 };', 'sample.ts', isObjectExpression);
    assert.strictEqual(sortObjectProperties(obj), true);
    assert.deepStrictEqual(propertyLabels(obj), ['a', 'b', '...', 'c', 'd']);
  });

  it('should leave objects with side-effecting values alone', () => {
    const obj = findNode('x = { b: f(), a: 1 };', 'sample.ts', isObjectExpression);
    assert.strictEqual(sortObjectProperties(obj), false);
    assert.deepStrictEqual(propertyLabels(obj), ['b', 'a']);
  });

  it('should leave objects with a prototype setter alone', () => {
    const obj = findNode('x = { b: 1, __proto__: p, a: 2 };', 'sample.ts', isObjectExpression);
    assert.strictEqual(sortObjectProperties(obj), false);
  });
});

describe('sortJsxAttributes', () => {
  it('should rank key, ref, props and handlers', () => {
    assert.deepStrictEqual(['key', 'ref', 'title', 'onClick', 'one'].map(attributeRank), [0, 1, 2, 3, 2]);
  });

  it('should sort attributes within runs between spreads', () => {
    const source = 'const el = <Button onClick={handle} title="t" key="k" ref={r} {...rest} b a="1" />;';
    const element = findNode(source, 'sample.tsx', isJSXOpeningElement);

    assert.strictEqual(sortJsxAttributes(element), true);
    const names = element.attributes.map((attr) => {
      if (attr.type === 'JSXSpreadAttribute') return '...';
      return attr.name.type === 'JSXIdentifier' ? attr.name.name : attr.name.name.name;
    });
    assert.deepStrictEqual(names, ['key', 'ref', 'title', 'onClick', '...', 'a', 'b']);
  });

  it('should leave elements with side-effecting attribute values alone', () => {
    const element = findNode('const el = <A b={make()} a="1" />;', 'sample.tsx', isJSXOpeningElement);
    assert.strictEqual(sortJsxAttributes(element), false);
  });
});

describe('sortTypeMembers', () => {
  it('should order references, literals, then keywords', () => {
    const union = findNode("type T = null | 'b' | Foo | 'a' | string;", 'sample.ts', isTSUnionType);
    assert.strictEqual(sortTypeMembers(union), true);
    const labels = union.types.map((t) => {
      if (t.type === 'TSTypeReference' && t.typeName.type === 'Identifier') return t.typeName.name;
      if (t.type === 'TSLiteralType' && t.literal.type === 'StringLiteral') return `'${t.literal.value}'`;
      return t.type;
    });
    assert.deepStrictEqual(labels, ['Foo', "'a'", "'b'", 'TSNullKeyword', 'TSStringKeyword']);
  });

  it('should leave unions with structural members alone', () => {
    const union = findNode('type U = B | { x: 1 } | A;', 'sample.ts', isTSUnionType);
    assert.strictEqual(sortTypeMembers(union), false);
  });
});

describe('sortEnumMembers', () => {
  it('should sort string enums', () => {
    const decl = findNode("enum E { B = 'b', A = 'a' }", 'sample.ts', isTSEnumDeclaration);
    assert.strictEqual(sortEnumMembers(decl), true);
    assert.deepStrictEqual(
      decl.members.map((m) => (m.id.type === 'Identifier' ? m.id.name : m.id.value)),
      ['A', 'B']
    );
  });

  it('should leave numeric enums alone', () => {
    const decl = findNode('enum N { B, A }', 'sample.ts', isTSEnumDeclaration);
    assert.strictEqual(sortEnumMembers(decl), false);
  });
});

describe('isSideEffectFree', () => {
  it('should accept literals, reads and function values', () => {
    assert.strictEqual(isSideEffectFree(parseExpression('[1, a.b, () => x, `t${y}`]')), true);
    assert.strictEqual(isSideEffectFree(parseExpression('x as T', { plugins: ['typescript'] })), true);
  });

  it('should reject calls, assignments, deletes and spreads', () => {
    assert.strictEqual(isSideEffectFree(parseExpression('f()')), false);
    assert.strictEqual(isSideEffectFree(parseExpression('a = 1')), false);
    assert.strictEqual(isSideEffectFree(parseExpression('delete a.b')), false);
    assert.strictEqual(isSideEffectFree(parseExpression('({ ...a })')), false);
  });

  it('should accept `this` only when allowed', () => {
    assert.strictEqual(isSideEffectFree(parseExpression('this.x')), false);
    assert.strictEqual(isSideEffectFree(parseExpression('this.x'), { allowThis: true }), true);
  });
});

describe('reorganize', () => {
  it('should count the containers each rule reordered', () => {
    const source = "import b from 'b';\nimport a from 'a';\nconst o = { b: 1, a: 2 };\n";
    const { file } = parseSource(source, 'sample.ts');

    const stats = reorganize(file, DEFAULT_ORGANIZE);
    assert.deepStrictEqual(stats.reordered, {
      imports: 1,
      declarations: 0,
      classMembers: 0,
      objectProperties: 1,
      jsxAttributes: 0,
      unionTypes: 0,
      enumMembers: 0,
      parameterPatterns: 0,
    });
  });

  it('should skip rules that are switched off', () => {
    const { file } = parseSource('const o = { b: 1, a: 2 };\n', 'sample.ts');
    const stats = reorganize(file, { ...DEFAULT_ORGANIZE, objectProperties: false });
    assert.strictEqual(stats.reordered.objectProperties, 0);
  });
});
