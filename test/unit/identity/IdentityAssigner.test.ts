/**
 * Identity assignment tests
 *
 * Identities must survive reordering and reprinting, and must separate
 * nodes a reader would consider different.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseSource, identifyStatement, collectSiblingGroups } from '@declsort/core';
import { identityLabel, isNodeIdentity, type NodeIdentity } from '@declsort/types';

function topLevel(source: string, filename = 'sample.ts'): (NodeIdentity | undefined)[] {
  return parseSource(source, filename).file.program.body.map(identifyStatement);
}

function labels(source: string, filename = 'sample.ts'): string[] {
  return topLevel(source, filename).map((id) => (id ? identityLabel(id) : '-'));
}

function groupIdentities(source: string, kind: string, filename = 'sample.ts'): (NodeIdentity | undefined)[] {
  const groups = collectSiblingGroups(parseSource(source, filename).file).filter((g) => g.kind === kind);
  return groups.flatMap((g) => g.members.map((m) => m.identity));
}

describe('identifyStatement', () => {
  it('should produce kind:name@hash strings', () => {
    const [id] = topLevel('export function load(path: string): void {}');
    assert.ok(id !== undefined && isNodeIdentity(id));
    assert.strictEqual(identityLabel(id), 'function:load');
  });

  it('should label each statement kind', () => {
    assert.deepStrictEqual(
      labels(
        [
          "import { a } from './a';",
          "export * from './b';",
          'export { a };',
          'class Store {}',
          'interface Shape {}',
          'type Id = string;',
          'enum Mode { A }',
          'const x = 1, y = 2;',
          'start();',
          'if (x) {}',
        ].join('\n')
      ),
      [
        'import:./a',
        'reexport:./b',
        'export:list',
        'class:Store',
        'interface:Shape',
        'type:Id',
        'enum:Mode',
        'variable:x,y',
        'expression:start()',
        '-',
      ]
    );
  });

  it('should not depend on position', () => {
    const [a1, b1] = topLevel('function a() {}\nfunction b() {}');
    const [b2, a2] = topLevel('\n\nfunction b() {}\n\n\nfunction a() {}');
    assert.strictEqual(a1, a2);
    assert.strictEqual(b1, b2);
    assert.notStrictEqual(a1, b1);
  });

  it('should ignore import specifier order', () => {
    const [first] = topLevel("import { b, a } from './x';");
    const [second] = topLevel("import { a, b } from './x';");
    assert.strictEqual(first, second);
  });

  it('should tell overload signatures from the implementation', () => {
    const ids = topLevel('function f(a: string): void;\nfunction f(a: number): void;\nfunction f(a: unknown) {}');
    assert.strictEqual(new Set(ids).size, 3);
  });

  it('should separate expression statements by content, not by property order', () => {
    const [one, two] = topLevel('run(1);\nrun(2);');
    assert.notStrictEqual(one, two);

    const [sorted] = topLevel('configure({ a: 1, b: 2 });');
    const [unsorted] = topLevel('configure({ b: 2, a: 1 });');
    assert.strictEqual(sorted, unsorted);
  });

  it('should ignore comments inside the statement', () => {
    const [plain] = topLevel('start(1);');
    const [commented] = topLevel('start(/* first */ 1);');
    assert.strictEqual(plain, commented);
  });
});

describe('nested identities', () => {
  it('should qualify class members by class name', () => {
    const ids = groupIdentities('class A {\n  run() {}\n  static make() {}\n  #secret = 1;\n}', 'class');
    assert.deepStrictEqual(
      ids.map((id) => (id ? identityLabel(id) : '-')),
      ['member:A.run', 'member:A.make', 'member:A.#secret']
    );
  });

  it('should keep member identities across member reordering', () => {
    const before = groupIdentities('class A {\n  b() {}\n  a() {}\n}', 'class');
    const after = groupIdentities('class A {\n  a() {}\n  b() {}\n}', 'class');
    assert.deepStrictEqual([...before].reverse(), after);
  });

  it('should separate same-named members of different classes', () => {
    const ids = groupIdentities('class A {\n  run() {}\n}\nclass B {\n  run() {}\n}', 'class');
    assert.strictEqual(ids.length, 2);
    assert.notStrictEqual(ids[0], ids[1]);
  });

  it('should separate same-named properties of different objects', () => {
    const ids = groupIdentities('const a = { x: 1 };\nconst b = { x: 1 };', 'object');
    assert.strictEqual(ids.length, 2);
    assert.notStrictEqual(ids[0], ids[1]);
    assert.ok(ids.every((id) => id !== undefined && identityLabel(id) === 'prop:x'));
  });

  it('should give spreads no identity', () => {
    const ids = groupIdentities('const o = { ...base, x: 1 };', 'object');
    assert.strictEqual(ids[0], undefined);
    assert.ok(ids[1] !== undefined);
  });

  it('should name JSX attributes after their element', () => {
    const ids = groupIdentities('const el = <Button kind="primary" onClick={go} />;', 'jsx', 'view.tsx');
    assert.deepStrictEqual(
      ids.map((id) => (id ? identityLabel(id) : '-')),
      ['jsx_attr:Button.kind', 'jsx_attr:Button.onClick']
    );
  });
});

describe('enum and type member identities', () => {
  const label = (id: NodeIdentity | undefined): string => (id ? identityLabel(id) : '-');

  it('should name enum members', () => {
    const ids = groupIdentities('enum Mode {\n  B = 1,\n  A = 2,\n}', 'enum');
    assert.deepStrictEqual(ids.map(label), ['enum_member:B', 'enum_member:A']);
  });

  it('should name interface and type literal members', () => {
    assert.deepStrictEqual(
      groupIdentities('interface Props {\n  id: string;\n  readonly name?: string;\n  load(): void;\n}', 'type').map(label),
      ['type_member:id', 'type_member:name', 'type_member:load']
    );
    assert.deepStrictEqual(groupIdentities('type P = { b: string; a: number };', 'type').map(label), [
      'type_member:b',
      'type_member:a',
    ]);
  });

  it('should keep enum member identities across reordering', () => {
    const before = groupIdentities("enum C {\n  Red = 'red',\n  Blue = 'blue',\n}", 'enum');
    const after = groupIdentities("enum C {\n  Blue = 'blue',\n  Red = 'red',\n}", 'enum');
    assert.deepStrictEqual([...before].reverse(), after);
  });

  it('should separate optional from required properties', () => {
    const [required] = groupIdentities('interface P {\n  id: string;\n}', 'type');
    const [optional] = groupIdentities('interface P {\n  id?: string;\n}', 'type');
    assert.notStrictEqual(required, optional);
  });
});

describe('identity sensitivity', () => {
  it('should change with the declared name', () => {
    const [load] = topLevel('function load() {}');
    const [save] = topLevel('function save() {}');
    assert.notStrictEqual(load, save);
  });

  it('should change with the parameter pattern but not with destructuring order', () => {
    const [plain] = topLevel('function f(options) {}');
    const [destructured] = topLevel('function f({ a, b }) {}');
    const [reordered] = topLevel('function f({ b, a }) {}');
    assert.notStrictEqual(plain, destructured);
    assert.strictEqual(destructured, reordered);
  });

  it('should change with the return type tag', () => {
    const [text] = topLevel('function f(): string {}');
    const [count] = topLevel('function f(): number {}');
    assert.notStrictEqual(text, count);
  });

  it('should change with static and visibility modifiers', () => {
    const [instance] = groupIdentities('class A {\n  run() {}\n}', 'class');
    const [staticRun] = groupIdentities('class A {\n  static run() {}\n}', 'class');
    const [privateRun] = groupIdentities('class A {\n  private run() {}\n}', 'class');
    assert.strictEqual(new Set([instance, staticRun, privateRun]).size, 3);
  });
});
