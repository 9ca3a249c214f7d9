/**
 * Comment extraction: ownership, reassignment and standalone handling.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { emptyStatement } from '@babel/types';
import {
  parseSource,
  extractComments,
  identifyStatement,
  collectSiblingGroups,
  makeIdentity,
  slotAnchor,
} from '@declsort/core';
import type { ExtractionReport, GroupKind, SiblingMember } from '@declsort/core';
import type { NodeIdentity } from '@declsort/types';

interface Extracted {
  report: ExtractionReport;
  ids: NodeIdentity[];
}

function extract(source: string, filename = 'sample.ts'): Extracted {
  const parsed = parseSource(source, filename);
  const ids = parsed.file.program.body.flatMap((stmt) => {
    const id = identifyStatement(stmt);
    return id ? [id] : [];
  });
  return { report: extractComments(parsed.file, parsed.store, source), ids };
}

interface ExtractedGroup {
  report: ExtractionReport;
  members: NodeIdentity[];
}

/** Extract a file and return the identities of the first group of `kind`. */
function extractGroup(source: string, kind: GroupKind, filename = 'sample.ts'): ExtractedGroup {
  const parsed = parseSource(source, filename);
  const report = extractComments(parsed.file, parsed.store, source);
  const group = collectSiblingGroups(parsed.file).find((g) => g.kind === kind);
  const members = (group?.members ?? []).flatMap((m) => (m.identity ? [m.identity] : []));
  return { report, members };
}

function summary(report: ExtractionReport, id: NodeIdentity): string[] {
  return (report.byIdentity.get(id) ?? []).map((e) => `${e.role}#${e.ordinal}:${e.comment.text}`);
}

describe('extractComments', () => {
  it('should record leading and same-line trailing comments', () => {
    const { report, ids } = extract('// about a\nconst a = 1; // note a\nconst b = 2;\n');
    const [a, b] = ids;

    assert.deepStrictEqual(summary(report, a), ['Leading#0: about a', 'Trailing#0: note a']);
    assert.strictEqual(report.byIdentity.has(b), false);
    assert.deepStrictEqual(report.standalone, []);
    assert.deepStrictEqual([...report.extracted].sort((x, y) => x - y), [0, 24]);
  });

  it('should number several leading comments in order', () => {
    const { report, ids } = extract('// one\n/* two */\nfunction f() {}\n');
    assert.deepStrictEqual(summary(report, ids[0]), ['Leading#0: one', 'Leading#1: two ']);
  });

  it('should move a line-separated trailing comment to the next sibling', () => {
    const { report, ids } = extract('const a = 1;\n// for b\nconst b = 2;\n');
    const [a, b] = ids;

    assert.strictEqual(report.byIdentity.has(a), false);
    assert.deepStrictEqual(summary(report, b), ['Leading#0: for b']);
    assert.strictEqual(report.reassigned, 1);
  });

  it('should keep a comment below its node when a blank line cuts it from the next sibling', () => {
    const { report, ids } = extract('const a = 1;\n// dangling\n\nconst b = 2;\n');
    const [a, b] = ids;

    assert.deepStrictEqual(summary(report, a), ['Trailing#0: dangling']);
    assert.strictEqual(report.byIdentity.get(a)?.[0].ownLine, true);
    assert.strictEqual(report.byIdentity.has(b), false);
    assert.deepStrictEqual(report.standalone, []);
    assert.strictEqual(report.reassigned, 0);
  });

  it('should keep the last comment of a group with the last member', () => {
    const { report, ids } = extract('run();\nconst a = 1;\n// after a\n');
    assert.deepStrictEqual(summary(report, ids[1]), ['Trailing#0: after a']);
    assert.strictEqual(report.byIdentity.get(ids[1])?.[0].ownLine, true);
  });

  it('should make blank-isolated comments standalone', () => {
    const { report, ids } = extract('const a = 1;\n\n// section\n\nconst b = 2;\n');

    assert.strictEqual(report.byIdentity.size, 0);
    assert.deepStrictEqual(
      report.standalone.map((s) => [s.comment.text, s.originalLine, s.isolated]),
      [[' section', 2, true]]
    );
    assert.deepStrictEqual(report.standalone[0].anchor, { side: 'before', identities: [ids[1]] });
  });

  it('should pin a comment ahead of every member to the start of the group', () => {
    const { report, ids } = extract('// header\n\nconst b = 1;\nconst a = 2;\n');
    assert.strictEqual(report.standalone.length, 1);
    assert.deepStrictEqual(report.standalone[0].anchor, { side: 'before', identities: ids });
  });

  it('should pin a comment behind every member to the end of the group', () => {
    const source = 'class A {\n  b() {}\n\n  // end\n\n}\n';
    const parsed = parseSource(source, 'sample.ts');
    const report = extractComments(parsed.file, parsed.store, source);
    const classGroup = collectSiblingGroups(parsed.file).find((g) => g.kind === 'class');
    const b = classGroup?.members[0].identity;
    assert.ok(b);

    assert.deepStrictEqual(
      report.standalone.map((s) => [s.comment.text, s.nestingDepth, s.isolated]),
      [[' end', 1, true]]
    );
    assert.deepStrictEqual(report.standalone[0].anchor, { side: 'after', identities: [b] });
  });

  it('should leave inline comments in the tree', () => {
    const { report } = extract('foo(/* x */ 1);\n');
    assert.strictEqual(report.byIdentity.size, 0);
    assert.deepStrictEqual(report.standalone, []);
    assert.strictEqual(report.extracted.size, 0);
  });

  it('should keep comments of a comment-only file as standalone', () => {
    const { report } = extract('// only\n');
    assert.deepStrictEqual(
      report.standalone.map((s) => [s.comment.text, s.originalLine, s.isolated]),
      [[' only', 0, true]]
    );
    assert.strictEqual(report.standalone[0].anchor, undefined);
  });

  it('should extract class member comments with the nesting depth of the body', () => {
    const source = 'class A {\n  // about b\n  b() {}\n  a() {} // note\n}\n';
    const parsed = parseSource(source, 'sample.ts');
    const report = extractComments(parsed.file, parsed.store, source);
    const classGroup = collectSiblingGroups(parsed.file).find((g) => g.kind === 'class');
    assert.ok(classGroup);
    assert.strictEqual(classGroup.depth, 1);

    const [b, a] = classGroup.members.map((m) => m.identity);
    assert.ok(b && a);
    assert.deepStrictEqual(summary(report, b), ['Leading#0: about b']);
    assert.deepStrictEqual(summary(report, a), ['Trailing#0: note']);
  });

  it('should give a comment after a comma to the member it follows', () => {
    const { report, members } = extractGroup('const o = {\n  b: 1, // bee\n  a: 2, // ay\n};\n', 'object');
    const [b, a] = members;

    assert.deepStrictEqual(summary(report, b), ['Trailing#0: bee']);
    assert.deepStrictEqual(summary(report, a), ['Trailing#0: ay']);
    assert.deepStrictEqual(report.standalone, []);
  });

  it('should extract enum member comments by identity', () => {
    const { report, members } = extractGroup('enum E {\n  B = 2, // bee\n  A = 1, // ay\n}\n', 'enum');
    const [b, a] = members;

    assert.deepStrictEqual(summary(report, b), ['Trailing#0: bee']);
    assert.deepStrictEqual(summary(report, a), ['Trailing#0: ay']);
  });

  it('should extract interface member comments by identity', () => {
    const { report, members } = extractGroup(
      'interface Props {\n  // the label\n  b: string; // bee\n  a: number;\n}\n',
      'type'
    );
    const [b, a] = members;

    assert.deepStrictEqual(summary(report, b), ['Leading#0: the label', 'Trailing#0: bee']);
    assert.strictEqual(report.byIdentity.has(a), false);
  });

  it('should extract a trailing comment between JSX attributes', () => {
    const { report, members } = extractGroup(
      'const el = (\n  <Button\n    kind="primary" /* look */\n    onClick={go}\n  />\n);\n',
      'jsx',
      'view.tsx'
    );
    const [kind, onClick] = members;

    assert.deepStrictEqual(summary(report, kind), ['Trailing#0: look ']);
    assert.strictEqual(report.byIdentity.has(onClick), false);
  });
});

describe('slotAnchor', () => {
  const A = makeIdentity({ kind: 'variable', name: 'a', parts: [] });
  const B = makeIdentity({ kind: 'variable', name: 'b', parts: [] });
  const member = (identity: NodeIdentity | undefined): SiblingMember => ({ node: emptyStatement(), identity });

  it('should take the next identified member, skipping those without identity', () => {
    const members = [member(A), member(undefined), member(B)];
    assert.deepStrictEqual(slotAnchor(members, 1), { side: 'before', identities: [B] });
  });

  it('should fall back to the group edges', () => {
    const members = [member(undefined), member(A), member(B)];
    assert.deepStrictEqual(slotAnchor(members, 1), { side: 'before', identities: [A, B] });
    assert.deepStrictEqual(slotAnchor(members, 3), { side: 'after', identities: [A, B] });
  });

  it('should leave groups without identities unanchored', () => {
    assert.strictEqual(slotAnchor([member(undefined)], 0), undefined);
  });
});
