/**
 * Position recovery from a reprinted skeleton.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { recoverPositions, parseSource, collectSiblingGroups, identifyStatement } from '@declsort/core';

describe('recoverPositions', () => {
  const skeleton = 'const a = 1;\nclass B {\n  run() {}\n}\n';

  it('should locate top-level statements', () => {
    const { file } = parseSource(skeleton, 'skeleton.ts');
    const [a, b] = file.program.body.map(identifyStatement);
    assert.ok(a && b);

    const positions = recoverPositions(skeleton, 'skeleton.ts');
    assert.deepStrictEqual(positions.get(a), {
      startLine: 0,
      startColumn: 0,
      endLine: 0,
      endColumn: 12,
      indentation: '',
    });
    assert.deepStrictEqual(positions.get(b), {
      startLine: 1,
      startColumn: 0,
      endLine: 3,
      endColumn: 1,
      indentation: '',
    });
  });

  it('should locate nested members with their indentation', () => {
    const { file } = parseSource(skeleton, 'skeleton.ts');
    const classGroup = collectSiblingGroups(file).find((g) => g.kind === 'class');
    const run = classGroup?.members[0]?.identity;
    assert.ok(run);

    assert.deepStrictEqual(recoverPositions(skeleton, 'skeleton.ts').get(run), {
      startLine: 2,
      startColumn: 2,
      endLine: 2,
      endColumn: 10,
      indentation: '  ',
    });
  });

  it('should return an empty index for a skeleton that does not parse', () => {
    assert.strictEqual(recoverPositions('const = ;', 'skeleton.ts').size, 0);
  });
});
