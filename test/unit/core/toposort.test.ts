/**
 * Tests for the priority topological sort behind declaration ordering.
 *
 * - Input order is the preference order
 * - Dependencies pull items ahead only as far as needed
 * - Unknown and self dependencies are ignored
 * - Cycles raise CycleError naming the cycle
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { toposort, CycleError } from '@declsort/core';
import type { ToposortItem } from '@declsort/core';

describe('toposort', () => {
  it('should return empty array for empty input', () => {
    assert.deepStrictEqual(toposort([]), []);
  });

  it('should keep input order when nothing depends on anything', () => {
    const items: ToposortItem[] = [
      { id: 'zeta', dependencies: [] },
      { id: 'alpha', dependencies: [] },
      { id: 'mid', dependencies: [] },
    ];
    assert.deepStrictEqual(toposort(items), ['zeta', 'alpha', 'mid']);
  });

  it('should move a dependency only as far ahead as needed', () => {
    // preferred order a, b, c, d; b needs d
    const items: ToposortItem[] = [
      { id: 'a', dependencies: [] },
      { id: 'b', dependencies: ['d'] },
      { id: 'c', dependencies: [] },
      { id: 'd', dependencies: [] },
    ];
    assert.deepStrictEqual(toposort(items), ['a', 'c', 'd', 'b']);
  });

  it('should sort a chain given in reverse', () => {
    const items: ToposortItem[] = [
      { id: 'C', dependencies: ['B'] },
      { id: 'B', dependencies: ['A'] },
      { id: 'A', dependencies: [] },
    ];
    assert.deepStrictEqual(toposort(items), ['A', 'B', 'C']);
  });

  it('should ignore dependencies outside the input set', () => {
    const items: ToposortItem[] = [
      { id: 'config', dependencies: ['process'] },
      { id: 'server', dependencies: ['config', 'express'] },
    ];
    assert.deepStrictEqual(toposort(items), ['config', 'server']);
  });

  it('should ignore self and duplicate dependencies', () => {
    const items: ToposortItem[] = [
      { id: 'B', dependencies: ['A', 'A'] },
      { id: 'A', dependencies: ['A'] },
    ];
    assert.deepStrictEqual(toposort(items), ['A', 'B']);
  });

  it('should throw CycleError on a two-node cycle', () => {
    const items: ToposortItem[] = [
      { id: 'A', dependencies: ['B'] },
      { id: 'B', dependencies: ['A'] },
    ];
    assert.throws(
      () => toposort(items),
      (err: unknown) => {
        assert.ok(err instanceof CycleError, 'should be CycleError');
        assert.deepStrictEqual(err.cycle, ['A', 'B', 'A']);
        assert.strictEqual(err.message, 'Dependency cycle detected: A -> B -> A');
        return true;
      }
    );
  });

  it('should name only the cycle members when other items sort fine', () => {
    const items: ToposortItem[] = [
      { id: 'ok1', dependencies: [] },
      { id: 'ok2', dependencies: ['ok1'] },
      { id: 'x', dependencies: ['y'] },
      { id: 'y', dependencies: ['x'] },
    ];
    assert.throws(
      () => toposort(items),
      (err: unknown) => {
        assert.ok(err instanceof CycleError);
        assert.deepStrictEqual(err.cycle, ['x', 'y', 'x']);
        return true;
      }
    );
  });
});
