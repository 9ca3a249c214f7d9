/**
 * DeclsortError hierarchy tests
 *
 * - every subclass is an Error and a DeclsortError
 * - code/severity/context/suggestion are carried through
 * - MissingPositionError aggregates identities into message and context
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  DeclsortError,
  ConfigError,
  FileAccessError,
  LanguageError,
  MissingPositionError,
  FormatError,
} from '@declsort/core';
import { isNodeIdentity, type NodeIdentity } from '@declsort/types';

function identity(value: string): NodeIdentity {
  assert.ok(isNodeIdentity(value), `${value} should be an identity`);
  return value;
}

describe('DeclsortError', () => {
  it('should keep instanceof working for every subclass', () => {
    const errors = [
      new ConfigError('bad config', 'ERR_CONFIG_INVALID'),
      new FileAccessError('no read', 'ERR_FILE_UNREADABLE'),
      new LanguageError('no parse', 'ERR_PARSE_FAILURE'),
      new FormatError('no output', 'ERR_OUTPUT_INVALID'),
      new MissingPositionError([]),
    ];
    for (const err of errors) {
      assert.ok(err instanceof Error);
      assert.ok(err instanceof DeclsortError);
    }
    assert.ok(errors[0] instanceof ConfigError);
    assert.ok(!(errors[0] instanceof FileAccessError));
  });

  it('should assign severity per class', () => {
    assert.strictEqual(new ConfigError('x', 'ERR_CONFIG_INVALID').severity, 'fatal');
    assert.strictEqual(new FileAccessError('x', 'ERR_BACKUP_FAILED').severity, 'error');
    assert.strictEqual(new LanguageError('x', 'ERR_UNSUPPORTED_LANG').severity, 'warning');
    assert.strictEqual(new FormatError('x', 'ERR_OUTPUT_INVALID').severity, 'error');
  });

  it('should serialize to JSON with context and suggestion', () => {
    const err = new FileAccessError(
      'Cannot write backup',
      'ERR_BACKUP_FAILED',
      { filePath: 'src/a.ts' },
      'Run with --no-backup to skip backups'
    );
    assert.strictEqual(err.name, 'FileAccessError');
    assert.deepStrictEqual(err.toJSON(), {
      code: 'ERR_BACKUP_FAILED',
      severity: 'error',
      message: 'Cannot write backup',
      context: { filePath: 'src/a.ts' },
      suggestion: 'Run with --no-backup to skip backups',
    });
  });
});

describe('MissingPositionError', () => {
  it('should list every missing identity by label', () => {
    const ids = [identity('function:foo@aaaaaaaaaaaa'), identity('member:A.b@bbbbbbbbbbbb')];
    const err = new MissingPositionError(ids, { filePath: 'x.ts' });

    assert.strictEqual(err.code, 'ERR_MISSING_POSITION');
    assert.strictEqual(err.severity, 'error');
    assert.strictEqual(
      err.message,
      'No position recovered for 2 node(s) with comments: function:foo, member:A.b'
    );
    assert.deepStrictEqual(err.identities, ids);
    assert.strictEqual(err.context.filePath, 'x.ts');
    assert.deepStrictEqual(err.context.identities, ids);
  });
});
