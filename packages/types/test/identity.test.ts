/**
 * Node identity helpers.
 *
 * Identities are produced by the core package; these tests pin the
 * string shape that logs and error payloads rely on.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isNodeIdentity, identityLabel } from '@declsort/types';

describe('isNodeIdentity', () => {
  it('accepts kind:name@hash strings', () => {
    assert.strictEqual(isNodeIdentity('function:foo@0123456789ab'), true);
    assert.strictEqual(isNodeIdentity('member:A.b@abcdefabcdef'), true);
  });

  it('rejects strings without a 12-character hex hash', () => {
    assert.strictEqual(isNodeIdentity('function:foo'), false);
    assert.strictEqual(isNodeIdentity('function:foo@123'), false);
    assert.strictEqual(isNodeIdentity('function:foo@0123456789AB'), false);
  });
});

describe('identityLabel', () => {
  it('strips the hash suffix', () => {
    const id = 'class:Server@aaaaaaaaaaaa';
    assert.ok(isNodeIdentity(id));
    assert.strictEqual(identityLabel(id), 'class:Server');
  });

  it('keeps @ characters that belong to the name', () => {
    const id = 'import:@scope/pkg@bbbbbbbbbbbb';
    assert.ok(isNodeIdentity(id));
    assert.strictEqual(identityLabel(id), 'import:@scope/pkg');
  });
});
