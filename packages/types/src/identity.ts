/**
 * Node identity - content-derived key that survives reordering.
 *
 * Identities are computed from what a node declares (kind, name, modifiers,
 * signature shape), never from where it sits in the file. Comments are
 * attached to identities before the tree is reordered and resolved back to
 * coordinates only after the reordered tree has been printed.
 *
 * @example
 * "function:parseConfig@3f9a1c0b27de"
 * "member:Server.listen@91ab00c4e2f7"
 */

/**
 * Phantom brand. Declared but never present at runtime.
 */
declare const IDENTITY_BRAND: unique symbol;

/**
 * Opaque identity string. Only the identity assigner creates these.
 */
export type NodeIdentity = string & {
  readonly [IDENTITY_BRAND]: true;
};

const IDENTITY_PATTERN = /^[a-z][a-z_-]*:.*@[0-9a-f]{12}$/;

/**
 * Runtime shape check for values read back from logs or error payloads.
 */
export function isNodeIdentity(value: string): value is NodeIdentity {
  return IDENTITY_PATTERN.test(value);
}

/**
 * Human-readable part of an identity (everything before the hash).
 *
 * "function:parseConfig@3f9a1c0b27de" -> "function:parseConfig"
 */
export function identityLabel(identity: NodeIdentity): string {
  const at = identity.lastIndexOf('@');
  return at === -1 ? identity : identity.slice(0, at);
}
