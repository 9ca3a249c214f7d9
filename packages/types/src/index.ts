/**
 * @declsort/types - shared type definitions
 */

export * from './identity.js';
export * from './comments.js';
export * from './formatting.js';
