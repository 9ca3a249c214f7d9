/**
 * ESM/CJS interop for Babel's default-exported functions
 *
 * @babel/traverse and @babel/generator are CommonJS modules whose function
 * lives on `exports.default`. Under native ESM the default import is the
 * whole `exports` object; under transpiled CJS it is the function itself.
 * These helpers normalize both cases.
 *
 * Usage:
 *   import traverseModule from '@babel/traverse';
 *   const traverse = getTraverseFunction(traverseModule);
 */

import type { TraverseOptions, Scope, NodePath } from '@babel/traverse';
import type { GeneratorOptions, GeneratorResult } from '@babel/generator';
import type { Node } from '@babel/types';

export type TraverseFunction = <S = undefined>(
  parent: Node,
  opts?: TraverseOptions<S>,
  scope?: Scope,
  state?: S,
  parentPath?: NodePath
) => void;

export type GenerateFunction = (ast: Node, opts?: GeneratorOptions, code?: string) => GeneratorResult;

function hasDefaultExport(mod: unknown): mod is { default: unknown } {
  return typeof mod === 'object' && mod !== null && 'default' in mod;
}

function isTraverseFunction(value: unknown): value is TraverseFunction {
  return typeof value === 'function';
}

function isGenerateFunction(value: unknown): value is GenerateFunction {
  return typeof value === 'function';
}

/**
 * @throws Error if the traverse function cannot be resolved
 */
export function getTraverseFunction(traverseModule: unknown): TraverseFunction {
  if (hasDefaultExport(traverseModule) && isTraverseFunction(traverseModule.default)) {
    return traverseModule.default;
  }
  if (isTraverseFunction(traverseModule)) {
    return traverseModule;
  }
  throw new Error(
    'Unable to resolve @babel/traverse function. ' +
    'This may indicate an incompatible version or broken installation.'
  );
}

/**
 * @throws Error if the generate function cannot be resolved
 */
export function getGenerateFunction(generatorModule: unknown): GenerateFunction {
  if (hasDefaultExport(generatorModule) && isGenerateFunction(generatorModule.default)) {
    return generatorModule.default;
  }
  if (isGenerateFunction(generatorModule)) {
    return generatorModule;
  }
  throw new Error(
    'Unable to resolve @babel/generator function. ' +
    'This may indicate an incompatible version or broken installation.'
  );
}

export type { TraverseOptions, Scope, NodePath };
