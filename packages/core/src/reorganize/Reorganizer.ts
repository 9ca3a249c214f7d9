/**
 * Reorganizer - applies the enabled ordering rules to a parsed file in
 * place. Rules only permute existing nodes; nothing is created or
 * dropped, so every identity in the input survives.
 */
import traverseModule from '@babel/traverse';
import type { File } from '@babel/types';
import type { OrganizeOptions } from '@declsort/types';
import { getTraverseFunction } from '../parser/babelInterop.js';
import { sortClassMembers } from './classMembers.js';
import { collectEagerReferences, organizeDeclarations } from './declarations.js';
import { organizeImports } from './imports.js';
import { sortJsxAttributes } from './jsxAttributes.js';
import { sortObjectProperties } from './objectProperties.js';
import { sortParameterPatterns } from './parameterPatterns.js';
import { sortEnumMembers, sortTypeMembers } from './typeMembers.js';

const traverse = getTraverseFunction(traverseModule);

export interface ReorganizeStats {
  /** Containers whose children were reordered, by rule */
  reordered: Record<keyof OrganizeOptions, number>;
}

export function reorganize(file: File, options: OrganizeOptions): ReorganizeStats {
  const reordered: ReorganizeStats['reordered'] = {
    imports: 0,
    declarations: 0,
    classMembers: 0,
    objectProperties: 0,
    jsxAttributes: 0,
    unionTypes: 0,
    enumMembers: 0,
    parameterPatterns: 0,
  };
  const program = file.program;

  if (options.imports) {
    const before = program.body;
    program.body = organizeImports(before);
    if (program.body.some((stmt, i) => stmt !== before[i])) reordered.imports++;
  }

  if (options.declarations) {
    const before = program.body;
    program.body = organizeDeclarations(before, collectEagerReferences(file));
    if (program.body.some((stmt, i) => stmt !== before[i])) reordered.declarations++;
  }

  traverse(file, {
    noScope: true,
    Class(path) {
      if (options.classMembers && sortClassMembers(path.node)) reordered.classMembers++;
    },
    ObjectExpression(path) {
      if (options.objectProperties && sortObjectProperties(path.node)) reordered.objectProperties++;
    },
    JSXOpeningElement(path) {
      if (options.jsxAttributes && sortJsxAttributes(path.node)) reordered.jsxAttributes++;
    },
    TSUnionType(path) {
      if (options.unionTypes && sortTypeMembers(path.node)) reordered.unionTypes++;
    },
    TSIntersectionType(path) {
      if (options.unionTypes && sortTypeMembers(path.node)) reordered.unionTypes++;
    },
    TSEnumDeclaration(path) {
      if (options.enumMembers && sortEnumMembers(path.node)) reordered.enumMembers++;
    },
    Function(path) {
      if (options.parameterPatterns && sortParameterPatterns(path.node)) reordered.parameterPatterns++;
    },
  });

  return { reordered };
}
