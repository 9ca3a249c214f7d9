/**
 * JSX attribute ordering: `key`, `ref`, ordinary props alphabetically,
 * then `on*` event handlers alphabetically. Spread attributes split runs.
 */
import type { JSXAttribute, JSXOpeningElement } from '@babel/types';
import { jsxAttributeName } from '../identity/fingerprints.js';
import { compareNames, sortStable } from './compare.js';
import { isSideEffectFree } from './purity.js';

type Attribute = JSXOpeningElement['attributes'][number];

const HANDLER = /^on[A-Z]/;

export function attributeRank(name: string): number {
  if (name === 'key') return 0;
  if (name === 'ref') return 1;
  return HANDLER.test(name) ? 3 : 2;
}

function hasPureValue(attr: JSXAttribute): boolean {
  const value = attr.value;
  if (!value || value.type === 'StringLiteral') return true;
  if (value.type === 'JSXExpressionContainer') {
    return value.expression.type === 'JSXEmptyExpression' || isSideEffectFree(value.expression);
  }
  return false;
}

function compareAttributes(a: JSXAttribute, b: JSXAttribute): number {
  const nameA = jsxAttributeName(a);
  const nameB = jsxAttributeName(b);
  return attributeRank(nameA) - attributeRank(nameB) || compareNames(nameA, nameB);
}

/**
 * @returns whether the attributes were reordered
 */
export function sortJsxAttributes(element: JSXOpeningElement): boolean {
  const before = element.attributes;
  if (!before.every((attr) => attr.type === 'JSXSpreadAttribute' || hasPureValue(attr))) return false;

  const after: Attribute[] = [];
  let run: JSXAttribute[] = [];
  const flush = (): void => {
    after.push(...sortStable(run, compareAttributes));
    run = [];
  };
  for (const attr of before) {
    if (attr.type === 'JSXSpreadAttribute') {
      flush();
      after.push(attr);
    } else {
      run.push(attr);
    }
  }
  flush();

  element.attributes = after;
  return after.some((attr, i) => attr !== before[i]);
}
