/**
 * Conservative side-effect analysis for initializers.
 *
 * "Pure" here means evaluating the expression cannot run user code other
 * than property reads: literals, bindings, function values, and operators
 * over those. Calls, construction, assignment, tagged templates and JSX
 * are all impure.
 */
import type { Node } from '@babel/types';

export interface PurityOptions {
  /** Whether `this` may be read (false for class field initializers) */
  allowThis?: boolean;
}

export function isSideEffectFree(node: Node | null | undefined, options: PurityOptions = {}): boolean {
  if (!node) return true;
  const pure = (child: Node | null | undefined): boolean => isSideEffectFree(child, options);

  switch (node.type) {
    case 'StringLiteral':
    case 'NumericLiteral':
    case 'BooleanLiteral':
    case 'NullLiteral':
    case 'BigIntLiteral':
    case 'RegExpLiteral':
    case 'Identifier':
    case 'PrivateName':
    case 'FunctionExpression':
    case 'ArrowFunctionExpression':
      return true;

    case 'ThisExpression':
      return options.allowThis === true;

    case 'TemplateLiteral':
      return node.expressions.every(pure);

    case 'ArrayExpression':
      return node.elements.every((el) => el === null || (el.type !== 'SpreadElement' && pure(el)));

    case 'ObjectExpression':
      return node.properties.every((prop) => {
        if (prop.type === 'SpreadElement') return false;
        if (prop.computed && !pure(prop.key)) return false;
        return prop.type === 'ObjectMethod' || pure(prop.value);
      });

    case 'UnaryExpression':
      return node.operator !== 'delete' && pure(node.argument);

    case 'BinaryExpression':
    case 'LogicalExpression':
      return pure(node.left) && pure(node.right);

    case 'ConditionalExpression':
      return pure(node.test) && pure(node.consequent) && pure(node.alternate);

    case 'SequenceExpression':
      return node.expressions.every(pure);

    case 'MemberExpression':
    case 'OptionalMemberExpression':
      return pure(node.object) && (!node.computed || pure(node.property));

    case 'ParenthesizedExpression':
    case 'TSAsExpression':
    case 'TSSatisfiesExpression':
    case 'TSNonNullExpression':
    case 'TSTypeAssertion':
    case 'TSInstantiationExpression':
      return pure(node.expression);

    default:
      return false;
  }
}
