/**
 * Coarse signature fingerprints: names, parameter shapes, type tags.
 *
 * These deliberately ignore anything the reorganizer may permute or the
 * printer may re-render (positions, parentheses, formatting).
 */
import type {
  Node,
  Expression,
  PrivateName,
  TSType,
  TSTypeAnnotation,
  TypeAnnotation,
  Noop,
  TSEntityName,
  JSXOpeningElement,
  JSXAttribute,
} from '@babel/types';

type AnyTypeAnnotation = TSTypeAnnotation | TypeAnnotation | Noop | null | undefined;

/**
 * Name of a property/member key.
 *
 * - `foo` / `'foo'` -> "foo"
 * - `1` -> "1"
 * - `#foo` -> "#foo"
 * - `[Symbol.iterator]` -> "[Symbol.iterator]"
 */
export function keyName(key: Expression | PrivateName, computed: boolean | undefined): string {
  if (key.type === 'PrivateName') return `#${key.id.name}`;
  if (!computed) {
    if (key.type === 'Identifier') return key.name;
    if (key.type === 'StringLiteral') return key.value;
    if (key.type === 'NumericLiteral') return String(key.value);
    if (key.type === 'BigIntLiteral') return key.value;
  }
  if (key.type === 'StringLiteral') return key.value;
  if (key.type === 'NumericLiteral') return String(key.value);
  return `[${expressionLabel(key)}]`;
}

/**
 * Short readable label for an expression, used in names and paths.
 */
export function expressionLabel(node: Node): string {
  switch (node.type) {
    case 'Identifier':
      return node.name;
    case 'ThisExpression':
      return 'this';
    case 'Super':
      return 'super';
    case 'StringLiteral':
      return JSON.stringify(node.value);
    case 'NumericLiteral':
      return String(node.value);
    case 'MemberExpression':
    case 'OptionalMemberExpression':
      return node.computed
        ? `${expressionLabel(node.object)}[${expressionLabel(node.property)}]`
        : `${expressionLabel(node.object)}.${expressionLabel(node.property)}`;
    case 'PrivateName':
      return `#${node.id.name}`;
    case 'CallExpression':
    case 'OptionalCallExpression':
    case 'NewExpression':
      return `${expressionLabel(node.callee)}()`;
    case 'AssignmentExpression':
      return `${expressionLabel(node.left)}${node.operator}`;
    case 'AwaitExpression':
      return node.argument ? `await ${expressionLabel(node.argument)}` : 'await';
    case 'TSAsExpression':
    case 'TSSatisfiesExpression':
    case 'TSNonNullExpression':
      return expressionLabel(node.expression);
    default:
      return node.type;
  }
}

export function entityName(name: TSEntityName): string {
  if (name.type === 'Identifier') return name.name;
  return `${entityName(name.left)}.${name.right.name}`;
}

/**
 * Tag for a TypeScript type: keywords by name, references by their entity
 * name, arrays of either, anything else "complex".
 */
export function tsTypeTag(type: TSType): string {
  switch (type.type) {
    case 'TSTypeReference':
      return entityName(type.typeName);
    case 'TSArrayType':
      return `${tsTypeTag(type.elementType)}[]`;
    case 'TSLiteralType':
      return 'literal';
    default:
      if (type.type.endsWith('Keyword')) {
        return type.type.slice(2, -'Keyword'.length).toLowerCase();
      }
      return 'complex';
  }
}

export function typeAnnotationTag(annotation: AnyTypeAnnotation): string {
  if (!annotation || annotation.type === 'Noop') return 'none';
  if (annotation.type === 'TSTypeAnnotation') return tsTypeTag(annotation.typeAnnotation);
  return 'flow';
}

/**
 * Names bound by a pattern, in source order.
 *
 * `{ a, b: c }` -> "{a,c}", `[x, , y]` -> "[x,y]", `...rest` -> "...rest"
 */
export function patternName(pattern: Node): string {
  switch (pattern.type) {
    case 'Identifier':
      return pattern.name;
    case 'ObjectPattern':
      return `{${pattern.properties
        .map((p) => (p.type === 'RestElement' ? patternName(p) : patternName(p.value)))
        .join(',')}}`;
    case 'ArrayPattern':
      return `[${pattern.elements.flatMap((el) => (el ? [patternName(el)] : [])).join(',')}]`;
    case 'RestElement':
      return `...${patternName(pattern.argument)}`;
    case 'AssignmentPattern':
      return patternName(pattern.left);
    case 'TSParameterProperty':
      return patternName(pattern.parameter);
    default:
      return pattern.type;
  }
}

/**
 * Fingerprint of one parameter: name and type for plain identifiers,
 * the pattern kind otherwise.
 */
export function paramFingerprint(param: Node): string {
  switch (param.type) {
    case 'Identifier':
      return `id:${param.name}${param.optional ? '?' : ''}:${typeAnnotationTag(param.typeAnnotation)}`;
    case 'ObjectPattern':
      return 'object_pattern';
    case 'ArrayPattern':
      return 'array_pattern';
    case 'RestElement':
      return `rest:${param.argument.type === 'Identifier' ? param.argument.name : param.argument.type}`;
    case 'AssignmentPattern':
      return `default:${paramFingerprint(param.left)}`;
    case 'TSParameterProperty':
      return `param_prop:${param.accessibility ?? ''}:${param.readonly ? 'readonly:' : ''}${paramFingerprint(param.parameter)}`;
    default:
      return param.type;
  }
}

export interface SignatureLike {
  params: readonly Node[];
  returnType?: AnyTypeAnnotation;
  async?: boolean;
  generator?: boolean;
}

export function signatureParts(fn: SignatureLike): string[] {
  return [
    fn.async ? 'async' : 'sync',
    fn.generator ? 'generator' : 'plain',
    String(fn.params.length),
    ...fn.params.map(paramFingerprint),
    `returns:${typeAnnotationTag(fn.returnType)}`,
  ];
}

export function jsxElementName(element: JSXOpeningElement): string {
  const name = element.name;
  switch (name.type) {
    case 'JSXIdentifier':
      return name.name;
    case 'JSXNamespacedName':
      return `${name.namespace.name}:${name.name.name}`;
    case 'JSXMemberExpression': {
      const parts: string[] = [name.property.name];
      let object = name.object;
      while (object.type === 'JSXMemberExpression') {
        parts.unshift(object.property.name);
        object = object.object;
      }
      parts.unshift(object.name);
      return parts.join('.');
    }
  }
}

export function jsxAttributeName(attribute: JSXAttribute): string {
  return attribute.name.type === 'JSXIdentifier'
    ? attribute.name.name
    : `${attribute.name.namespace.name}:${attribute.name.name.name}`;
}
