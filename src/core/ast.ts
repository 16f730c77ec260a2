/**
 * exprvm Core - Expression Tree
 *
 * Node shapes produced by the host's parser. The compiler borrows these
 * trees and never mutates them.
 */

import {
  boolValue,
  floatValue,
  intValue,
  nullValue,
  stringValue,
  type Value
} from './value.js';

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '%'
  | '..'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | '&&' | '||';

export type UnaryOperator = '-' | '!' | 'typeof';

export interface IntLiteral { readonly kind: 'IntLiteral'; readonly value: bigint }
export interface FloatLiteral { readonly kind: 'FloatLiteral'; readonly value: number }
export interface StringLiteral { readonly kind: 'StringLiteral'; readonly value: string }
export interface BooleanLiteral { readonly kind: 'BooleanLiteral'; readonly value: boolean }
export interface NullLiteral { readonly kind: 'NullLiteral' }

export interface Identifier { readonly kind: 'Identifier'; readonly name: string }

/** Legacy `object.field` form where the object is a bare variable name. */
export interface PropertyRef { readonly kind: 'PropertyRef'; readonly object: string; readonly field: string }

export interface MemberAccess { readonly kind: 'MemberAccess'; readonly object: ExprNode; readonly property: string }
export interface ComputedMember { readonly kind: 'ComputedMember'; readonly object: ExprNode; readonly key: ExprNode }
export interface IndexAccess { readonly kind: 'IndexAccess'; readonly array: ExprNode; readonly index: ExprNode }

export interface BinaryExpression {
  readonly kind: 'BinaryExpression';
  readonly operator: BinaryOperator;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

export interface UnaryExpression {
  readonly kind: 'UnaryExpression';
  readonly operator: UnaryOperator;
  readonly operand: ExprNode;
}

export interface ConditionalExpression {
  readonly kind: 'ConditionalExpression';
  readonly test: ExprNode;
  readonly consequent: ExprNode;
  readonly alternate: ExprNode;
}

export interface CallExpression { readonly kind: 'CallExpression'; readonly callee: string; readonly args: readonly ExprNode[] }

export interface MethodCall {
  readonly kind: 'MethodCall';
  readonly receiver: ExprNode;
  readonly method: string;
  readonly args: readonly ExprNode[];
}

export interface GroupExpression { readonly kind: 'GroupExpression'; readonly inner: ExprNode }

export interface ArrayLiteral { readonly kind: 'ArrayLiteral'; readonly elements: readonly ExprNode[] }

export interface ObjectProperty { readonly key: string; readonly value: ExprNode }
export interface ObjectLiteral { readonly kind: 'ObjectLiteral'; readonly properties: readonly ObjectProperty[] }

export type LiteralNode = IntLiteral | FloatLiteral | StringLiteral | BooleanLiteral | NullLiteral;

export type ExprNode =
  | LiteralNode
  | Identifier
  | PropertyRef
  | MemberAccess
  | ComputedMember
  | IndexAccess
  | BinaryExpression
  | UnaryExpression
  | ConditionalExpression
  | CallExpression
  | MethodCall
  | GroupExpression
  | ArrayLiteral
  | ObjectLiteral;

export type ExprKind = ExprNode['kind'];

// --- factories -------------------------------------------------------------

export const intLit = (value: bigint | number): IntLiteral => ({
  kind: 'IntLiteral',
  value: typeof value === 'bigint' ? value : BigInt(Math.trunc(value)),
});
export const floatLit = (value: number): FloatLiteral => ({ kind: 'FloatLiteral', value });
export const stringLit = (value: string): StringLiteral => ({ kind: 'StringLiteral', value });
export const boolLit = (value: boolean): BooleanLiteral => ({ kind: 'BooleanLiteral', value });
export const nullLit = (): NullLiteral => ({ kind: 'NullLiteral' });
export const ident = (name: string): Identifier => ({ kind: 'Identifier', name });
export const propertyRef = (object: string, field: string): PropertyRef => ({ kind: 'PropertyRef', object, field });
export const member = (object: ExprNode, property: string): MemberAccess => ({ kind: 'MemberAccess', object, property });
export const computed = (object: ExprNode, key: ExprNode): ComputedMember => ({ kind: 'ComputedMember', object, key });
export const index = (array: ExprNode, at: ExprNode): IndexAccess => ({ kind: 'IndexAccess', array, index: at });
export const binary = (operator: BinaryOperator, left: ExprNode, right: ExprNode): BinaryExpression => ({
  kind: 'BinaryExpression',
  operator,
  left,
  right,
});
export const unary = (operator: UnaryOperator, operand: ExprNode): UnaryExpression => ({
  kind: 'UnaryExpression',
  operator,
  operand,
});
export const ternary = (test: ExprNode, consequent: ExprNode, alternate: ExprNode): ConditionalExpression => ({
  kind: 'ConditionalExpression',
  test,
  consequent,
  alternate,
});
export const call = (callee: string, args: readonly ExprNode[] = []): CallExpression => ({ kind: 'CallExpression', callee, args });
export const methodCall = (receiver: ExprNode, method: string, args: readonly ExprNode[] = []): MethodCall => ({
  kind: 'MethodCall',
  receiver,
  method,
  args,
});
export const group = (inner: ExprNode): GroupExpression => ({ kind: 'GroupExpression', inner });
export const arrayLit = (elements: readonly ExprNode[]): ArrayLiteral => ({ kind: 'ArrayLiteral', elements });
export const objectLit = (properties: Record<string, ExprNode>): ObjectLiteral => ({
  kind: 'ObjectLiteral',
  properties: Object.entries(properties).map(([key, value]) => ({ key, value })),
});

// --- literal helpers -------------------------------------------------------

export function isLiteral(node: ExprNode): node is LiteralNode {
  switch (node.kind) {
    case 'IntLiteral':
    case 'FloatLiteral':
    case 'StringLiteral':
    case 'BooleanLiteral':
    case 'NullLiteral':
      return true;
    default:
      return false;
  }
}

export function literalValue(node: LiteralNode): Value {
  switch (node.kind) {
    case 'IntLiteral':
      return intValue(node.value);
    case 'FloatLiteral':
      return floatValue(node.value);
    case 'StringLiteral':
      return stringValue(node.value);
    case 'BooleanLiteral':
      return boolValue(node.value);
    case 'NullLiteral':
      return nullValue();
  }
}

/** Literal node for a scalar Value; containers have no literal form. */
export function literalFromValue(v: Value): LiteralNode | undefined {
  switch (v.type) {
    case 'null':
      return nullLit();
    case 'int':
      return intLit(v.value);
    case 'float':
      return floatLit(v.value);
    case 'bool':
      return boolLit(v.value);
    case 'string':
      return stringLit(v.value ?? '');
    default:
      return undefined;
  }
}

/**
 * Source echo: render a tree back to infix text for diagnostics.
 * Binary and conditional nodes are fully parenthesized.
 */
export function formatExpr(node: ExprNode): string {
  switch (node.kind) {
    case 'IntLiteral':
      return node.value.toString();
    case 'FloatLiteral':
      return String(node.value);
    case 'StringLiteral':
      return JSON.stringify(node.value);
    case 'BooleanLiteral':
      return node.value ? 'true' : 'false';
    case 'NullLiteral':
      return 'null';
    case 'Identifier':
      return node.name;
    case 'PropertyRef':
      return `${node.object}.${node.field}`;
    case 'MemberAccess':
      return `${formatExpr(node.object)}.${node.property}`;
    case 'ComputedMember':
      return `${formatExpr(node.object)}[${formatExpr(node.key)}]`;
    case 'IndexAccess':
      return `${formatExpr(node.array)}[${formatExpr(node.index)}]`;
    case 'BinaryExpression':
      return `(${formatExpr(node.left)} ${node.operator} ${formatExpr(node.right)})`;
    case 'UnaryExpression':
      return node.operator === 'typeof'
        ? `typeof ${formatExpr(node.operand)}`
        : `${node.operator}${formatExpr(node.operand)}`;
    case 'ConditionalExpression':
      return `(${formatExpr(node.test)} ? ${formatExpr(node.consequent)} : ${formatExpr(node.alternate)})`;
    case 'CallExpression':
      return `${node.callee}(${node.args.map(formatExpr).join(', ')})`;
    case 'MethodCall':
      return `${formatExpr(node.receiver)}.${node.method}(${node.args.map(formatExpr).join(', ')})`;
    case 'GroupExpression':
      return `(${formatExpr(node.inner)})`;
    case 'ArrayLiteral':
      return `[${node.elements.map(formatExpr).join(', ')}]`;
    case 'ObjectLiteral':
      return `{${node.properties.map((p) => `${p.key}: ${formatExpr(p.value)}`).join(', ')}}`;
    default:
      return '<unknown>';
  }
}
