/**
 * exprvm - Reactive Expression Compiler and VM
 *
 * Compiles parsed binding expressions to compact bytecode, folds constants,
 * strips dead code and evaluates the result against application state.
 *
 * @example
 * import { ExprEngine, member, ident } from 'exprvm';
 * const engine = new ExprEngine({ user: { name: 'Ann' } });
 * engine.evaluateJS(member(ident('user'), 'name'));   // 'Ann'
 *
 * @module exprvm
 */

// Engine
export { ExprEngine } from './core/engine.js';
export type { EngineConfig, EngineOptions } from './core/engine.js';

// Expression tree
export {
  intLit,
  floatLit,
  stringLit,
  boolLit,
  nullLit,
  ident,
  propertyRef,
  member,
  computed,
  index,
  binary,
  unary,
  ternary,
  call,
  methodCall,
  group,
  arrayLit,
  objectLit,
  isLiteral,
  literalValue,
  literalFromValue,
  formatExpr
} from './core/ast.js';
export type {
  ExprNode,
  ExprKind,
  LiteralNode,
  BinaryOperator,
  UnaryOperator,
  ObjectProperty
} from './core/ast.js';

// Values
export {
  ArrayValue,
  ObjectValue,
  nullValue,
  intValue,
  floatValue,
  boolValue,
  stringValue,
  arrayValue,
  objectValue,
  copyValue,
  releaseValue,
  valuesEqual,
  isTruthy,
  typeName,
  valueToString,
  formatG,
  fromJS,
  toJS
} from './core/value.js';
export type { Value, ValueType } from './core/value.js';

// Pipeline
export { compileExpression, DEFAULT_BUILTIN_PREFIXES } from './core/compiler.js';
export type { CompiledExpr, CompileOptions } from './core/compiler.js';
export { foldConstants, eliminateDeadCode } from './core/optimizer.js';
export { EvalContext, evaluate, evaluateWithStatus, DEFAULT_MAX_STACK_SIZE } from './core/vm.js';
export type { EvalOptions } from './core/vm.js';
export { Opcode, opcodeName, assemble, decode } from './core/opcodes.js';
export type { Instruction, OpcodeName } from './core/opcodes.js';
export { disassemble } from './core/disasm.js';

// Collaborators
export { BuiltinTable } from './core/builtins.js';
export type { BuiltinFn, BuiltinRegistry, BuiltinOptions } from './core/builtins.js';
export { StateStore } from './core/state.js';
export type { StateAccessor, StateListener } from './core/state.js';
export { CompiledExprCache, exprKey, collectVariables } from './core/expr-cache.js';
export type { CacheStats } from './core/expr-cache.js';
export { coerce, toText, toVisibility, toNumber, toStyle } from './core/bindings.js';
export type { BindingKind, BindingTypes } from './core/bindings.js';
export type { ErrorHandler, ErrorContext } from './core/log.js';
