/**
 * exprvm Core - Virtual Machine
 *
 * Stack machine that runs a CompiledExpr to completion and yields one
 * Value. Variables resolve against local bindings first, then the state
 * accessor. Nothing here throws into the caller: stack faults and unknown
 * opcodes set a sticky error flag and the run yields null; type mismatches
 * simply yield null.
 */

import type { BuiltinRegistry } from './builtins.js';
import type { CompiledExpr } from './compiler.js';
import { reportError, type ErrorHandler } from './log.js';
import { INSTRUCTION_WORDS, Opcode } from './opcodes.js';
import { BINARY_OPS, UNARY_OPS, callMethod, getComputed, getProperty, type BinaryOp, type UnaryOp } from './ops.js';
import type { StateAccessor } from './state.js';
import {
  ObjectValue,
  arrayValue,
  boolValue,
  copyValue,
  floatValue,
  intValue,
  isTruthy,
  nullValue,
  objectValue,
  releaseValue,
  stringValue,
  type Value
} from './value.js';

export const DEFAULT_MAX_STACK_SIZE = 1024;

export interface EvalOptions {
  /** Local bindings; ownership of each Value moves into the context. */
  locals?: Record<string, Value> | Map<string, Value>;
  state?: StateAccessor;
  builtins?: BuiltinRegistry;
  maxStackSize?: number;
  /** Receives exceptions thrown by builtins. */
  onError?: ErrorHandler | null;
}

interface Binding {
  readonly name: string;
  value: Value;
}

const BINARY_BY_OPCODE: ReadonlyMap<number, BinaryOp> = new Map<number, BinaryOp>([
  [Opcode.ADD, BINARY_OPS['+']],
  [Opcode.SUB, BINARY_OPS['-']],
  [Opcode.MUL, BINARY_OPS['*']],
  [Opcode.DIV, BINARY_OPS['/']],
  [Opcode.MOD, BINARY_OPS['%']],
  [Opcode.CONCAT, BINARY_OPS['..']],
  [Opcode.EQ, BINARY_OPS['==']],
  [Opcode.NEQ, BINARY_OPS['!=']],
  [Opcode.LT, BINARY_OPS['<']],
  [Opcode.LTE, BINARY_OPS['<=']],
  [Opcode.GT, BINARY_OPS['>']],
  [Opcode.GTE, BINARY_OPS['>=']],
  [Opcode.AND, BINARY_OPS['&&']],
  [Opcode.OR, BINARY_OPS['||']],
]);

const UNARY_BY_OPCODE: ReadonlyMap<number, UnaryOp> = new Map<number, UnaryOp>([
  [Opcode.NEGATE, UNARY_OPS['-']],
  [Opcode.NOT, UNARY_OPS['!']],
  [Opcode.TYPEOF, UNARY_OPS.typeof],
]);

function toBindings(locals: EvalOptions['locals']): Binding[] {
  if (!locals) return [];
  const pairs = locals instanceof Map ? [...locals] : Object.entries(locals);
  return pairs.map(([name, value]) => ({ name, value }));
}

/**
 * Single-use evaluation context. Owns the operand stack and the local
 * bindings; a second `run` yields null and sets the error flag.
 *
 * @example
 * const ctx = new EvalContext({ locals: { n: intValue(2) } });
 * ctx.run(compileExpression(binary('*', ident('n'), intLit(21))));   // int 42
 */
export class EvalContext {
  readonly state: StateAccessor | undefined;
  readonly builtins: BuiltinRegistry | undefined;
  readonly maxStackSize: number;
  hasError = false;
  error: string | undefined;

  private stack: Value[] = [];
  private locals: Binding[];
  private onError: ErrorHandler | null;
  private used = false;

  constructor(options: EvalOptions = {}) {
    this.state = options.state;
    this.builtins = options.builtins;
    this.maxStackSize = options.maxStackSize ?? DEFAULT_MAX_STACK_SIZE;
    this.onError = options.onError ?? null;
    this.locals = toBindings(options.locals);
  }

  /** Bind a local, taking ownership of `value`. */
  bind(name: string, value: Value): this {
    const existing = this.locals.find((b) => b.name === name);
    if (existing) {
      releaseValue(existing.value);
      existing.value = value;
    } else {
      this.locals.push({ name, value });
    }
    return this;
  }

  /** Copy of the variable's Value: local binding, then state, then null. */
  resolve(name: string): Value {
    for (const b of this.locals) {
      if (b.name === name) return copyValue(b.value);
    }
    const v = this.state?.lookup(name);
    return v === undefined ? nullValue() : copyValue(v);
  }

  get depth(): number {
    return this.stack.length;
  }

  private fail(message: string): void {
    this.hasError = true;
    if (this.error === undefined) this.error = message;
  }

  private push(v: Value): void {
    if (this.stack.length >= this.maxStackSize) {
      this.fail(`stack overflow (limit ${this.maxStackSize})`);
      releaseValue(v);
      return;
    }
    this.stack.push(v);
  }

  private pop(): Value {
    const v = this.stack.pop();
    if (v === undefined) {
      this.fail('stack underflow');
      return nullValue();
    }
    return v;
  }

  /** Pops `count` values; the first popped lands at index 0. */
  private popArgs(count: number): Value[] {
    const args: Value[] = [];
    for (let i = 0; i < count; i++) args.push(this.pop());
    return args;
  }

  private callBuiltin(unit: CompiledExpr, index: number, argc: number): Value {
    const args = this.popArgs(argc);
    const name = unit.strings[index];
    let result: Value | undefined;
    if (name !== undefined && this.builtins) {
      try {
        result = this.builtins.call(name, args, this);
      } catch (err) {
        reportError(this.onError, err, { phase: 'builtin', subject: name, message: `builtin "${name}" threw` });
        result = undefined;
      }
    }
    for (const arg of args) {
      if (arg !== result) releaseValue(arg);
    }
    return result ?? nullValue();
  }

  private buildObject(pairs: number): Value {
    const collected: [Value, Value][] = [];
    for (let i = 0; i < pairs; i++) {
      const value = this.pop();
      const key = this.pop();
      collected.push([key, value]);
    }
    const obj = new ObjectValue();
    for (let i = collected.length - 1; i >= 0; i--) {
      const [key, value] = collected[i];
      if (key.type === 'string' && key.value !== null) obj.set(key.value, value);
      else releaseValue(value);
    }
    return objectValue(obj);
  }

  /**
   * Run `unit` to completion. Terminates on HALT, when the program counter
   * leaves the unit, or on a non-forward jump. Returns the top of the stack
   * (null when empty, or when the run faulted); anything left below it is
   * released.
   */
  run(unit: CompiledExpr): Value {
    if (this.used) {
      this.fail('evaluation context already used');
      return nullValue();
    }
    this.used = true;

    const { code, count, strings, ints } = unit;
    let pc = 0;

    execute: while (pc >= 0 && pc < count) {
      const w0 = code[pc * INSTRUCTION_WORDS];
      const op = w0 & 0xff;
      const flag = (w0 >>> 8) & 0xff;
      const index = (w0 >>> 16) & 0xffff;
      const imm = code[pc * INSTRUCTION_WORDS + 1];
      let next = pc + 1;

      switch (op) {
        case Opcode.NOP:
          break;
        case Opcode.HALT:
          break execute;

        case Opcode.PUSH_INT:
          if (flag === 0) {
            this.push(intValue(imm));
          } else {
            const n = ints[index];
            this.push(n === undefined ? nullValue() : intValue(n));
          }
          break;
        case Opcode.PUSH_FLOAT: {
          const text = strings[index];
          this.push(text === undefined ? nullValue() : floatValue(Number(text)));
          break;
        }
        case Opcode.PUSH_STRING: {
          const text = strings[index];
          this.push(text === undefined ? nullValue() : stringValue(text));
          break;
        }
        case Opcode.PUSH_BOOL:
          this.push(boolValue(flag !== 0));
          break;
        case Opcode.PUSH_NULL:
          this.push(nullValue());
          break;

        case Opcode.DUP: {
          const top = this.stack[this.stack.length - 1];
          if (top === undefined) {
            this.fail('stack underflow');
            this.push(nullValue());
          } else {
            this.push(copyValue(top));
          }
          break;
        }
        case Opcode.POP:
          releaseValue(this.pop());
          break;
        case Opcode.SWAP: {
          const n = this.stack.length;
          if (n < 2) {
            this.fail('stack underflow');
          } else {
            const top = this.stack[n - 1];
            this.stack[n - 1] = this.stack[n - 2];
            this.stack[n - 2] = top;
          }
          break;
        }

        case Opcode.LOAD_VAR: {
          const name = strings[index];
          this.push(name === undefined ? nullValue() : this.resolve(name));
          break;
        }
        case Opcode.GET_PROP: {
          const target = this.pop();
          const name = strings[index];
          this.push(name === undefined ? nullValue() : getProperty(target, name));
          releaseValue(target);
          break;
        }
        case Opcode.GET_PROP_COMPUTED:
        case Opcode.GET_INDEX: {
          const key = this.pop();
          const target = this.pop();
          this.push(getComputed(target, key));
          releaseValue(key);
          releaseValue(target);
          break;
        }

        case Opcode.JUMP:
        case Opcode.JUMP_IF_FALSE:
        case Opcode.JUMP_IF_TRUE: {
          // Expressions have no loops; every jump goes forward.
          if (imm <= 0) {
            this.fail(`non-forward jump at ${pc}`);
            break execute;
          }
          if (op === Opcode.JUMP) {
            next = pc + imm;
            break;
          }
          const cond = this.pop();
          if (isTruthy(cond) === (op === Opcode.JUMP_IF_TRUE)) next = pc + imm;
          releaseValue(cond);
          break;
        }

        case Opcode.CALL_METHOD: {
          const args = this.popArgs(Math.max(0, imm));
          const receiver = this.pop();
          const name = strings[index];
          if (name === undefined) {
            releaseValue(receiver);
            for (const arg of args) releaseValue(arg);
            this.push(nullValue());
          } else {
            this.push(callMethod(receiver, name, args));
          }
          break;
        }
        case Opcode.CALL_BUILTIN:
          this.push(this.callBuiltin(unit, index, Math.max(0, imm)));
          break;
        case Opcode.CALL_FUNCTION:
          for (const arg of this.popArgs(Math.max(0, imm))) releaseValue(arg);
          this.push(nullValue());
          break;

        case Opcode.BUILD_ARRAY: {
          const items = this.popArgs(Math.max(0, imm)).reverse();
          this.push(arrayValue(items));
          break;
        }
        case Opcode.BUILD_OBJECT:
          this.push(this.buildObject(Math.max(0, imm)));
          break;

        default: {
          const binaryOp = BINARY_BY_OPCODE.get(op);
          if (binaryOp) {
            const right = this.pop();
            const left = this.pop();
            this.push(binaryOp(left, right));
            releaseValue(left);
            releaseValue(right);
            break;
          }
          const unaryOp = UNARY_BY_OPCODE.get(op);
          if (unaryOp) {
            const operand = this.pop();
            this.push(unaryOp(operand));
            releaseValue(operand);
            break;
          }
          this.fail(`unknown opcode ${op} at ${pc}`);
          this.push(nullValue());
        }
      }

      pc = next;
    }

    let result = this.stack.pop() ?? nullValue();
    if (this.hasError) {
      releaseValue(result);
      result = nullValue();
    }
    for (const leftover of this.stack.splice(0)) releaseValue(leftover);
    for (const b of this.locals) releaseValue(b.value);
    this.locals = [];
    return result;
  }
}

/** Run `unit` in a fresh context. */
export function evaluate(unit: CompiledExpr, options: EvalOptions = {}): Value {
  return new EvalContext(options).run(unit);
}

/** Like `evaluate`, but also reports the context's error state. */
export function evaluateWithStatus(
  unit: CompiledExpr,
  options: EvalOptions = {}
): { value: Value; hasError: boolean; error: string | undefined } {
  const ctx = new EvalContext(options);
  const value = ctx.run(unit);
  return { value, hasError: ctx.hasError, error: ctx.error };
}
