/**
 * exprvm Core - Bytecode Compiler
 *
 * Translates an expression tree into a compiled unit:
 * - Fixed-width instructions (see opcodes.ts)
 * - Deduplicated string and integer pools
 * - Stack depth tracking so the VM knows the deepest point up front
 * - Ternaries lowered to forward jumps, back-patched once the arm is known
 *
 * Failure is sticky. The first overflow records a message and every later
 * emission becomes a no-op, so the unit is always well-formed: jumps
 * already written still land inside the unit and it still ends in HALT.
 * Callers check `hasError`.
 */

import { formatExpr, type BinaryOperator, type ExprNode, type UnaryOperator } from './ast.js';
import { INSTRUCTION_WORDS, MAX_FLAG, MAX_POOL_INDEX, Opcode, encodeWord0 } from './opcodes.js';
import { eliminateDeadCode, foldConstants } from './optimizer.js';
import { IntPool, POOL_LIMIT, StringPool } from './pools.js';

export const DEFAULT_BUILTIN_PREFIXES: readonly string[] = Object.freeze(['string_', 'array_', 'math_', 'type_']);

/** Upper bound on instructions per unit unless overridden. */
export const DEFAULT_MAX_INSTRUCTIONS = 65536;

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;

export interface CompiledExpr {
  /** Packed instruction words, `count * 2` long. Frozen in compiled units. */
  readonly code: ArrayLike<number>;
  readonly count: number;
  readonly strings: readonly string[];
  readonly ints: readonly bigint[];
  readonly maxStackDepth: number;
  /** Source text kept for diagnostics. */
  readonly source: string | undefined;
  readonly hasError: boolean;
  readonly error: string | undefined;
  /** Instructions replaced by NOP during dead-code elimination. */
  readonly eliminated: number;
}

export interface CompileOptions {
  /** Fold constant subtrees before emitting. */
  optimize?: boolean;
  /** NOP out unreachable instructions after emitting. */
  eliminateDeadCode?: boolean;
  /** Callee prefixes routed to CALL_BUILTIN; anything else is CALL_FUNCTION. */
  builtinPrefixes?: readonly string[];
  maxInstructions?: number;
  /** Entries per pool; never more than a 16-bit index can address. */
  maxPoolEntries?: number;
  /** Source text to keep, or `true` to echo the tree back as text. */
  source?: string | true;
}

const BINARY_OPCODES: Readonly<Record<BinaryOperator, number>> = {
  '+': Opcode.ADD,
  '-': Opcode.SUB,
  '*': Opcode.MUL,
  '/': Opcode.DIV,
  '%': Opcode.MOD,
  '..': Opcode.CONCAT,
  '==': Opcode.EQ,
  '!=': Opcode.NEQ,
  '<': Opcode.LT,
  '<=': Opcode.LTE,
  '>': Opcode.GT,
  '>=': Opcode.GTE,
  '&&': Opcode.AND,
  '||': Opcode.OR,
};

const UNARY_OPCODES: Readonly<Record<UnaryOperator, number>> = {
  '-': Opcode.NEGATE,
  '!': Opcode.NOT,
  typeof: Opcode.TYPEOF,
};

/** Canonical pool text for a float; keeps the sign of -0. */
export function floatToPoolText(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

class Emitter {
  words = new Int32Array(32);
  count = 0;
  depth = 0;
  maxDepth = 0;
  error: string | undefined;
  readonly strings: StringPool;
  readonly ints: IntPool;

  constructor(
    private readonly maxInstructions: number,
    private readonly builtinPrefixes: readonly string[],
    poolLimit: number
  ) {
    this.strings = new StringPool(poolLimit);
    this.ints = new IntPool(poolLimit);
  }

  fail(message: string): void {
    if (this.error === undefined) this.error = message;
  }

  /**
   * Append one instruction and apply its stack effect.
   * Returns its pc, or -1 when the unit is already in error. The closing
   * HALT is still written after an error.
   */
  emit(op: number, effect: number, flag = 0, index = 0, imm = 0): number {
    if (this.error !== undefined && op !== Opcode.HALT) return -1;
    // One slot is always kept for the closing HALT.
    const limit = op === Opcode.HALT ? this.maxInstructions : this.maxInstructions - 1;
    if (this.count >= limit) {
      this.fail(`instruction limit of ${this.maxInstructions} exceeded`);
      return -1;
    }
    if (flag > MAX_FLAG || index > MAX_POOL_INDEX) {
      this.fail(`operand out of range for opcode ${op}`);
      return -1;
    }
    if ((this.count + 1) * INSTRUCTION_WORDS > this.words.length) {
      const grown = new Int32Array(this.words.length * 2);
      grown.set(this.words);
      this.words = grown;
    }
    const pc = this.count++;
    this.words[pc * INSTRUCTION_WORDS] = encodeWord0(op, flag, index);
    this.words[pc * INSTRUCTION_WORDS + 1] = imm;
    this.depth += effect;
    if (this.depth > this.maxDepth) this.maxDepth = this.depth;
    return pc;
  }

  patchJump(pc: number): void {
    if (pc < 0) return;
    this.words[pc * INSTRUCTION_WORDS + 1] = this.count - pc;
  }

  stringIndex(text: string): number {
    const i = this.strings.add(text);
    if (i === -1) this.fail('string pool overflow');
    return i;
  }

  intIndex(value: bigint): number {
    const i = this.ints.add(value);
    if (i === -1) this.fail('integer pool overflow');
    return i;
  }

  /** Emit a pooled-name instruction, skipping it when the pool is full. */
  emitNamed(op: number, name: string, effect: number, imm = 0): void {
    const i = this.stringIndex(name);
    if (i !== -1) this.emit(op, effect, 0, i, imm);
  }

  compile(node: ExprNode): void {
    const before = this.depth;
    this.compileNode(node);
    if (this.error === undefined && this.depth !== before + 1) {
      this.fail(`stack imbalance after ${node.kind}`);
    }
  }

  private compileArgs(args: readonly ExprNode[]): void {
    for (let i = args.length - 1; i >= 0; i--) this.compile(args[i]);
  }

  private compileNode(node: ExprNode): void {
    switch (node.kind) {
      case 'IntLiteral': {
        const v = node.value;
        if (v >= INT32_MIN && v <= INT32_MAX) {
          this.emit(Opcode.PUSH_INT, 1, 0, 0, Number(v));
        } else {
          const i = this.intIndex(BigInt.asIntN(64, v));
          if (i !== -1) this.emit(Opcode.PUSH_INT, 1, 1, i);
        }
        return;
      }
      case 'FloatLiteral':
        this.emitNamed(Opcode.PUSH_FLOAT, floatToPoolText(node.value), 1);
        return;
      case 'StringLiteral':
        this.emitNamed(Opcode.PUSH_STRING, node.value, 1);
        return;
      case 'BooleanLiteral':
        this.emit(Opcode.PUSH_BOOL, 1, node.value ? 1 : 0);
        return;
      case 'NullLiteral':
        this.emit(Opcode.PUSH_NULL, 1);
        return;

      case 'Identifier':
        this.emitNamed(Opcode.LOAD_VAR, node.name, 1);
        return;
      case 'PropertyRef':
        this.emitNamed(Opcode.LOAD_VAR, node.object, 1);
        this.emitNamed(Opcode.GET_PROP, node.field, 0);
        return;
      case 'MemberAccess':
        this.compile(node.object);
        this.emitNamed(Opcode.GET_PROP, node.property, 0);
        return;
      case 'ComputedMember':
        this.compile(node.object);
        this.compile(node.key);
        this.emit(Opcode.GET_PROP_COMPUTED, -1);
        return;
      case 'IndexAccess':
        this.compile(node.array);
        this.compile(node.index);
        this.emit(Opcode.GET_INDEX, -1);
        return;

      case 'BinaryExpression':
        this.compile(node.left);
        this.compile(node.right);
        this.emit(BINARY_OPCODES[node.operator], -1);
        return;
      case 'UnaryExpression':
        this.compile(node.operand);
        this.emit(UNARY_OPCODES[node.operator], 0);
        return;

      case 'ConditionalExpression': {
        this.compile(node.test);
        const toElse = this.emit(Opcode.JUMP_IF_FALSE, -1);
        const armDepth = this.depth;
        this.compile(node.consequent);
        const toEnd = this.emit(Opcode.JUMP, 0);
        this.patchJump(toElse);
        // The else arm starts from the same depth as the then arm.
        this.depth = armDepth;
        this.compile(node.alternate);
        this.patchJump(toEnd);
        return;
      }

      case 'CallExpression': {
        this.compileArgs(node.args);
        const isBuiltin = this.builtinPrefixes.some((p) => node.callee.startsWith(p));
        const op = isBuiltin ? Opcode.CALL_BUILTIN : Opcode.CALL_FUNCTION;
        this.emitNamed(op, node.callee, 1 - node.args.length, node.args.length);
        return;
      }
      case 'MethodCall':
        this.compile(node.receiver);
        this.compileArgs(node.args);
        this.emitNamed(Opcode.CALL_METHOD, node.method, -node.args.length, node.args.length);
        return;

      case 'GroupExpression':
        this.compileNode(node.inner);
        return;

      case 'ArrayLiteral':
        for (const el of node.elements) this.compile(el);
        this.emit(Opcode.BUILD_ARRAY, 1 - node.elements.length, 0, 0, node.elements.length);
        return;
      case 'ObjectLiteral':
        for (const prop of node.properties) {
          this.emitNamed(Opcode.PUSH_STRING, prop.key, 1);
          this.compile(prop.value);
        }
        this.emit(Opcode.BUILD_OBJECT, 1 - 2 * node.properties.length, 0, 0, node.properties.length);
        return;

      default:
        this.emit(Opcode.PUSH_NULL, 1);
    }
  }
}

/**
 * Compile a tree into an immutable unit. The tree is borrowed and never
 * mutated; folding works on a rebuilt copy.
 */
export function compileExpression(tree: ExprNode, options: CompileOptions = {}): CompiledExpr {
  const emitter = new Emitter(
    options.maxInstructions ?? DEFAULT_MAX_INSTRUCTIONS,
    options.builtinPrefixes ?? DEFAULT_BUILTIN_PREFIXES,
    Math.min(options.maxPoolEntries ?? POOL_LIMIT, POOL_LIMIT)
  );

  emitter.compile(options.optimize ? foldConstants(tree) : tree);
  emitter.emit(Opcode.HALT, 0);

  const code = emitter.words.slice(0, emitter.count * INSTRUCTION_WORDS);
  const eliminated = options.eliminateDeadCode ? eliminateDeadCode(code, emitter.count) : 0;

  return Object.freeze({
    code: Object.freeze(Array.from(code)),
    count: emitter.count,
    strings: emitter.strings.toArray(),
    ints: emitter.ints.toArray(),
    maxStackDepth: emitter.maxDepth,
    source: options.source === true ? formatExpr(tree) : options.source,
    hasError: emitter.error !== undefined,
    error: emitter.error,
    eliminated,
  });
}
