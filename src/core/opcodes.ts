/**
 * exprvm Core - Instruction Set
 *
 * Every instruction is 8 bytes, stored as two 32-bit words:
 *
 *   word 0: opcode (bits 0-7) | flag (bits 8-15) | pool index (bits 16-31)
 *   word 1: signed 32-bit immediate
 *
 * The immediate carries inline integers, argument counts and PC-relative
 * jump offsets (target = pc + offset).
 */

export const Opcode = {
  NOP: 0,
  PUSH_INT: 1,
  PUSH_FLOAT: 2,
  PUSH_STRING: 3,
  PUSH_BOOL: 4,
  PUSH_NULL: 5,
  DUP: 6,
  POP: 7,
  SWAP: 8,
  LOAD_VAR: 9,
  GET_PROP: 10,
  GET_PROP_COMPUTED: 11,
  GET_INDEX: 12,
  CALL_METHOD: 13,
  CALL_BUILTIN: 14,
  CALL_FUNCTION: 15,
  ADD: 16,
  SUB: 17,
  MUL: 18,
  DIV: 19,
  MOD: 20,
  CONCAT: 21,
  EQ: 22,
  NEQ: 23,
  LT: 24,
  LTE: 25,
  GT: 26,
  GTE: 27,
  AND: 28,
  OR: 29,
  NOT: 30,
  NEGATE: 31,
  TYPEOF: 32,
  JUMP: 33,
  JUMP_IF_FALSE: 34,
  JUMP_IF_TRUE: 35,
  BUILD_ARRAY: 36,
  BUILD_OBJECT: 37,
  HALT: 38,
} as const;

export type OpcodeName = keyof typeof Opcode;
export type Opcode = (typeof Opcode)[OpcodeName];

/** Words per instruction. */
export const INSTRUCTION_WORDS = 2;

export const MAX_POOL_INDEX = 0xffff;
export const MAX_FLAG = 0xff;

const NAMES: string[] = [];
for (const [name, code] of Object.entries(Opcode)) NAMES[code] = name;

export function opcodeName(op: number): string {
  return NAMES[op] ?? 'UNKNOWN';
}

export interface Instruction {
  /** Raw opcode byte; may be outside the known set in hand-built code. */
  op: number;
  flag: number;
  index: number;
  imm: number;
}

export function encodeWord0(op: number, flag: number, index: number): number {
  return ((op & 0xff) | ((flag & 0xff) << 8) | ((index & 0xffff) << 16)) | 0;
}

export function decode(code: ArrayLike<number>, pc: number): Instruction {
  const w0 = code[pc * INSTRUCTION_WORDS];
  return {
    op: w0 & 0xff,
    flag: (w0 >>> 8) & 0xff,
    index: (w0 >>> 16) & 0xffff,
    imm: code[pc * INSTRUCTION_WORDS + 1],
  };
}

/**
 * Pack a list of instructions into the word layout. Useful for building
 * units by hand in tests and tools.
 */
export function assemble(instructions: readonly Partial<Instruction>[]): Int32Array {
  const code = new Int32Array(instructions.length * INSTRUCTION_WORDS);
  instructions.forEach((ins, pc) => {
    code[pc * INSTRUCTION_WORDS] = encodeWord0(ins.op ?? Opcode.NOP, ins.flag ?? 0, ins.index ?? 0);
    code[pc * INSTRUCTION_WORDS + 1] = ins.imm ?? 0;
  });
  return code;
}
