/**
 * exprvm Core - Disassembler
 *
 * Text listing of a compiled unit, one instruction per line:
 *
 *   ; Disassembly of 4 instructions
 *      0: PUSH_INT           1
 *      1: LOAD_VAR           "count"
 *      2: ADD
 *      3: HALT
 */

import type { CompiledExpr } from './compiler.js';
import { Opcode, decode, opcodeName, type Instruction } from './opcodes.js';

function pooled(unit: CompiledExpr, index: number, quote: boolean): string {
  const text = unit.strings[index];
  if (text === undefined) return ` [pool=${index}]`;
  return quote ? ` ${JSON.stringify(text)}` : ` ${text}`;
}

function operands(unit: CompiledExpr, ins: Instruction): string {
  switch (ins.op) {
    case Opcode.PUSH_INT: {
      if (ins.flag === 0) return ` ${ins.imm}`;
      const n = unit.ints[ins.index];
      return n === undefined ? ` [pool=${ins.index}]` : ` ${n}`;
    }
    case Opcode.PUSH_FLOAT:
      return pooled(unit, ins.index, false);
    case Opcode.PUSH_STRING:
    case Opcode.LOAD_VAR:
    case Opcode.GET_PROP:
      return pooled(unit, ins.index, true);
    case Opcode.PUSH_BOOL:
      return ins.flag ? ' true' : ' false';
    case Opcode.JUMP:
    case Opcode.JUMP_IF_FALSE:
    case Opcode.JUMP_IF_TRUE:
      return ` [offset=${ins.imm}]`;
    case Opcode.CALL_METHOD:
    case Opcode.CALL_BUILTIN:
    case Opcode.CALL_FUNCTION:
      return `${pooled(unit, ins.index, true)} [args=${ins.imm}]`;
    case Opcode.BUILD_ARRAY:
    case Opcode.BUILD_OBJECT:
      return ` [count=${ins.imm}]`;
    default:
      return '';
  }
}

export function disassemble(unit: CompiledExpr): string {
  if (unit.count === 0) return '; No bytecode\n';

  const lines = [`; Disassembly of ${unit.count} instructions`];
  if (unit.source !== undefined) lines.push(`; source: ${unit.source}`);
  if (unit.hasError) lines.push(`; error: ${unit.error ?? 'unknown'}`);

  for (let pc = 0; pc < unit.count; pc++) {
    const ins = decode(unit.code, pc);
    const text = `${String(pc).padStart(4)}: ${opcodeName(ins.op).padEnd(18)}${operands(unit, ins)}`;
    lines.push(text.trimEnd());
  }
  return lines.join('\n') + '\n';
}
