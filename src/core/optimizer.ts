/**
 * exprvm Core - Optimizer
 *
 * Two passes:
 * - foldConstants: tree level. Literal-only operator nodes are evaluated
 *   through the VM's own operator tables and replaced by one literal.
 * - eliminateDeadCode: bytecode level. Instructions no control path can
 *   reach are overwritten with NOP in place.
 */

import {
  binary,
  call,
  computed,
  index,
  isLiteral,
  literalFromValue,
  literalValue,
  member,
  methodCall,
  ternary,
  unary,
  type ExprNode
} from './ast.js';
import { INSTRUCTION_WORDS, Opcode, decode } from './opcodes.js';
import { BINARY_OPS, UNARY_OPS } from './ops.js';
import { isTruthy } from './value.js';

/**
 * Fold constant subtrees bottom-up. Returns a new tree; leaves are shared
 * with the input, which is never mutated.
 */
export function foldConstants(node: ExprNode): ExprNode {
  switch (node.kind) {
    case 'BinaryExpression': {
      const left = foldConstants(node.left);
      const right = foldConstants(node.right);
      if (isLiteral(left) && isLiteral(right)) {
        const folded = literalFromValue(BINARY_OPS[node.operator](literalValue(left), literalValue(right)));
        if (folded) return folded;
      }
      return binary(node.operator, left, right);
    }
    case 'UnaryExpression': {
      const operand = foldConstants(node.operand);
      if (isLiteral(operand)) {
        const folded = literalFromValue(UNARY_OPS[node.operator](literalValue(operand)));
        if (folded) return folded;
      }
      return unary(node.operator, operand);
    }
    case 'ConditionalExpression': {
      const test = foldConstants(node.test);
      if (isLiteral(test)) {
        return foldConstants(isTruthy(literalValue(test)) ? node.consequent : node.alternate);
      }
      return ternary(test, foldConstants(node.consequent), foldConstants(node.alternate));
    }
    case 'GroupExpression':
      return foldConstants(node.inner);
    case 'MemberAccess':
      return member(foldConstants(node.object), node.property);
    case 'ComputedMember':
      return computed(foldConstants(node.object), foldConstants(node.key));
    case 'IndexAccess':
      return index(foldConstants(node.array), foldConstants(node.index));
    case 'CallExpression':
      return call(node.callee, node.args.map(foldConstants));
    case 'MethodCall':
      return methodCall(foldConstants(node.receiver), node.method, node.args.map(foldConstants));
    case 'ArrayLiteral':
      return { kind: 'ArrayLiteral', elements: node.elements.map(foldConstants) };
    case 'ObjectLiteral':
      return {
        kind: 'ObjectLiteral',
        properties: node.properties.map((p) => ({ key: p.key, value: foldConstants(p.value) })),
      };
    default:
      return node;
  }
}

/**
 * Reachability sweep from instruction 0. Unreached slots become NOP.
 * Returns how many instructions were cleared.
 */
export function eliminateDeadCode(code: Int32Array, count: number): number {
  const reachable = new Uint8Array(count);
  const pending = [0];

  while (pending.length > 0) {
    const pc = pending.pop() ?? -1;
    if (pc < 0 || pc >= count || reachable[pc]) continue;
    reachable[pc] = 1;

    const { op, imm } = decode(code, pc);
    switch (op) {
      case Opcode.HALT:
        break;
      case Opcode.JUMP:
        pending.push(pc + imm);
        break;
      case Opcode.JUMP_IF_FALSE:
      case Opcode.JUMP_IF_TRUE:
        pending.push(pc + imm, pc + 1);
        break;
      default:
        pending.push(pc + 1);
    }
  }

  let cleared = 0;
  for (let pc = 0; pc < count; pc++) {
    if (reachable[pc]) continue;
    code[pc * INSTRUCTION_WORDS] = Opcode.NOP;
    code[pc * INSTRUCTION_WORDS + 1] = 0;
    cleared++;
  }
  return cleared;
}
