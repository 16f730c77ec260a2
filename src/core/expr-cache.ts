/**
 * exprvm Core - Compiled Expression Cache
 *
 * LRU cache of compiled units keyed by tree structure, so two separately
 * parsed copies of `count + 1` share one unit. Each entry also records the
 * variables the tree reads, which lets a state change drop exactly the
 * memoized results that depend on it.
 */

import type { ExprNode } from './ast.js';
import type { CompiledExpr } from './compiler.js';
import { copyValue, releaseValue, type Value } from './value.js';

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  evictions: number;
  /** hits / (hits + misses), 0 before the first lookup. */
  hitRate: number;
}

interface CacheEntry {
  readonly unit: CompiledExpr;
  readonly deps: ReadonlySet<string>;
  result: Value | undefined;
}

/**
 * Structural key for a tree. Distinguishes every literal kind, so `1`
 * and `1.0` never collide.
 */
export function exprKey(node: ExprNode): string {
  switch (node.kind) {
    case 'IntLiteral':
      return `i${node.value}`;
    case 'FloatLiteral':
      return `f${Object.is(node.value, -0) ? '-0' : String(node.value)}`;
    case 'StringLiteral':
      return `s${JSON.stringify(node.value)}`;
    case 'BooleanLiteral':
      return node.value ? 'T' : 'F';
    case 'NullLiteral':
      return 'N';
    case 'Identifier':
      return `v${JSON.stringify(node.name)}`;
    case 'PropertyRef':
      return `p${JSON.stringify(node.object)}.${JSON.stringify(node.field)}`;
    case 'MemberAccess':
      return `m(${exprKey(node.object)}).${JSON.stringify(node.property)}`;
    case 'ComputedMember':
      return `c(${exprKey(node.object)})[${exprKey(node.key)}]`;
    case 'IndexAccess':
      return `x(${exprKey(node.array)})[${exprKey(node.index)}]`;
    case 'BinaryExpression':
      return `b${node.operator}(${exprKey(node.left)},${exprKey(node.right)})`;
    case 'UnaryExpression':
      return `u${node.operator}(${exprKey(node.operand)})`;
    case 'ConditionalExpression':
      return `t(${exprKey(node.test)},${exprKey(node.consequent)},${exprKey(node.alternate)})`;
    case 'CallExpression':
      return `f${JSON.stringify(node.callee)}(${node.args.map(exprKey).join(',')})`;
    case 'MethodCall':
      return `k(${exprKey(node.receiver)}).${JSON.stringify(node.method)}(${node.args.map(exprKey).join(',')})`;
    case 'GroupExpression':
      return `g(${exprKey(node.inner)})`;
    case 'ArrayLiteral':
      return `a[${node.elements.map(exprKey).join(',')}]`;
    case 'ObjectLiteral':
      return `o{${node.properties.map((p) => `${JSON.stringify(p.key)}:${exprKey(p.value)}`).join(',')}}`;
    default:
      return '?';
  }
}

/** Names of every variable the tree reads. */
export function collectVariables(node: ExprNode, into: Set<string> = new Set()): Set<string> {
  switch (node.kind) {
    case 'Identifier':
      into.add(node.name);
      break;
    case 'PropertyRef':
      into.add(node.object);
      break;
    case 'MemberAccess':
      collectVariables(node.object, into);
      break;
    case 'ComputedMember':
      collectVariables(node.object, into);
      collectVariables(node.key, into);
      break;
    case 'IndexAccess':
      collectVariables(node.array, into);
      collectVariables(node.index, into);
      break;
    case 'BinaryExpression':
      collectVariables(node.left, into);
      collectVariables(node.right, into);
      break;
    case 'UnaryExpression':
      collectVariables(node.operand, into);
      break;
    case 'ConditionalExpression':
      collectVariables(node.test, into);
      collectVariables(node.consequent, into);
      collectVariables(node.alternate, into);
      break;
    case 'CallExpression':
      for (const arg of node.args) collectVariables(arg, into);
      break;
    case 'MethodCall':
      collectVariables(node.receiver, into);
      for (const arg of node.args) collectVariables(arg, into);
      break;
    case 'GroupExpression':
      collectVariables(node.inner, into);
      break;
    case 'ArrayLiteral':
      for (const el of node.elements) collectVariables(el, into);
      break;
    case 'ObjectLiteral':
      for (const p of node.properties) collectVariables(p.value, into);
      break;
    default:
      break;
  }
  return into;
}

/**
 * Compiled-unit cache with LRU (Least Recently Used) eviction.
 * Uses Map's insertion order to track access recency: a hit deletes and
 * re-inserts the entry, so the first key is always the eviction candidate.
 */
export class CompiledExprCache {
  readonly max: number;
  private cache: Map<string, CacheEntry> = new Map();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(maxSize = 1000) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`exprvm: cache size must be a positive integer, got ${maxSize}`);
    }
    this.max = maxSize;
  }

  get size(): number {
    return this.cache.size;
  }

  private touch(key: string): CacheEntry | undefined {
    const entry = this.cache.get(key);
    if (entry !== undefined) {
      this.cache.delete(key);
      this.cache.set(key, entry);
    }
    return entry;
  }

  /** Compiled unit for a structurally equal tree; counts a hit or a miss. */
  lookup(tree: ExprNode): CompiledExpr | undefined {
    const entry = this.touch(exprKey(tree));
    if (entry === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.unit;
  }

  has(tree: ExprNode): boolean {
    return this.cache.has(exprKey(tree));
  }

  /** Insert or replace. Replacing drops any memoized result. */
  insert(tree: ExprNode, unit: CompiledExpr): CompiledExpr {
    const key = exprKey(tree);
    const prev = this.cache.get(key);
    if (prev !== undefined) {
      if (prev.result !== undefined) releaseValue(prev.result);
      this.cache.delete(key);
    } else if (this.cache.size >= this.max) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.evict(oldest.value);
    }
    this.cache.set(key, { unit, deps: collectVariables(tree), result: undefined });
    return unit;
  }

  private evict(key: string): void {
    const entry = this.cache.get(key);
    if (entry?.result !== undefined) releaseValue(entry.result);
    this.cache.delete(key);
    this.evictions++;
  }

  /** Variables the cached tree reads, or undefined when not cached. */
  dependencies(tree: ExprNode): ReadonlySet<string> | undefined {
    return this.cache.get(exprKey(tree))?.deps;
  }

  /** Copy of the memoized result, if one is stored. */
  getResult(tree: ExprNode): Value | undefined {
    const entry = this.touch(exprKey(tree));
    return entry?.result === undefined ? undefined : copyValue(entry.result);
  }

  /** Memoize a copy of `result`. No-op when the tree is not cached. */
  storeResult(tree: ExprNode, result: Value): void {
    const entry = this.cache.get(exprKey(tree));
    if (entry === undefined) return;
    if (entry.result !== undefined) releaseValue(entry.result);
    entry.result = copyValue(result);
  }

  /**
   * Drop memoized results of every entry that reads `name`. Compiled units
   * stay. Returns how many results were dropped.
   */
  invalidateVar(name: string): number {
    let dropped = 0;
    for (const entry of this.cache.values()) {
      if (entry.result !== undefined && entry.deps.has(name)) {
        releaseValue(entry.result);
        entry.result = undefined;
        dropped++;
      }
    }
    return dropped;
  }

  invalidateAll(): void {
    for (const entry of this.cache.values()) {
      if (entry.result !== undefined) releaseValue(entry.result);
      entry.result = undefined;
    }
  }

  clear(): void {
    this.invalidateAll();
    this.cache.clear();
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      maxSize: this.max,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }
}
