/**
 * exprvm Core - Engine
 *
 * Configured entry point tying the pipeline together:
 *   tree -> constant folding -> compiler -> dead-code elimination -> VM
 *
 * Compiled units are cached by tree structure. Results can optionally be
 * memoized per tree; any write to the engine's state drops the memoized
 * results that read the written variable.
 */

import type { ExprNode } from './ast.js';
import { coerce, type BindingKind, type BindingTypes } from './bindings.js';
import type { BuiltinRegistry } from './builtins.js';
import { DEFAULT_BUILTIN_PREFIXES, compileExpression, type CompiledExpr } from './compiler.js';
import { disassemble } from './disasm.js';
import { CompiledExprCache, type CacheStats } from './expr-cache.js';
import { reportError, warn, type ErrorHandler } from './log.js';
import { StateStore } from './state.js';
import { fromJS, releaseValue, toJS, type Value } from './value.js';
import { DEFAULT_MAX_STACK_SIZE, EvalContext } from './vm.js';

export interface EngineConfig {
  optimize: boolean;
  eliminateDeadCode: boolean;
  cacheSize: number;
  memoizeResults: boolean;
  builtinPrefixes: readonly string[];
  maxStackSize: number;
  builtins: BuiltinRegistry | null;
  onError: ErrorHandler | null;
  debug: boolean;
}

export type EngineOptions = Partial<EngineConfig>;

function checkPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`exprvm: ${name} must be a positive integer, got ${value}`);
  }
}

export class ExprEngine {
  declare cfg: EngineConfig;
  readonly state: StateStore;
  private _ec: CompiledExprCache;
  private _unsubscribe: () => void;

  constructor(init: Record<string, unknown> = {}, options: EngineOptions = {}) {
    this.cfg = {
      optimize: true,
      eliminateDeadCode: true,
      cacheSize: 1000,
      memoizeResults: false,
      builtinPrefixes: DEFAULT_BUILTIN_PREFIXES,
      maxStackSize: DEFAULT_MAX_STACK_SIZE,
      builtins: null,
      onError: null,
      debug: false,
    };
    this._ec = new CompiledExprCache(this.cfg.cacheSize);

    this.state = new StateStore();
    for (const [name, data] of Object.entries(init)) this.state.setJS(name, data);
    this._unsubscribe = this.state.subscribe((name) => {
      this._ec.invalidateVar(name);
    });

    this.configure(options);
  }

  /**
   * Configure the engine.
   *
   * Options that change how units are built (`optimize`,
   * `eliminateDeadCode`, `builtinPrefixes`) clear the cache; `cacheSize`
   * rebuilds it.
   *
   * @returns This engine for chaining
   *
   * @example
   * engine.configure({ memoizeResults: true, builtins: table });
   */
  configure(opts: EngineOptions): this {
    let rebuild = false;
    if (opts.optimize !== undefined && opts.optimize !== this.cfg.optimize) {
      this.cfg.optimize = opts.optimize;
      rebuild = true;
    }
    if (opts.eliminateDeadCode !== undefined && opts.eliminateDeadCode !== this.cfg.eliminateDeadCode) {
      this.cfg.eliminateDeadCode = opts.eliminateDeadCode;
      rebuild = true;
    }
    if (opts.builtinPrefixes !== undefined) {
      this.cfg.builtinPrefixes = Object.freeze([...opts.builtinPrefixes]);
      rebuild = true;
    }
    if (opts.cacheSize !== undefined) {
      checkPositiveInteger('cacheSize', opts.cacheSize);
      this.cfg.cacheSize = opts.cacheSize;
      this._ec.clear();
      this._ec = new CompiledExprCache(opts.cacheSize);
    } else if (rebuild) {
      this._ec.clear();
    }
    if (opts.maxStackSize !== undefined) {
      checkPositiveInteger('maxStackSize', opts.maxStackSize);
      this.cfg.maxStackSize = opts.maxStackSize;
    }
    if (opts.memoizeResults !== undefined) {
      this.cfg.memoizeResults = opts.memoizeResults;
      if (!opts.memoizeResults) this._ec.invalidateAll();
    }
    if (opts.builtins !== undefined) {
      this.cfg.builtins = opts.builtins;
      this._ec.invalidateAll();
    }
    if (opts.onError !== undefined) this.cfg.onError = opts.onError;
    if (opts.debug !== undefined) this.cfg.debug = opts.debug;
    return this;
  }

  /**
   * Compile a tree, reusing the cached unit for a structurally equal tree.
   * Units that fail to compile are reported and not cached.
   */
  compile(tree: ExprNode, source?: string): CompiledExpr {
    const cached = this._ec.lookup(tree);
    if (cached) return cached;

    const unit = compileExpression(tree, {
      optimize: this.cfg.optimize,
      eliminateDeadCode: this.cfg.eliminateDeadCode,
      builtinPrefixes: this.cfg.builtinPrefixes,
      source: source ?? true,
    });

    if (unit.hasError) {
      const message = `compile failed: ${unit.error ?? 'unknown error'}`;
      reportError(this.cfg.onError, new Error(message), { phase: 'compile', subject: unit.source, message });
      if (this.cfg.debug) warn(`disassembly of failed unit\n${disassemble(unit)}`);
      return unit;
    }
    return this._ec.insert(tree, unit);
  }

  /**
   * Evaluate a tree against the engine's state. `locals` are plain JS
   * values bound ahead of state; results are only memoized when there
   * are none.
   */
  evaluate(tree: ExprNode, locals?: Record<string, unknown>): Value {
    const memoize = this.cfg.memoizeResults && locals === undefined;
    const unit = this.compile(tree);

    if (memoize) {
      const hit = this._ec.getResult(tree);
      if (hit !== undefined) return hit;
    }

    const bound = locals === undefined
      ? undefined
      : new Map(Object.entries(locals).map(([k, v]): [string, Value] => [k, fromJS(v)]));
    const ctx = new EvalContext({
      locals: bound,
      state: this.state,
      builtins: this.cfg.builtins ?? undefined,
      maxStackSize: this.cfg.maxStackSize,
      onError: this.cfg.onError,
    });
    const value = ctx.run(unit);

    if (ctx.hasError) {
      const message = `evaluation failed: ${ctx.error ?? 'unknown error'}`;
      reportError(this.cfg.onError, new Error(message), { phase: 'evaluate', subject: unit.source, message });
    } else if (memoize && !unit.hasError) {
      this._ec.storeResult(tree, value);
    }
    return value;
  }

  /** `evaluate`, converted to plain JS data. */
  evaluateJS(tree: ExprNode, locals?: Record<string, unknown>): unknown {
    return toJS(this.evaluate(tree, locals));
  }

  /** Evaluate and coerce for the property kind the result feeds. */
  evaluateAs<K extends BindingKind>(kind: K, tree: ExprNode, locals?: Record<string, unknown>): BindingTypes[K] {
    const value = this.evaluate(tree, locals);
    try {
      return coerce(kind, value);
    } finally {
      releaseValue(value);
    }
  }

  /** Write plain JS data into state; dependent memoized results are dropped. */
  set(name: string, data: unknown): this {
    this.state.setJS(name, data);
    return this;
  }

  /** Drop memoized results that read `name`. Returns how many were dropped. */
  invalidate(name: string): number {
    return this._ec.invalidateVar(name);
  }

  disassemble(tree: ExprNode): string {
    return disassemble(this.compile(tree));
  }

  stats(): CacheStats {
    return this._ec.stats();
  }

  clearCache(): void {
    this._ec.clear();
    this._ec.resetStats();
  }

  /** Detach from state and drop every cached unit. */
  dispose(): void {
    this._unsubscribe();
    this._ec.clear();
  }
}
