/**
 * exprvm Core - Builtin Registry
 *
 * CALL_BUILTIN dispatches by name through a BuiltinRegistry. The core ships
 * the protocol and a table to register implementations in; the functions
 * themselves belong to the host.
 */

import type { EvalContext } from './vm.js';
import { nullValue, type Value } from './value.js';

/**
 * A builtin borrows its args (the VM releases them afterwards) and returns
 * an owned Value.
 */
export type BuiltinFn = (args: readonly Value[], ctx: EvalContext) => Value;

export interface BuiltinRegistry {
  /** Returns undefined when `name` is not registered. */
  call(name: string, args: readonly Value[], ctx: EvalContext): Value | undefined;
}

export interface BuiltinOptions {
  minArgs?: number;
  maxArgs?: number;
  /** Human-readable signature, e.g. "(s: string) -> string". */
  signature?: string;
  description?: string;
}

export interface BuiltinEntry extends Required<Pick<BuiltinOptions, 'minArgs' | 'maxArgs'>> {
  readonly name: string;
  readonly fn: BuiltinFn;
  readonly signature: string | undefined;
  readonly description: string | undefined;
}

/**
 * BuiltinTable - Map-backed BuiltinRegistry
 *
 * Calls whose argument count falls outside `[minArgs, maxArgs]` yield null
 * without invoking the function.
 *
 * @example
 * const table = new BuiltinTable()
 *   .register('string_upper', ([s]) => stringValue(valueToString(s).toUpperCase()), { minArgs: 1, maxArgs: 1 });
 */
export class BuiltinTable implements BuiltinRegistry {
  private entries: Map<string, BuiltinEntry> = new Map();

  register(name: string, fn: BuiltinFn, opts: BuiltinOptions = {}): this {
    const minArgs = opts.minArgs ?? 0;
    const maxArgs = opts.maxArgs ?? Infinity;
    if (minArgs < 0 || maxArgs < minArgs) {
      throw new Error(`exprvm: invalid arity for builtin "${name}"`);
    }
    this.entries.set(name, {
      name,
      fn,
      minArgs,
      maxArgs,
      signature: opts.signature,
      description: opts.description,
    });
    return this;
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): BuiltinEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  call(name: string, args: readonly Value[], ctx: EvalContext): Value | undefined {
    const entry = this.entries.get(name);
    if (!entry) return undefined;
    if (args.length < entry.minArgs || args.length > entry.maxArgs) return nullValue();
    return entry.fn(args, ctx);
  }
}
