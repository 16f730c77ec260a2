/**
 * exprvm Core - State Store
 *
 * Application state the VM reads when a variable is not bound locally.
 * Storage is a flat Map keyed by variable name; there is no prototype or
 * scope chain to walk.
 */

import { copyValue, fromJS, releaseValue, type Value } from './value.js';

/**
 * Read-only view of application state handed to the VM.
 * `lookup` returns a borrowed Value (the VM copies it) or undefined.
 */
export interface StateAccessor {
  lookup(name: string): Value | undefined;
}

export type StateListener = (name: string) => void;

/**
 * StateStore - Map-backed StateAccessor
 *
 * @example
 * const state = new StateStore();
 * state.setJS('user', { name: 'Ann' });
 * state.get('user');   // copy of the stored object Value
 */
export class StateStore implements StateAccessor {
  private store: Map<string, Value> = new Map();
  private listeners: Set<StateListener> = new Set();

  lookup(name: string): Value | undefined {
    return this.store.get(name);
  }

  /** Copy of the stored Value, or undefined when unset. */
  get(name: string): Value | undefined {
    const v = this.store.get(name);
    return v === undefined ? undefined : copyValue(v);
  }

  /**
   * Store a Value, taking ownership of it. The previous Value (if any) is
   * released and listeners are told which name changed.
   */
  set(name: string, value: Value): void {
    const prev = this.store.get(name);
    if (prev !== undefined) releaseValue(prev);
    this.store.set(name, value);
    this.notify(name);
  }

  /** Store plain JS data, converted with `fromJS`. */
  setJS(name: string, data: unknown): void {
    this.set(name, fromJS(data));
  }

  has(name: string): boolean {
    return this.store.has(name);
  }

  delete(name: string): boolean {
    const prev = this.store.get(name);
    if (prev === undefined) return false;
    releaseValue(prev);
    this.store.delete(name);
    this.notify(name);
    return true;
  }

  clear(): void {
    const names = [...this.store.keys()];
    for (const v of this.store.values()) releaseValue(v);
    this.store.clear();
    for (const name of names) this.notify(name);
  }

  get size(): number {
    return this.store.size;
  }

  /** Subscribe to changes. Returns an unsubscribe function. */
  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(name: string): void {
    for (const listener of this.listeners) listener(name);
  }
}
