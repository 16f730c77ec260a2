/**
 * exprvm Core - Constant Pools
 *
 * Deduplicated string and integer constants referenced by the 16-bit index
 * field of an instruction. Index 0 is a valid entry.
 */

/** Entries addressable by a 16-bit index. */
export const POOL_LIMIT = 65536;

abstract class ConstantPool<T> {
  protected readonly entries: T[] = [];

  constructor(readonly limit: number = POOL_LIMIT) {}

  get size(): number {
    return this.entries.length;
  }

  /**
   * Index of `value`, adding it when absent.
   * Returns -1 once the pool is full.
   */
  add(value: T): number {
    const i = this.entries.indexOf(value);
    if (i !== -1) return i;
    if (this.entries.length >= this.limit) return -1;
    this.entries.push(value);
    return this.entries.length - 1;
  }

  get(index: number): T | undefined {
    return index >= 0 && index < this.entries.length ? this.entries[index] : undefined;
  }

  toArray(): readonly T[] {
    return Object.freeze(this.entries.slice());
  }
}

export class StringPool extends ConstantPool<string> {}

/** 64-bit integers that do not fit the 32-bit immediate. */
export class IntPool extends ConstantPool<bigint> {}
