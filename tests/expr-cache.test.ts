import { describe, it, expect } from 'vitest';
import {
  binary,
  call,
  floatLit,
  ident,
  intLit,
  member,
  methodCall,
  objectLit,
  propertyRef,
  stringLit,
  ternary
} from '../src/core/ast.js';
import { compileExpression } from '../src/core/compiler.js';
import { CompiledExprCache, collectVariables, exprKey } from '../src/core/expr-cache.js';
import { intValue, stringValue } from '../src/core/value.js';

describe('CompiledExprCache', () => {
  it('misses first, then hits for a structurally equal tree', () => {
    const cache = new CompiledExprCache(10);
    const unit = compileExpression(binary('+', ident('count'), intLit(1)));

    expect(cache.lookup(binary('+', ident('count'), intLit(1)))).toBeUndefined();
    cache.insert(binary('+', ident('count'), intLit(1)), unit);
    expect(cache.lookup(binary('+', ident('count'), intLit(1)))).toBe(unit);

    const stats = cache.stats();
    expect(stats.hits).toBe(1);
    expect(stats.misses).toBe(1);
    expect(stats.hitRate).toBe(0.5);
  });

  it('keys every literal kind separately', () => {
    expect(exprKey(intLit(1))).not.toBe(exprKey(floatLit(1)));
    expect(exprKey(stringLit('1'))).not.toBe(exprKey(intLit(1)));
    expect(exprKey(floatLit(0))).not.toBe(exprKey(floatLit(-0)));
    expect(exprKey(ident('a'))).not.toBe(exprKey(stringLit('a')));
    expect(exprKey(member(ident('a'), 'b'))).toBe(exprKey(member(ident('a'), 'b')));
  });

  it('evicts the least recently used entry', () => {
    const cache = new CompiledExprCache(2);
    const a = ident('a');
    const b = ident('b');
    const c = ident('c');
    cache.insert(a, compileExpression(a));
    cache.insert(b, compileExpression(b));
    cache.lookup(a);
    cache.insert(c, compileExpression(c));

    expect(cache.has(a)).toBe(true);
    expect(cache.has(b)).toBe(false);
    expect(cache.has(c)).toBe(true);
    expect(cache.stats().evictions).toBe(1);
    expect(cache.size).toBe(2);
  });

  it('replacing an entry does not evict', () => {
    const cache = new CompiledExprCache(1);
    const a = ident('a');
    cache.insert(a, compileExpression(a));
    cache.storeResult(a, intValue(1));
    cache.insert(a, compileExpression(a));
    expect(cache.stats().evictions).toBe(0);
    expect(cache.getResult(a)).toBeUndefined();
  });

  it('rejects a non-positive size', () => {
    expect(() => new CompiledExprCache(0)).toThrow('exprvm: cache size must be a positive integer, got 0');
    expect(() => new CompiledExprCache(1.5)).toThrow('exprvm: cache size must be a positive integer, got 1.5');
  });

  describe('memoized results', () => {
    it('stores and returns copies', () => {
      const cache = new CompiledExprCache();
      const tree = ident('name');
      cache.insert(tree, compileExpression(tree));
      cache.storeResult(tree, stringValue('Ann'));
      expect(cache.getResult(tree)).toEqual(stringValue('Ann'));
    });

    it('ignores results for trees that are not cached', () => {
      const cache = new CompiledExprCache();
      cache.storeResult(ident('x'), intValue(1));
      expect(cache.getResult(ident('x'))).toBeUndefined();
    });

    it('drops only the results that read a changed variable', () => {
      const cache = new CompiledExprCache();
      const readsA = binary('+', ident('a'), intLit(1));
      const readsB = member(ident('b'), 'size');
      for (const tree of [readsA, readsB]) {
        cache.insert(tree, compileExpression(tree));
        cache.storeResult(tree, intValue(1));
      }

      expect(cache.invalidateVar('a')).toBe(1);
      expect(cache.getResult(readsA)).toBeUndefined();
      expect(cache.getResult(readsB)).toEqual(intValue(1));
      expect(cache.has(readsA)).toBe(true);
    });

    it('drops every result on invalidateAll and everything on clear', () => {
      const cache = new CompiledExprCache();
      const tree = ident('a');
      cache.insert(tree, compileExpression(tree));
      cache.storeResult(tree, intValue(1));
      cache.invalidateAll();
      expect(cache.getResult(tree)).toBeUndefined();
      expect(cache.size).toBe(1);
      cache.clear();
      expect(cache.size).toBe(0);
    });
  });

  it('resets statistics', () => {
    const cache = new CompiledExprCache();
    cache.lookup(ident('a'));
    cache.resetStats();
    expect(cache.stats()).toEqual({ size: 0, maxSize: 1000, hits: 0, misses: 0, evictions: 0, hitRate: 0 });
  });
});

describe('collectVariables', () => {
  it('finds names in every position', () => {
    const tree = ternary(
      binary('>', ident('count'), intLit(0)),
      methodCall(propertyRef('user', 'name'), 'substring', [ident('start')]),
      call('string_join', [objectLit({ k: member(ident('config'), 'sep') })])
    );
    expect([...collectVariables(tree)].sort()).toEqual(['config', 'count', 'start', 'user']);
  });

  it('does not count member names as variables', () => {
    expect([...collectVariables(member(ident('user'), 'name'))]).toEqual(['user']);
  });
});
