import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  arrayLit,
  binary,
  call,
  ident,
  intLit,
  member,
  nullLit,
  objectLit,
  stringLit
} from '../src/core/ast.js';
import { BuiltinTable } from '../src/core/builtins.js';
import { ExprEngine } from '../src/core/engine.js';
import { nullValue, stringValue, valueToString, type Value } from '../src/core/value.js';

describe('ExprEngine', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('evaluates trees against its state', () => {
    const engine = new ExprEngine({ user: { name: 'Ann' }, count: 5 });
    expect(engine.evaluateJS(member(ident('user'), 'name'))).toBe('Ann');
    expect(engine.evaluateJS(binary('+', ident('count'), intLit(1)))).toBe(6);
  });

  it('binds locals ahead of state', () => {
    const engine = new ExprEngine({ count: 5 });
    expect(engine.evaluateJS(ident('count'), { count: 1 })).toBe(1);
    expect(engine.evaluateJS(binary('*', ident('x'), intLit(2)), { x: 21 })).toBe(42);
  });

  it('reuses compiled units for structurally equal trees', () => {
    const engine = new ExprEngine();
    const first = engine.compile(binary('>', ident('count'), intLit(10)));
    const second = engine.compile(binary('>', ident('count'), intLit(10)));
    expect(second).toBe(first);
    expect(engine.stats()).toMatchObject({ size: 1, hits: 1, misses: 1 });
  });

  it('folds constants by default', () => {
    const engine = new ExprEngine();
    const tree = binary('+', intLit(1), binary('*', intLit(2), intLit(3)));
    expect(engine.compile(tree).count).toBe(2);
    engine.configure({ optimize: false });
    expect(engine.compile(tree).count).toBe(6);
  });

  describe('configure', () => {
    it('returns the engine for chaining', () => {
      const engine = new ExprEngine();
      expect(engine.configure({ debug: true })).toBe(engine);
      expect(engine.cfg.debug).toBe(true);
    });

    it('rejects sizes that are not positive integers', () => {
      const engine = new ExprEngine();
      expect(() => engine.configure({ cacheSize: 0 })).toThrow('exprvm: cacheSize must be a positive integer, got 0');
      expect(() => engine.configure({ maxStackSize: -1 })).toThrow(
        'exprvm: maxStackSize must be a positive integer, got -1'
      );
    });

    it('rebuilds the cache with a new size', () => {
      const engine = new ExprEngine();
      engine.compile(ident('a'));
      engine.configure({ cacheSize: 5 });
      expect(engine.stats()).toMatchObject({ size: 0, maxSize: 5 });
    });
  });

  describe('memoization', () => {
    const setup = () => {
      const label = vi.fn((args: readonly Value[]) => stringValue(`n=${valueToString(args[0])}`));
      const builtins = new BuiltinTable().register('string_label', label);
      const engine = new ExprEngine({ n: 1 }, { memoizeResults: true, builtins });
      return { engine, label, tree: call('string_label', [ident('n')]) };
    };

    it('reuses a result until a variable it reads changes', () => {
      const { engine, label, tree } = setup();
      expect(engine.evaluate(tree)).toEqual(stringValue('n=1'));
      expect(engine.evaluate(tree)).toEqual(stringValue('n=1'));
      expect(label).toHaveBeenCalledTimes(1);

      engine.set('n', 2);
      expect(engine.evaluate(tree)).toEqual(stringValue('n=2'));
      expect(label).toHaveBeenCalledTimes(2);
    });

    it('ignores writes to unrelated variables', () => {
      const { engine, label, tree } = setup();
      engine.evaluate(tree);
      engine.set('other', true);
      engine.evaluate(tree);
      expect(label).toHaveBeenCalledTimes(1);
    });

    it('never memoizes evaluations with locals', () => {
      const { engine, label, tree } = setup();
      engine.evaluate(tree, { n: 7 });
      expect(engine.evaluate(tree)).toEqual(stringValue('n=1'));
      expect(label).toHaveBeenCalledTimes(2);
    });

    it('reports how many results an explicit invalidation dropped', () => {
      const { engine, tree } = setup();
      engine.evaluate(tree);
      expect(engine.invalidate('n')).toBe(1);
      expect(engine.invalidate('n')).toBe(0);
    });
  });

  describe('errors', () => {
    const failure = new Error('boom');
    const throwing = () =>
      new BuiltinTable().register('math_boom', () => {
        throw failure;
      });

    it('routes builtin exceptions to onError', () => {
      const onError = vi.fn();
      const engine = new ExprEngine({}, { builtins: throwing(), onError });
      expect(engine.evaluate(call('math_boom'))).toEqual(nullValue());
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(failure, {
        phase: 'builtin',
        subject: 'math_boom',
        message: 'builtin "math_boom" threw',
      });
    });

    it('falls back to console.error without a handler', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const engine = new ExprEngine({}, { builtins: throwing() });
      engine.evaluate(call('math_boom'));
      expect(spy).toHaveBeenCalledWith('exprvm: builtin "math_boom" threw', failure);
    });

    it('reports faulted evaluations with the expression source', () => {
      const onError = vi.fn();
      const engine = new ExprEngine({}, { maxStackSize: 1, onError });
      engine.evaluate(arrayLit([intLit(1), intLit(2)]));
      expect(onError).toHaveBeenCalledWith(expect.any(Error), {
        phase: 'evaluate',
        subject: '[1, 2]',
        message: 'evaluation failed: stack overflow (limit 1)',
      });
    });
  });

  it('coerces results for the bound property', () => {
    const engine = new ExprEngine({ count: 3 });
    expect(engine.evaluateAs('text', nullLit())).toBe('');
    expect(engine.evaluateAs('visibility', ident('count'))).toBe(true);
    expect(engine.evaluateAs('number', stringLit(' 42 '))).toBe(42);
    expect(engine.evaluateAs('style', objectLit({ color: stringLit('red') }))).toEqual({ color: 'red' });
  });

  it('disassembles the unit it would run', () => {
    const engine = new ExprEngine();
    const listing = engine.disassemble(binary('+', intLit(1), binary('*', intLit(2), intLit(3))));
    expect(listing).toBe(
      '; Disassembly of 2 instructions\n' +
        '; source: (1 + (2 * 3))\n' +
        '   0: ' + 'PUSH_INT'.padEnd(18) + ' 7\n' +
        '   1: HALT\n'
    );
  });

  it('clears the cache and its statistics', () => {
    const engine = new ExprEngine();
    engine.compile(ident('a'));
    engine.compile(ident('a'));
    engine.clearCache();
    expect(engine.stats()).toMatchObject({ size: 0, hits: 0, misses: 0 });
  });

  it('stops tracking state after dispose', () => {
    const engine = new ExprEngine({ n: 1 }, { memoizeResults: true });
    engine.evaluate(ident('n'));
    engine.dispose();
    expect(engine.stats().size).toBe(0);
    engine.set('n', 2);
    expect(engine.evaluateJS(ident('n'))).toBe(2);
  });
});
