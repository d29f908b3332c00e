import { describe, expect, it } from 'vitest';
import { mergeRelated, planWaves } from '../budget.js';
import { assertDisjoint, isDisjoint, normalizeResource, relatedGroup } from '../partition.js';
import { ResourceOverlapError } from '../../errors.js';
import { task } from './helpers.js';

describe('planWaves', () => {
  it('fits under the ceiling in a single wave', () => {
    const tasks = [task('t1', ['a/x.ts']), task('t2', ['b/y.ts'])];
    const plan = planWaves(tasks, { ceiling: 5, allowDefer: false, alwaysMerge: false });
    expect(plan.waves.map(wave => wave.map(unit => unit.id))).toEqual([['t1', 't2']]);
    expect(plan.strategies).toEqual([]);
  });

  it('batches unrelated tasks into sequential waves', () => {
    const tasks = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map((dir, i) => task(`t${i + 1}`, [`${dir}/file.ts`]));
    const plan = planWaves(tasks, { ceiling: 3, allowDefer: false, alwaysMerge: false });

    expect(plan.waves.map(wave => wave.length)).toEqual([3, 3, 1]);
    expect(plan.strategies).toEqual(['batch']);
    expect(plan.requested).toBe(7);
  });

  it('merges related tasks, then defers non-critical ones', () => {
    const tasks = [
      task('t1', ['src/a.ts']),
      task('t2', ['src/b.ts'], { tier: 'T2' }),
      task('t3', ['lib/c.ts']),
      task('t4', ['docs/d.md'])
    ];
    const plan = planWaves(tasks, { ceiling: 2, allowDefer: true, alwaysMerge: false });

    expect(plan.waves).toHaveLength(1);
    const [merged, lib] = plan.waves[0];
    expect(merged.id).toBe('merged:t1+t2');
    expect(merged.resources).toEqual(['src/a.ts', 'src/b.ts']);
    expect(merged.tier).toBe('T2');
    expect(lib.id).toBe('t3');
    expect(plan.deferred.map(unit => unit.id)).toEqual(['t4']);
    expect(plan.strategies).toEqual(['merge', 'defer']);
  });

  it('never defers critical work and runs it first', () => {
    const tasks = [
      task('t1', ['a/x.ts']),
      task('t2', ['b/x.ts'], { critical: true }),
      task('t3', ['c/x.ts'], { critical: true })
    ];
    const plan = planWaves(tasks, { ceiling: 1, allowDefer: true, alwaysMerge: false });

    expect(plan.deferred.map(unit => unit.id)).toEqual(['t1']);
    expect(plan.waves.map(wave => wave.map(unit => unit.id))).toEqual([['t2'], ['t3']]);
    expect(plan.strategies).toEqual(['defer', 'batch']);
  });

  it('expands deferred merged units back into their originals', () => {
    const tasks = [
      task('t1', ['a/x.ts'], { critical: true }),
      task('t2', ['b/x.ts'], { critical: true }),
      task('t3', ['c/x.ts']),
      task('t4', ['c/y.ts'])
    ];
    const plan = planWaves(tasks, { ceiling: 2, allowDefer: true, alwaysMerge: false });
    expect(plan.deferred.map(unit => unit.id)).toEqual(['t3', 't4']);
  });

  it('packs everything into one wave of larger workers while conserving', () => {
    const tasks = [
      task('t1', ['src/a.ts']),
      task('t2', ['src/b.ts']),
      task('t3', ['lib/c.ts']),
      task('t4', ['docs/d.md']),
      task('t5', ['e/x.ts'])
    ];
    const plan = planWaves(tasks, { ceiling: 2, allowDefer: false, alwaysMerge: true });

    expect(plan.waves.map(wave => wave.map(unit => unit.id))).toEqual([['merged:t1+t2+t3', 'merged:t4+t5']]);
    expect(plan.waves[0][0].mergedFrom).toEqual(['t1', 't2', 't3']);
    expect(plan.waves[0][1].resources).toEqual(['docs/d.md', 'e/x.ts']);
    expect(plan.strategies).toEqual(['merge']);
  });
});

describe('partition helpers', () => {
  it('normalizes resources and finds their group', () => {
    expect(normalizeResource('./src//a.ts')).toBe('src/a.ts');
    expect(normalizeResource('src\\ui\\b.ts')).toBe('src/ui/b.ts');
    expect(relatedGroup('src/ui/b.ts')).toBe('src');
    expect(relatedGroup('README.md')).toBe('.');
  });

  it('rejects sibling tasks sharing a resource', () => {
    const tasks = [task('t1', ['src/a.ts']), task('t2', ['./src/a.ts'])];
    expect(isDisjoint(tasks)).toBe(false);
    expect(() => assertDisjoint(tasks)).toThrow(ResourceOverlapError);
    expect(() => assertDisjoint(tasks)).toThrow('Resource src/a.ts is claimed by both t1 and t2');
  });

  it('keeps ungrouped root files apart from directories', () => {
    const merged = mergeRelated([task('t1', ['README.md']), task('t2', ['LICENSE']), task('t3', ['src/a.ts'])]);
    expect(merged.map(unit => unit.id)).toEqual(['merged:t1+t2', 't3']);
  });
});
