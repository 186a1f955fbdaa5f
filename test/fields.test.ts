import { describe, it, expect } from 'vitest';
import { fieldPlan, isValidTag, parseTag } from '../src/fields.js';
import { t } from '../src/types.js';

const names = (type: Parameters<typeof fieldPlan>[0]): string[] => fieldPlan(type).fields.map((f) => f.name);

describe('parseTag', () => {
  it('splits the name from its options', () => {
    expect(parseTag('name,omitempty,string')).toEqual({ name: 'name', omitEmpty: true, string: true });
    expect(parseTag(',omitempty')).toEqual({ name: '', omitEmpty: true, string: false });
    expect(parseTag('x,random')).toEqual({ name: 'x', omitEmpty: false, string: false });
  });

  it('accepts punctuation but not quotes or backslashes', () => {
    expect(isValidTag('a-b.c:d')).toBe(true);
    expect(isValidTag('😀')).toBe(false);
    expect(isValidTag('é1')).toBe(true);
    expect(isValidTag('a"b')).toBe(false);
    expect(isValidTag('a\\b')).toBe(false);
    expect(isValidTag('')).toBe(false);
  });
});

describe('fieldPlan', () => {
  it('applies tag names and skips', () => {
    const S = t.struct('S', [
      { name: 'A', type: t.int, tag: 'a' },
      { name: 'B', type: t.int, tag: '-' },
      { name: 'C', type: t.int, tag: '-,' },
      { name: 'D', type: t.int, tag: 'bad"name' },
      { name: 'E', type: t.int, exported: false },
    ]);
    expect(names(S)).toEqual(['a', '-', 'D']);
  });

  it('marks only scalar fields as quoted', () => {
    const S = t.struct('S', [
      { name: 'N', type: t.pointer(t.int64), tag: ',string' },
      { name: 'L', type: t.slice(t.int), tag: ',string' },
    ]);
    expect(fieldPlan(S).fields.map((f) => f.quoted)).toEqual([true, false]);
  });

  it('promotes embedded struct fields in declaration order', () => {
    const Inner = t.struct('Inner', [
      { name: 'X', type: t.int },
      { name: 'Y', type: t.int },
    ]);
    const Outer = t.struct('Outer', [
      { name: 'First', type: t.int },
      { name: 'Inner', type: t.pointer(Inner), embedded: true },
      { name: 'Last', type: t.int },
    ]);
    const plan = fieldPlan(Outer);
    expect(plan.fields.map((f) => f.name)).toEqual(['First', 'X', 'Y', 'Last']);
    expect(plan.byName.get('Y')?.path.map((s) => s.prop)).toEqual(['Inner', 'Y']);
  });

  it('drops names that collide at the same depth without a tag', () => {
    const A = t.struct('A', [{ name: 'S', type: t.string }]);
    const C = t.struct('C', [{ name: 'S', type: t.string }]);
    const Both = t.struct('Both', [
      { name: 'A', type: A, embedded: true },
      { name: 'C', type: C, embedded: true },
      { name: 'N', type: t.int },
    ]);
    expect(names(Both)).toEqual(['N']);
  });

  it('lets a tagged field win over an untagged one at the same depth', () => {
    const A = t.struct('A', [{ name: 'S', type: t.string }]);
    const D = t.struct('D', [{ name: 'XXX', type: t.string, tag: 'S' }]);
    const Y = t.struct('Y', [
      { name: 'A', type: A, embedded: true },
      { name: 'D', type: D, embedded: true },
    ]);
    const plan = fieldPlan(Y);
    expect(plan.fields.map((f) => f.name)).toEqual(['S']);
    expect(plan.fields[0]?.path.map((s) => s.prop)).toEqual(['D', 'XXX']);
  });

  it('indexes names case-insensitively, first field winning', () => {
    const S = t.struct('S', [
      { name: 'upper', type: t.string, tag: 'Key' },
      { name: 'lower', type: t.string, tag: 'key' },
    ]);
    expect(fieldPlan(S).byFoldedName.get('key')?.path[0]?.prop).toBe('upper');
  });

  it('is built once per descriptor', () => {
    const S = t.struct('S', [{ name: 'A', type: t.int }]);
    expect(fieldPlan(S)).toBe(fieldPlan(S));
  });
});
