import { describe, expect, it } from 'vitest';

import { MissingColumnError, TemplateFieldError } from '../errors.js';
import { Pipeline } from '../pipeline.js';

import { normalizeWith, record } from './test-utils.js';

describe('record rules', () => {
  const abc = () =>
    record([
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);

  describe('orderColumns', () => {
    it('should place named columns first and keep the rest in order', () => {
      expect(normalizeWith(new Pipeline().orderColumns(['b', 'a']), abc())).toEqual([
        ['b', 2],
        ['a', 1],
        ['c', 3],
      ]);
    });

    it('should drop unnamed columns when ignoreMissing is set', () => {
      expect(normalizeWith(new Pipeline().orderColumns(['b', 'a'], { ignoreMissing: true }), abc())).toEqual([
        ['b', 2],
        ['a', 1],
      ]);
    });

    it('should skip names the record does not have', () => {
      expect(normalizeWith(new Pipeline().orderColumns(['z', 'c']), abc())).toEqual([
        ['c', 3],
        ['a', 1],
        ['b', 2],
      ]);
    });
  });

  describe('renameColumns', () => {
    it('should rename in place', () => {
      const input = record([
        ['a', 1],
        ['b', 2],
      ]);

      expect(normalizeWith(new Pipeline().renameColumns({ a: 'x' }), input)).toEqual([
        ['x', 1],
        ['b', 2],
      ]);
    });

    it('should keep integer-like names where they are when given as entries', () => {
      const input = record([
        ['name', 'Ada'],
        ['2023', 10],
      ]);

      expect(normalizeWith(new Pipeline().renameColumns([['2023', '2024']]), input)).toEqual([
        ['name', 'Ada'],
        ['2024', 10],
      ]);
    });
  });

  describe('removeColumns', () => {
    it('should delete present columns and ignore absent ones', () => {
      expect(normalizeWith(new Pipeline().removeColumns(['b', 'zzz']), abc())).toEqual([
        ['a', 1],
        ['c', 3],
      ]);
    });
  });

  describe('addColumns', () => {
    it('should add computed, templated and literal columns after the existing ones', () => {
      const pipeline = new Pipeline().addColumns([
        ['a', 99],
        ['sum', (row) => Number(row.get('a')) + Number(row.get('b'))],
        ['label', '{a}-{b}/{sum}'],
        ['flag', true],
      ]);
      const input = record([
        ['a', 1],
        ['b', 2],
      ]);

      expect(normalizeWith(pipeline, input)).toEqual([
        ['a', 1],
        ['b', 2],
        ['sum', 3],
        ['label', '1-2/3'],
        ['flag', true],
      ]);
    });

    it('should fail when a template names a missing column', () => {
      const pipeline = new Pipeline().addColumns({ label: '{missing}' });

      expect(() => normalizeWith(pipeline, abc())).toThrow(MissingColumnError);
      expect(() => normalizeWith(pipeline, abc())).toThrow('Column "missing" is not present in the record');
    });

    it('should reject positional template fields', () => {
      const pipeline = new Pipeline().addColumns({ label: '{0}' });

      expect(() => normalizeWith(pipeline, abc())).toThrow(TemplateFieldError);
    });
  });
});

describe('normalizeRecord', () => {
  it('should reproduce the record when no rules are registered', () => {
    const input = record([
      ['a', ' x '],
      ['b', null],
    ]);

    expect(normalizeWith(new Pipeline(), input)).toEqual([
      ['a', ' x '],
      ['b', null],
    ]);
  });

  it('should run every value rule before any record rule', () => {
    const pipeline = new Pipeline().renameColumns({ name: 'full_name' }).upper({ columnFilter: '^name$' });

    expect(normalizeWith(pipeline, record([['name', 'ada']]))).toEqual([['full_name', 'ADA']]);
  });

  it('should let later value rules see earlier results', () => {
    const pipeline = new Pipeline()
      .upper({ columnFilter: '^a$' })
      .lower({ callableFilter: (row) => row.get('a') === 'X', columnFilter: '^b$' });
    const input = record([
      ['a', 'x'],
      ['b', 'Y'],
    ]);

    expect(normalizeWith(pipeline, input)).toEqual([
      ['a', 'X'],
      ['b', 'y'],
    ]);
  });

  it('should show each column the record as left by the columns before it', () => {
    const seen: [string, string][] = [];
    const pipeline = new Pipeline().upper({
      callableFilter: (row, column) => {
        seen.push([column, [...row.values()].join(',')]);
        return true;
      },
    });

    normalizeWith(
      pipeline,
      record([
        ['a', 'x'],
        ['b', 'y'],
      ])
    );

    expect(seen).toEqual([
      ['a', 'x,y'],
      ['b', 'X,y'],
    ]);
  });

  it('should not modify the input record', () => {
    const input = record([['a', 'x']]);

    normalizeWith(new Pipeline().upper().renameColumns({ a: 'b' }), input);

    expect([...input.entries()]).toEqual([['a', 'x']]);
  });
});
