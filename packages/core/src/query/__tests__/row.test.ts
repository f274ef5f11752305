import { describe, it, expect } from 'vitest';

import { findRowEntry, splitRow, toRowEntries } from '../row';

describe('row helpers', () => {
  it('should read objects in key order', () => {
    expect(toRowEntries({ name: 'Nano', age: 33 })).toEqual([
      ['name', 'Nano'],
      ['age', 33],
    ]);
  });

  it('should copy entry lists', () => {
    const entries = [['name', 'Nano']] as const;
    const result = toRowEntries(entries);

    expect(result).toEqual([['name', 'Nano']]);
    expect(result).not.toBe(entries);
  });

  it('should split a row into parallel columns and values', () => {
    expect(splitRow({ name: 'Nano', age: 33, active: false })).toEqual({
      columns: ['name', 'age', 'active'],
      values: ['Nano', 33, false],
    });
  });

  it('should find an entry by column name', () => {
    expect(findRowEntry({ id: 7, name: 'Nano' }, 'id')).toEqual(['id', 7]);
    expect(findRowEntry({ name: 'Nano' }, 'id')).toBeUndefined();
  });
});
