import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../errors';
import { buildInsert, buildLookup } from '../query-builder';

describe('buildLookup', () => {
  it('should build one equality term per column in row order', () => {
    const { sql, args } = buildLookup('people', { name: 'Nano', age: 33 });

    expect(sql).toBe('SELECT * FROM people WHERE name = $1 AND age = $2');
    expect(args).toEqual(['Nano', 33]);
  });

  it('should follow the order of row entries', () => {
    const { sql, args } = buildLookup('people', [
      ['age', 33],
      ['name', 'Nano'],
      ['active', true],
    ]);

    expect(sql).toBe('SELECT * FROM people WHERE age = $1 AND name = $2 AND active = $3');
    expect(args).toEqual([33, 'Nano', true]);
  });

  it('should keep null values as arguments', () => {
    const { sql, args } = buildLookup('people', { nickname: null });

    expect(sql).toBe('SELECT * FROM people WHERE nickname = $1');
    expect(args).toEqual([null]);
  });

  it('should accept schema-qualified table names', () => {
    const { sql } = buildLookup('crm.people', { name: 'Nano' });
    expect(sql).toBe('SELECT * FROM crm.people WHERE name = $1');
  });

  it('should reject an empty row', () => {
    expect(() => buildLookup('people', {})).toThrow(ValidationError);
    expect(() => buildLookup('people', [])).toThrow('Cannot build a lookup from an empty row');
  });

  it('should reject malformed identifiers', () => {
    expect(() => buildLookup('people; DROP TABLE people', { name: 'Nano' })).toThrow(
      ValidationError,
    );
    expect(() => buildLookup('people', { 'name = name OR 1': 1 })).toThrow(
      'Invalid column name "name = name OR 1"',
    );
  });
});

describe('buildInsert', () => {
  it('should build a single row insert', () => {
    const { sql, args } = buildInsert('people', ['name', 'age'], [['Nano', 33]]);

    expect(sql).toBe('INSERT INTO people (name, age) VALUES ($1, $2)');
    expect(args).toEqual(['Nano', 33]);
  });

  it('should number placeholders across rows without reuse', () => {
    const { sql, args } = buildInsert(
      'people',
      ['name', 'age'],
      [
        ['Nano', 33],
        ['Ada', 36],
        ['Linus', 28],
      ],
    );

    expect(sql).toBe(
      'INSERT INTO people (name, age) VALUES ($1, $2), ($3, $4), ($5, $6)',
    );
    expect(args).toEqual(['Nano', 33, 'Ada', 36, 'Linus', 28]);
  });

  it('should give row i the placeholders (i-1)*N+1 to i*N', () => {
    const columns = ['a', 'b', 'c'];
    const tuples = [
      [1, 2, 3],
      [4, 5, 6],
    ];

    const { sql, args } = buildInsert('t', columns, tuples);

    expect(sql).toBe('INSERT INTO t (a, b, c) VALUES ($1, $2, $3), ($4, $5, $6)');
    expect(args).toHaveLength(6);
  });

  it('should append ON CONFLICT before RETURNING', () => {
    const { sql } = buildInsert('people', ['name'], [['Nano'], ['Ada']], {
      onConflict: 'DO NOTHING',
      returning: 'id',
    });

    expect(sql).toBe(
      'INSERT INTO people (name) VALUES ($1), ($2) ON CONFLICT DO NOTHING RETURNING id',
    );
  });

  it('should pass conflict targets through', () => {
    const { sql } = buildInsert('people', ['email'], [['nano@example.com']], {
      onConflict: '(email) DO NOTHING',
    });

    expect(sql).toBe('INSERT INTO people (email) VALUES ($1) ON CONFLICT (email) DO NOTHING');
  });

  it('should accept RETURNING *', () => {
    const { sql } = buildInsert('people', ['name'], [['Nano']], { returning: '*' });
    expect(sql).toBe('INSERT INTO people (name) VALUES ($1) RETURNING *');
  });

  it('should reject a tuple whose length differs from the column count', () => {
    expect(() =>
      buildInsert(
        'people',
        ['name', 'age'],
        [
          ['Nano', 33],
          ['Ada'],
        ],
      ),
    ).toThrow('Row 2 has 1 values but 2 columns were given');
  });

  it('should reject missing columns or rows', () => {
    expect(() => buildInsert('people', [], [[]])).toThrow('Insert requires at least one column');
    expect(() => buildInsert('people', ['name'], [])).toThrow(
      'Insert requires at least one row of values',
    );
  });

  it('should reject an empty conflict clause', () => {
    expect(() => buildInsert('people', ['name'], [['Nano']], { onConflict: '  ' })).toThrow(
      'Conflict clause must not be empty',
    );
  });

  it('should reject a malformed RETURNING column', () => {
    expect(() => buildInsert('people', ['name'], [['Nano']], { returning: 'id, name' })).toThrow(
      ValidationError,
    );
  });
});
