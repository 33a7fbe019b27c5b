import { describe, it, expect, beforeEach } from 'vitest';
import { Table } from '../src/core/database/Table';
import {
  ColumnCountMismatchError,
  ColumnNotFoundError,
  ImmutableColumnError,
  TypeMismatchError
} from '../src/core/errors';
import { bare, quoted, usersTable, where } from './helpers';

describe('Table', () => {
  let table: Table;

  beforeEach(() => {
    table = usersTable();
  });

  function seed(...people: Array<[string, number]>): void {
    for (const [name, age] of people) {
      table.insert([quoted(name), bare(String(age))]);
    }
  }

  describe('insert', () => {
    it('assigns IDs 1..N in insertion order', () => {
      seed(['Ann', 30], ['Bob', 41], ['Cid', 19]);
      expect(table.select().map(row => row.ID)).toEqual([1, 2, 3]);
      expect(table.select()[1]).toEqual({ ID: 2, name: 'Bob', age: 41 });
    });

    it('returns the stored row including its ID', () => {
      expect(table.insert([quoted('Ann'), bare('30')])).toEqual({ ID: 1, name: 'Ann', age: 30 });
    });

    it('reuses the highest ID after it is deleted', () => {
      seed(['Ann', 30], ['Bob', 41], ['Cid', 19]);
      table.delete(where('ID', bare('3')));
      expect(table.insert([quoted('Dee'), bare('50')]).ID).toBe(3);
    });

    it('continues from the remaining maximum after deleting a middle row', () => {
      seed(['Ann', 30], ['Bob', 41], ['Cid', 19]);
      table.delete(where('ID', bare('2')));
      expect(table.insert([quoted('Dee'), bare('50')]).ID).toBe(4);
    });

    it('starts again at 1 once the table is empty', () => {
      seed(['Ann', 30]);
      table.delete(where('ID', bare('1')));
      expect(table.insert([quoted('Bob'), bare('41')]).ID).toBe(1);
    });

    it('checks the value count before any value types', () => {
      expect(() => table.insert([bare('not-a-string')])).toThrow(ColumnCountMismatchError);
      expect(() => table.insert([quoted('a'), bare('1'), bare('2')])).toThrow(
        'Expected 2 values, got 3'
      );
    });

    it('leaves the table untouched when a value has the wrong type', () => {
      seed(['Ann', 30]);
      expect(() => table.insert([quoted('Bob'), quoted('41')])).toThrow(TypeMismatchError);
      expect(table.rowCount).toBe(1);
    });
  });

  describe('select', () => {
    beforeEach(() => seed(['John', 25], ['Jane', 31], ['Jim', 25]));

    it('returns every row in storage order without a filter', () => {
      expect(table.select().map(row => row.name)).toEqual(['John', 'Jane', 'Jim']);
    });

    it('returns rows whose value equals the typed literal', () => {
      expect(table.select(where('age', bare('25'))).map(row => row.ID)).toEqual([1, 3]);
      expect(table.select(where('name', quoted('Jane')))).toEqual([{ ID: 2, name: 'Jane', age: 31 }]);
    });

    it('returns an empty list when nothing matches', () => {
      expect(table.select(where('age', bare('99')))).toEqual([]);
    });

    it('rejects filters on unknown columns, even on an empty table', () => {
      expect(() => table.select(where('email', quoted('x')))).toThrow(ColumnNotFoundError);
      expect(() => usersTable().select(where('email', quoted('x')))).toThrow(
        'Column "email" does not exist in table "users"'
      );
    });

    it('does not compare across types', () => {
      expect(() => table.select(where('age', quoted('25')))).toThrow(TypeMismatchError);
    });

    it('hands out copies of rows', () => {
      const [first] = table.select();
      first.name = 'changed';
      expect(table.select()[0].name).toBe('John');
    });
  });

  describe('update', () => {
    beforeEach(() => seed(['John', 25], ['Jane', 25], ['Jim', 40]));

    it('updates every matching row and returns the count', () => {
      expect(table.update(where('age', bare('26')), where('age', bare('25')))).toBe(2);
      expect(table.select().map(row => row.age)).toEqual([26, 26, 40]);
    });

    it('returns 0 when nothing matches', () => {
      expect(table.update(where('age', bare('1')), where('name', quoted('Nobody')))).toBe(0);
    });

    it('refuses to change ID', () => {
      expect(() => table.update(where('ID', bare('9')), where('name', quoted('John')))).toThrow(
        ImmutableColumnError
      );
    });

    it('reports an unknown filter column before the ID check', () => {
      expect(() => table.update(where('ID', bare('9')), where('nope', bare('1')))).toThrow(
        ColumnNotFoundError
      );
    });

    it('validates the new value before touching any row', () => {
      expect(() => table.update(where('age', quoted('old')), where('name', quoted('John')))).toThrow(
        TypeMismatchError
      );
      expect(() => table.update(where('email', quoted('x')), where('name', quoted('John')))).toThrow(
        ColumnNotFoundError
      );
      expect(table.select().map(row => row.age)).toEqual([25, 25, 40]);
    });
  });

  describe('delete', () => {
    beforeEach(() => seed(['John', 25], ['Jane', 25], ['Jim', 40]));

    it('removes matching rows and keeps the order of the rest', () => {
      expect(table.delete(where('age', bare('25')))).toBe(2);
      expect(table.select()).toEqual([{ ID: 3, name: 'Jim', age: 40 }]);
    });

    it('treats no matches as zero deletions', () => {
      expect(table.delete(where('name', quoted('Nobody')))).toBe(0);
      expect(table.rowCount).toBe(3);
    });
  });

  it('converts to and from its document form', () => {
    seed(['John', 25]);
    const document = table.toDocument();
    expect(document).toEqual({
      name: 'users',
      schema: {
        columns: [
          { name: 'ID', type: 'int' },
          { name: 'name', type: 'str' },
          { name: 'age', type: 'int' }
        ]
      },
      rows: [{ ID: 1, name: 'John', age: 25 }]
    });
    expect(Table.fromDocument(document).toDocument()).toEqual(document);
  });

  it('lists only the user-supplied columns as data columns', () => {
    expect(table.dataColumns.map(col => col.name)).toEqual(['name', 'age']);
  });
});
