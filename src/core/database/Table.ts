import { Column } from './Column';
import {
  CellValue,
  ColumnDefinition,
  Condition,
  ID_COLUMN,
  Literal,
  RowData,
  TableDocument,
  TableSchema
} from '../../types/database';
import {
  ColumnCountMismatchError,
  ColumnNotFoundError,
  ImmutableColumnError
} from '../errors';

type RowPredicate = (row: RowData) => boolean;

/**
 * One table held in memory for the duration of a single command.
 * Every method validates fully before it touches `rows`, so a thrown
 * error leaves the table exactly as it was.
 */
export class Table {
  private rows: RowData[];

  constructor(
    public readonly name: string,
    public readonly columns: Column[],
    rows: RowData[] = []
  ) {
    this.rows = rows.map(row => ({ ...row }));
  }

  static fromDocument(document: TableDocument): Table {
    const columns = document.schema.columns.map(col => new Column(col.name, col.type));
    return new Table(document.name, columns, document.rows);
  }

  // Columns the user supplies values for, in declaration order
  get dataColumns(): Column[] {
    return this.columns.filter(column => column.name !== ID_COLUMN);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  getColumn(name: string): Column {
    const column = this.columns.find(col => col.name === name);
    if (!column) {
      throw new ColumnNotFoundError(this.name, name);
    }
    return column;
  }

  // max(existing IDs) + 1, so freeing the highest ID makes it available again
  nextId(): number {
    let max = 0;
    for (const row of this.rows) {
      const id = row[ID_COLUMN];
      if (typeof id === 'number' && id > max) {
        max = id;
      }
    }
    return max + 1;
  }

  insert(values: Literal[]): RowData {
    const columns = this.dataColumns;
    if (values.length !== columns.length) {
      throw new ColumnCountMismatchError(columns.length, values.length);
    }

    const row: RowData = { [ID_COLUMN]: this.nextId() };
    columns.forEach((column, i) => {
      row[column.name] = column.coerce(values[i]);
    });

    this.rows.push(row);
    return { ...row };
  }

  select(where?: Condition): RowData[] {
    if (!where) {
      return this.rows.map(row => ({ ...row }));
    }

    return this.rows.filter(this.matcher(where)).map(row => ({ ...row }));
  }

  update(set: Condition, where: Condition): number {
    const target = this.getColumn(set.column);
    this.getColumn(where.column);
    if (target.name === ID_COLUMN) {
      throw new ImmutableColumnError(target.name);
    }
    const value = target.coerce(set.value);
    const matches = this.matcher(where);

    let affected = 0;
    this.rows = this.rows.map(row => {
      if (!matches(row)) {
        return row;
      }
      affected++;
      return { ...row, [target.name]: value };
    });

    return affected;
  }

  delete(where: Condition): number {
    const matches = this.matcher(where);
    const before = this.rows.length;
    this.rows = this.rows.filter(row => !matches(row));
    return before - this.rows.length;
  }

  getSchema(): TableSchema {
    return {
      name: this.name,
      columns: this.columns.map((col): ColumnDefinition => col.toJSON())
    };
  }

  toDocument(): TableDocument {
    return {
      name: this.name,
      schema: { columns: this.getSchema().columns },
      rows: this.rows.map(row => ({ ...row }))
    };
  }

  // Resolves and coerces the filter up front; comparison is strict equality
  private matcher(where: Condition): RowPredicate {
    const column = this.getColumn(where.column);
    const expected: CellValue = column.coerce(where.value);
    return row => row[column.name] === expected;
  }
}
