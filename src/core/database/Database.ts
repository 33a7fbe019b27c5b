import { Table } from './Table';
import { Column, isDataType } from './Column';
import { TableStorage } from '../storage/TableStorage';
import {
  ColumnSpec,
  Condition,
  ID_COLUMN,
  Literal,
  RowData,
  TableInfo,
  TableSchema
} from '../../types/database';
import { DuplicateColumnError, DuplicateTableError, InvalidTypeError } from '../errors';

/**
 * Table-level operations over a data directory. Nothing is kept between
 * calls: every operation loads its table, changes it in memory and writes
 * it straight back.
 */
export class Database {
  constructor(private readonly storage: TableStorage) {}

  hasTable(tableName: string): boolean {
    return this.storage.exists(tableName);
  }

  createTable(tableName: string, specs: ColumnSpec[]): TableSchema {
    if (this.hasTable(tableName)) {
      throw new DuplicateTableError(tableName);
    }

    const columns: Column[] = [new Column(ID_COLUMN, 'int')];
    const seen = new Set<string>([ID_COLUMN]);

    for (const spec of specs) {
      if (seen.has(spec.name)) {
        throw new DuplicateColumnError(spec.name);
      }
      if (!isDataType(spec.type)) {
        throw new InvalidTypeError(spec.name, spec.type);
      }
      seen.add(spec.name);
      columns.push(new Column(spec.name, spec.type));
    }

    const table = new Table(tableName, columns);
    this.storage.save(table.toDocument());
    return table.getSchema();
  }

  dropTable(tableName: string): void {
    this.storage.remove(tableName);
  }

  listTables(): string[] {
    return this.storage.list();
  }

  getTable(tableName: string): Table {
    return Table.fromDocument(this.storage.load(tableName));
  }

  info(tableName: string): TableInfo {
    const table = this.getTable(tableName);
    return { ...table.getSchema(), rowCount: table.rowCount };
  }

  insert(tableName: string, values: Literal[]): RowData {
    return this.mutate(tableName, table => table.insert(values));
  }

  select(tableName: string, where?: Condition): RowData[] {
    return this.getTable(tableName).select(where);
  }

  update(tableName: string, set: Condition, where: Condition): number {
    return this.mutate(tableName, table => table.update(set, where));
  }

  delete(tableName: string, where: Condition): number {
    return this.mutate(tableName, table => table.delete(where));
  }

  // Persists only when the change ran to completion
  private mutate<T>(tableName: string, change: (table: Table) => T): T {
    const table = this.getTable(tableName);
    const result = change(table);
    this.storage.save(table.toDocument());
    return result;
  }
}
