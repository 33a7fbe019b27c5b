export type DataType = 'int' | 'str' | 'bool';

export const DATA_TYPES: readonly DataType[] = ['int', 'str', 'bool'];

export const ID_COLUMN = 'ID';

export type CellValue = number | string | boolean;

export interface ColumnDefinition {
  name: string;
  type: DataType;
}

export interface TableSchema {
  name: string;
  columns: ColumnDefinition[];
}

export interface TableInfo extends TableSchema {
  rowCount: number;
}

export interface RowData {
  [column: string]: CellValue;
}

// Shape of <dataDir>/<table>.json
export interface TableDocument {
  name: string;
  schema: {
    columns: ColumnDefinition[];
  };
  rows: RowData[];
}

// A value as typed on the command line, before it meets a column type
export interface Literal {
  text: string;
  quoted: boolean;
}

// Column spec as written in create_table; the type tag is checked by the engine
export interface ColumnSpec {
  name: string;
  type: string;
}

export interface Condition {
  column: string;
  value: Literal;
}

export type Command =
  | { kind: 'create_table'; table: string; columns: ColumnSpec[] }
  | { kind: 'list_tables' }
  | { kind: 'drop_table'; table: string }
  | { kind: 'info'; table: string }
  | { kind: 'insert'; table: string; values: Literal[] }
  | { kind: 'select'; table: string; where?: Condition }
  | { kind: 'update'; table: string; set: Condition; where: Condition }
  | { kind: 'delete'; table: string; where: Condition }
  | { kind: 'help' }
  | { kind: 'exit' };

export type CommandKind = Command['kind'];

export interface QueryError {
  code: string;
  message: string;
}

export interface QueryResult {
  success: boolean;
  command?: CommandKind;
  table?: string;
  data?: RowData[];
  columns?: ColumnDefinition[];
  tables?: string[];
  info?: TableInfo;
  insertedId?: number;
  rowsAffected?: number;
  message?: string;
  error?: QueryError;
  executionTime?: number;
  cached?: boolean;
}
