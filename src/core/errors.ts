import { DataType } from '../types/database';

/**
 * Base error for everything the parser, engine and storage layer raise.
 * The executor turns these into failed results; anything else is a bug.
 */
export class DatabaseError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Input line does not match any command shape.
 */
export class ParseError extends DatabaseError {
  constructor(
    public readonly input: string,
    reason: string
  ) {
    super('PARSE_ERROR', `Cannot parse "${input}": ${reason}`);
    this.name = 'ParseError';
  }
}

export class TableNotFoundError extends DatabaseError {
  constructor(public readonly table: string) {
    super('TABLE_NOT_FOUND', `Table "${table}" does not exist`);
    this.name = 'TableNotFoundError';
  }
}

export class DuplicateTableError extends DatabaseError {
  constructor(public readonly table: string) {
    super('DUPLICATE_TABLE', `Table "${table}" already exists`);
    this.name = 'DuplicateTableError';
  }
}

/**
 * Column declared twice, or declared with the reserved ID name.
 */
export class DuplicateColumnError extends DatabaseError {
  constructor(public readonly column: string) {
    super('DUPLICATE_COLUMN', `Column "${column}" is already defined`);
    this.name = 'DuplicateColumnError';
  }
}

export class InvalidTypeError extends DatabaseError {
  constructor(
    public readonly column: string,
    public readonly type: string
  ) {
    super(
      'INVALID_TYPE',
      `Invalid type "${type}" for column "${column}". Allowed types: int, str, bool`
    );
    this.name = 'InvalidTypeError';
  }
}

export class ColumnCountMismatchError extends DatabaseError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super('COLUMN_COUNT_MISMATCH', `Expected ${expected} values, got ${actual}`);
    this.name = 'ColumnCountMismatchError';
  }
}

export class ColumnNotFoundError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly column: string
  ) {
    super('COLUMN_NOT_FOUND', `Column "${column}" does not exist in table "${table}"`);
    this.name = 'ColumnNotFoundError';
  }
}

/**
 * Literal does not fit the declared type of its column.
 */
export class TypeMismatchError extends DatabaseError {
  constructor(
    public readonly column: string,
    public readonly expected: DataType,
    public readonly value: string
  ) {
    super('TYPE_MISMATCH', `Invalid value ${value} for column "${column}" (expected ${expected})`);
    this.name = 'TypeMismatchError';
  }
}

export class ImmutableColumnError extends DatabaseError {
  constructor(public readonly column: string) {
    super('IMMUTABLE_COLUMN', `Column "${column}" cannot be updated`);
    this.name = 'ImmutableColumnError';
  }
}

/**
 * Table file could not be read, parsed or written.
 */
export class StorageError extends DatabaseError {
  constructor(
    public readonly path: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super('STORAGE_ERROR', message);
    this.name = 'StorageError';
  }
}
