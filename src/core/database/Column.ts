import { CellValue, ColumnDefinition, DATA_TYPES, DataType, Literal } from '../../types/database';
import { TypeMismatchError } from '../errors';

const INTEGER_PATTERN = /^-?\d+$/;

export function isDataType(tag: string): tag is DataType {
  return DATA_TYPES.some(type => type === tag);
}

// How a literal looks when echoed back in an error message
export function formatLiteral(literal: Literal): string {
  return literal.quoted ? JSON.stringify(literal.text) : literal.text;
}

export class Column {
  constructor(
    public readonly name: string,
    public readonly type: DataType
  ) {}

  // Checks a stored JSON value, e.g. one read back from a table file
  validate(value: unknown): value is CellValue {
    switch (this.type) {
      case 'int':
        return typeof value === 'number' && Number.isSafeInteger(value);
      case 'str':
        return typeof value === 'string';
      case 'bool':
        return typeof value === 'boolean';
    }
  }

  // Turns command-line text into a typed value. No cross-type coercion:
  // "25" is a string, 25 is an int, and only bare true/false are booleans.
  coerce(literal: Literal): CellValue {
    switch (this.type) {
      case 'int': {
        if (!literal.quoted && INTEGER_PATTERN.test(literal.text)) {
          const value = Number(literal.text);
          if (Number.isSafeInteger(value)) {
            return value;
          }
        }
        break;
      }
      case 'str':
        if (literal.quoted) {
          return literal.text;
        }
        break;
      case 'bool':
        if (!literal.quoted && (literal.text === 'true' || literal.text === 'false')) {
          return literal.text === 'true';
        }
        break;
    }

    throw new TypeMismatchError(this.name, this.type, formatLiteral(literal));
  }

  toJSON(): ColumnDefinition {
    return { name: this.name, type: this.type };
  }
}
