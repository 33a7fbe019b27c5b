import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Column } from '../src/core/database/Column';
import { Table } from '../src/core/database/Table';
import { Condition, Literal } from '../src/types/database';

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'jsontable-test-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Unquoted literal, as typed for ints and bools */
export function bare(text: string): Literal {
  return { text, quoted: false };
}

/** Quoted literal, as typed for strings */
export function quoted(text: string): Literal {
  return { text, quoted: true };
}

export function where(column: string, value: Literal): Condition {
  return { column, value };
}

export function usersTable(): Table {
  return new Table('users', [
    new Column('ID', 'int'),
    new Column('name', 'str'),
    new Column('age', 'int')
  ]);
}
