/**
 * One JSON document per table: <dataDir>/<table>.json.
 *
 * All access is synchronous and whole-file. A save writes a sibling
 * temp file and renames it over the old one.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  unlinkSync,
  writeFileSync
} from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { Column } from '../database/Column';
import { ID_COLUMN, TableDocument } from '../../types/database';
import { StorageError, TableNotFoundError } from '../errors';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Matches the pattern but would write through the prototype setter when used as a row key
const RESERVED_NAMES: ReadonlySet<string> = new Set(['__proto__']);

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name) && !RESERVED_NAMES.has(name);
}

const FILE_EXTENSION = '.json';

const identifierSchema = z.string().refine(isIdentifier, { message: 'invalid identifier' });

const columnSchema = z.object({
  name: identifierSchema,
  type: z.enum(['int', 'str', 'bool'])
});

const cellSchema = z.union([z.number(), z.string(), z.boolean()]);

const documentSchema = z
  .object({
    name: identifierSchema,
    schema: z.object({ columns: z.array(columnSchema).min(1) }),
    rows: z.array(z.record(cellSchema))
  })
  .superRefine((doc, ctx) => {
    const [first] = doc.schema.columns;
    if (!first || first.name !== ID_COLUMN || first.type !== 'int') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `first column must be ${ID_COLUMN}:int` });
    }

    const columns = new Map(doc.schema.columns.map(col => [col.name, new Column(col.name, col.type)]));
    if (columns.size !== doc.schema.columns.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'duplicate column names' });
    }

    doc.rows.forEach((row, i) => {
      const keys = Object.keys(row);
      const matches =
        keys.length === columns.size &&
        keys.every(key => columns.get(key)?.validate(row[key]) ?? false);
      if (!matches) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', i],
          message: `row does not match columns ${[...columns.keys()].join(', ')}`
        });
      }
    });
  });

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TableStorage {
  constructor(public readonly dataDir: string) {}

  filePath(table: string): string {
    if (!isIdentifier(table)) {
      throw new StorageError(join(this.dataDir, table), `Invalid table name "${table}"`);
    }
    return join(this.dataDir, `${table}${FILE_EXTENSION}`);
  }

  exists(table: string): boolean {
    return isIdentifier(table) && existsSync(this.filePath(table));
  }

  list(): string[] {
    if (!existsSync(this.dataDir)) return [];

    const files = this.io(this.dataDir, 'list', () => readdirSync(this.dataDir));
    return files
      .filter(file => file.endsWith(FILE_EXTENSION))
      .map(file => file.slice(0, -FILE_EXTENSION.length))
      .filter(isIdentifier)
      .sort();
  }

  load(table: string): TableDocument {
    if (!this.exists(table)) {
      throw new TableNotFoundError(table);
    }
    const path = this.filePath(table);

    const raw = this.io(path, 'read', () => readFileSync(path, 'utf-8'));

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(path, `Table file ${path} is not valid JSON: ${errorMessage(error)}`, error);
    }

    const parsed = documentSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new StorageError(path, `Table file ${path} is invalid${where}: ${issue.message}`, parsed.error);
    }
    if (parsed.data.name !== table) {
      throw new StorageError(path, `Table file ${path} holds table "${parsed.data.name}"`);
    }

    return parsed.data;
  }

  save(document: TableDocument): void {
    const path = this.filePath(document.name);
    const tempPath = `${path}.tmp`;

    this.io(path, 'write', () => {
      mkdirSync(this.dataDir, { recursive: true });
      try {
        writeFileSync(tempPath, JSON.stringify(document, null, 2), 'utf-8');
        renameSync(tempPath, path);
      } catch (error) {
        rmSync(tempPath, { force: true });
        throw error;
      }
    });
  }

  remove(table: string): void {
    if (!this.exists(table)) {
      throw new TableNotFoundError(table);
    }
    const path = this.filePath(table);
    this.io(path, 'delete', () => unlinkSync(path));
  }

  private io<T>(path: string, action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(path, `Failed to ${action} ${path}: ${errorMessage(error)}`, error);
    }
  }
}
