import { performance } from 'node:perf_hooks';
import { Database } from '../database/Database';
import { parseCommand } from '../parser/CommandParser';
import { DatabaseError } from '../errors';
import { HELP_TEXT } from './help';
import { SelectCache } from './SelectCache';
import { Command, CommandKind, Condition, QueryResult } from '../../types/database';

export interface ExecutorOptions {
  /** Memoize select results until the table is written (default true) */
  cacheSelects?: boolean;
}

export type ParseOutcome =
  | { ok: true; command: Command }
  | { ok: false; result: QueryResult };

const MUTATING: ReadonlySet<CommandKind> = new Set<CommandKind>([
  'create_table',
  'drop_table',
  'insert',
  'update',
  'delete'
]);

/**
 * Runs commands against a Database and reports every outcome as a
 * QueryResult. This is the recovery boundary: nothing thrown by the
 * parser, engine or storage escapes `execute`.
 */
export class CommandExecutor {
  private readonly cache = new SelectCache();
  private readonly cacheSelects: boolean;

  constructor(
    private readonly db: Database,
    options: ExecutorOptions = {}
  ) {
    this.cacheSelects = options.cacheSelects ?? true;
  }

  get cachedSelects(): number {
    return this.cache.size;
  }

  hasTable(tableName: string): boolean {
    return this.db.hasTable(tableName);
  }

  // Lets a caller inspect the command (to confirm or to exit) before running it
  parse(line: string): ParseOutcome {
    try {
      return { ok: true, command: parseCommand(line.trim()) };
    } catch (error) {
      return { ok: false, result: this.failure(error) };
    }
  }

  execute(input: string | Command): QueryResult {
    const started = performance.now();
    let command: Command | undefined;
    let result: QueryResult;

    try {
      command = typeof input === 'string' ? parseCommand(input.trim()) : input;
      result = this.run(command);
    } catch (error) {
      result = this.failure(error, command?.kind);
    } finally {
      if (command && 'table' in command && MUTATING.has(command.kind)) {
        this.cache.invalidate(command.table);
      }
    }

    result.executionTime = performance.now() - started;
    return result;
  }

  private run(command: Command): QueryResult {
    switch (command.kind) {
      case 'create_table': {
        const schema = this.db.createTable(command.table, command.columns);
        const columns = schema.columns.map(col => `${col.name}:${col.type}`).join(', ');
        return {
          success: true,
          command: command.kind,
          table: command.table,
          columns: schema.columns,
          message: `Table "${command.table}" created successfully with columns: ${columns}`
        };
      }
      case 'list_tables':
        return { success: true, command: command.kind, tables: this.db.listTables() };
      case 'drop_table':
        this.db.dropTable(command.table);
        return {
          success: true,
          command: command.kind,
          table: command.table,
          message: `Table "${command.table}" deleted successfully.`
        };
      case 'info': {
        const info = this.db.info(command.table);
        return { success: true, command: command.kind, table: command.table, info, columns: info.columns };
      }
      case 'insert': {
        const row = this.db.insert(command.table, command.values);
        const id = row.ID;
        return {
          success: true,
          command: command.kind,
          table: command.table,
          data: [row],
          insertedId: typeof id === 'number' ? id : undefined,
          rowsAffected: 1,
          message: `Record with ID=${id} added to table "${command.table}" successfully.`
        };
      }
      case 'select':
        return this.select(command.table, command.where);
      case 'update': {
        const count = this.db.update(command.table, command.set, command.where);
        return {
          success: true,
          command: command.kind,
          table: command.table,
          rowsAffected: count,
          message: `${count} record(s) updated in table "${command.table}".`
        };
      }
      case 'delete': {
        const count = this.db.delete(command.table, command.where);
        return {
          success: true,
          command: command.kind,
          table: command.table,
          rowsAffected: count,
          message: `${count} record(s) deleted from table "${command.table}".`
        };
      }
      case 'help':
        return { success: true, command: command.kind, message: HELP_TEXT };
      case 'exit':
        return { success: true, command: command.kind, message: 'Goodbye!' };
    }
  }

  private select(tableName: string, where?: Condition): QueryResult {
    const cached = this.cacheSelects ? this.cache.get(tableName, where) : undefined;
    if (cached) {
      return { success: true, command: 'select', table: tableName, data: cached.rows, columns: cached.columns, cached: true };
    }

    const table = this.db.getTable(tableName);
    const result = { rows: table.select(where), columns: table.getSchema().columns };
    if (this.cacheSelects) {
      this.cache.set(tableName, where, result);
    }
    return { success: true, command: 'select', table: tableName, data: result.rows, columns: result.columns, cached: false };
  }

  private failure(error: unknown, command?: CommandKind): QueryResult {
    if (error instanceof DatabaseError) {
      return {
        success: false,
        command,
        error: { code: error.code, message: error.message },
        message: error.message
      };
    }

    console.error('❌ Unexpected error while executing command:', error);
    const message = error instanceof Error ? error.message : String(error);
    return {
      success: false,
      command,
      error: { code: 'INTERNAL_ERROR', message },
      message: `Unexpected error occurred: ${message}`
    };
  }
}
