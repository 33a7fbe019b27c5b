import { Router, Response } from 'express';
import { CommandExecutor } from '../../core/executor/CommandExecutor';
import { Command, QueryResult } from '../../types/database';

const STATUS_BY_CODE: Record<string, number> = {
  PARSE_ERROR: 400,
  TABLE_NOT_FOUND: 404,
  DUPLICATE_TABLE: 409,
  STORAGE_ERROR: 500,
  INTERNAL_ERROR: 500
};

export function statusFor(result: QueryResult): number {
  if (result.success) return 200;
  return STATUS_BY_CODE[result.error?.code ?? 'INTERNAL_ERROR'] ?? 400;
}

function send(res: Response, result: QueryResult): void {
  res.status(statusFor(result)).json(result);
}

/**
 * Routes under /api/db. Every route goes through the same executor as the
 * shell, so results, errors and select caching behave identically.
 */
export function createDatabaseRouter(executor: CommandExecutor): Router {
  const router = Router();

  // Run one command line
  router.post('/query', (req, res) => {
    const line: unknown = req.body?.command;
    if (typeof line !== 'string' || !line.trim()) {
      return res.status(400).json({
        success: false,
        message: 'Request body must contain a "command" string'
      });
    }

    const parsed = executor.parse(line);
    if (!parsed.ok) {
      return send(res, parsed.result);
    }
    if (parsed.command.kind === 'exit') {
      return res.status(400).json({
        success: false,
        command: 'exit',
        message: 'exit is only available in the interactive shell'
      });
    }

    send(res, executor.execute(parsed.command));
  });

  // List all tables
  router.get('/tables', (req, res) => {
    send(res, executor.execute({ kind: 'list_tables' }));
  });

  // Get table schema and record count
  router.get('/tables/:tableName', (req, res) => {
    const command: Command = { kind: 'info', table: req.params.tableName };
    send(res, executor.execute(command));
  });

  // Select all rows
  router.get('/tables/:tableName/rows', (req, res) => {
    const command: Command = { kind: 'select', table: req.params.tableName };
    send(res, executor.execute(command));
  });

  // Drop (delete) a table
  router.delete('/tables/:tableName', (req, res) => {
    const command: Command = { kind: 'drop_table', table: req.params.tableName };
    send(res, executor.execute(command));
  });

  return router;
}
