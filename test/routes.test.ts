/**
 * HTTP front end, exercised in process through supertest.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { statusFor } from '../src/api/routes/database';
import { CommandExecutor } from '../src/core/executor/CommandExecutor';
import { Database } from '../src/core/database/Database';
import { TableStorage } from '../src/core/storage/TableStorage';
import { createTempDir, removeDir } from './helpers';

describe('database routes', () => {
  let dir: string;
  let app: Express;

  beforeEach(() => {
    dir = createTempDir();
    const executor = new CommandExecutor(new Database(new TableStorage(dir)));
    app = createApp(executor, { logRequests: false });
  });

  afterEach(() => {
    removeDir(dir);
  });

  function query(command: string) {
    return request(app).post('/api/db/query').send({ command });
  }

  it('runs commands posted to /api/db/query', async () => {
    const created = await query('create_table users name:str age:int');
    expect(created.status).toBe(200);
    expect(created.body.success).toBe(true);

    const inserted = await query('insert into users values ("John", 25)');
    expect(inserted.status).toBe(200);
    expect(inserted.body.insertedId).toBe(1);

    const selected = await query('select from users where age = 25');
    expect(selected.body.data).toEqual([{ ID: 1, name: 'John', age: 25 }]);
  });

  it('maps error codes to HTTP statuses', async () => {
    await query('create_table users name:str');

    const duplicate = await query('create_table users');
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.error.code).toBe('DUPLICATE_TABLE');

    const missing = await query('info ghost');
    expect(missing.status).toBe(404);

    const malformed = await query('select users');
    expect(malformed.status).toBe(400);
    expect(malformed.body.error.code).toBe('PARSE_ERROR');

    const wrongType = await query('insert into users values (1)');
    expect(wrongType.status).toBe(400);
    expect(wrongType.body.error.code).toBe('TYPE_MISMATCH');
  });

  it('requires a command string and refuses exit', async () => {
    const empty = await request(app).post('/api/db/query').send({});
    expect(empty.status).toBe(400);
    expect(empty.body.message).toBe('Request body must contain a "command" string');

    const exit = await query('exit');
    expect(exit.status).toBe(400);
    expect(exit.body.message).toBe('exit is only available in the interactive shell');
  });

  it('exposes tables as resources', async () => {
    await query('create_table users name:str');
    await query('insert into users values ("Ann")');

    const list = await request(app).get('/api/db/tables');
    expect(list.body.tables).toEqual(['users']);

    const info = await request(app).get('/api/db/tables/users');
    expect(info.status).toBe(200);
    expect(info.body.info).toEqual({
      name: 'users',
      columns: [
        { name: 'ID', type: 'int' },
        { name: 'name', type: 'str' }
      ],
      rowCount: 1
    });

    const rows = await request(app).get('/api/db/tables/users/rows');
    expect(rows.body.data).toEqual([{ ID: 1, name: 'Ann' }]);

    const dropped = await request(app).delete('/api/db/tables/users');
    expect(dropped.status).toBe(200);
    expect(dropped.body.message).toBe('Table "users" deleted successfully.');

    const gone = await request(app).get('/api/db/tables/users');
    expect(gone.status).toBe(404);
    expect(gone.body.error.code).toBe('TABLE_NOT_FOUND');
  });

  it('answers health checks and unknown routes', async () => {
    const health = await request(app).get('/health');
    expect(health.status).toBe(200);
    expect(health.body.status).toBe('ok');

    const unknown = await request(app).get('/api/db/nowhere/at/all');
    expect(unknown.status).toBe(404);
    expect(unknown.body.message).toBe('Route /api/db/nowhere/at/all not found');
  });

  it('rejects malformed JSON bodies with 400', async () => {
    const response = await request(app)
      .post('/api/db/query')
      .set('Content-Type', 'application/json')
      .send('{"command": ');
    expect(response.status).toBe(400);
    expect(response.body.success).toBe(false);
  });
});

describe('statusFor', () => {
  it('uses 500 for storage and internal faults and 400 for other errors', () => {
    expect(statusFor({ success: true })).toBe(200);
    expect(statusFor({ success: false, error: { code: 'STORAGE_ERROR', message: '' } })).toBe(500);
    expect(statusFor({ success: false, error: { code: 'INTERNAL_ERROR', message: '' } })).toBe(500);
    expect(statusFor({ success: false, error: { code: 'COLUMN_NOT_FOUND', message: '' } })).toBe(400);
  });
});
