export { Database } from './core/database/Database';
export { Table } from './core/database/Table';
export { Column, isDataType } from './core/database/Column';
export { TableStorage } from './core/storage/TableStorage';
export { CommandParser, parseCommand } from './core/parser/CommandParser';
export { tokenize } from './core/parser/tokenizer';
export type { Token, TokenType } from './core/parser/tokenizer';
export { CommandExecutor } from './core/executor/CommandExecutor';
export type { ExecutorOptions, ParseOutcome } from './core/executor/CommandExecutor';
export * from './core/errors';
export * from './types/database';
