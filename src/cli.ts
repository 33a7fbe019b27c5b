#!/usr/bin/env node
import { loadConfig } from './config';
import { Database } from './core/database/Database';
import { TableStorage } from './core/storage/TableStorage';
import { CommandExecutor } from './core/executor/CommandExecutor';
import { Shell } from './cli/Shell';
import { createConsoleIO } from './cli/consoleIO';

async function main(): Promise<void> {
  const config = loadConfig();
  const db = new Database(new TableStorage(config.dataDir));
  const executor = new CommandExecutor(db, { cacheSelects: config.cacheSelects });

  console.log(`📂 Using data directory ${config.dataDir}`);

  const io = createConsoleIO();
  try {
    await new Shell(executor, io, {
      confirmDestructive: config.confirmDestructive,
      logTiming: config.logTiming
    }).run();
  } finally {
    io.close();
  }
}

main().catch(error => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
