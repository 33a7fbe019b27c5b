import { loadConfig } from './config';
import { createApp } from './app';
import { CommandExecutor } from './core/executor/CommandExecutor';
import { Database } from './core/database/Database';
import { TableStorage } from './core/storage/TableStorage';

function start(): void {
  const config = loadConfig();
  const db = new Database(new TableStorage(config.dataDir));
  const app = createApp(new CommandExecutor(db, { cacheSelects: config.cacheSelects }));

  const server = app.listen(config.port, () => {
    console.log(`
    🚀 Server running on port ${config.port}
    📂 Data directory: ${config.dataDir}
    📊 Database API: /api/db
    🩺 Health check: /health
    `);
  });

  server.on('error', error => {
    console.error('❌ Server error:', error);
    process.exitCode = 1;
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    console.log('SIGTERM signal received: closing HTTP server');
    server.close(() => {
      console.log('HTTP server closed');
    });
  });
}

try {
  start();
} catch (error) {
  console.error('❌ Failed to start server:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
