import { createApp } from './app.js';
import { closeMetadataPool } from './config/database.js';
import { env } from './config/env.js';
import { connectionManager } from './core/connection-manager.js';

const app = createApp();

const server = app.listen(env.PORT, () => {
  console.log(`🚀 Server running in ${env.NODE_ENV} mode on port ${env.PORT}`);
});

const shutdown = (signal: string): void => {
  console.log(`[${new Date().toISOString()}] [SERVER] ${signal} received, closing warehouse sessions`);
  server.close();
  Promise.all([connectionManager.closeAll(), closeMetadataPool()])
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error(`[${new Date().toISOString()}] [SERVER] Shutdown error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
