/**
 * Bellhop Server
 * Main entry point: REST gateway plus WebSocket push on one port
 */

import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { createBellhopServer } from './server.js';

// Load environment variables
dotenv.config();

async function main() {
  console.log('Starting Bellhop Server...');
  const config = loadConfig();

  const server = createBellhopServer({
    corsOrigin: config.corsOrigin,
    staticDir: config.staticDir,
    seedNotifications: config.seedNotifications,
    sendTimeoutMs: config.sendTimeoutMs,
    maxBufferedBytes: config.maxBufferedBytes,
  });

  const address = await server.listen(config.port, config.host);

  // Graceful shutdown
  const shutdown = () => {
    console.log('\nShutting down...');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  console.log('Bellhop Server ready!');
  console.log(`HTTP API: http://localhost:${address.port}/api`);
  console.log(`WebSocket server: ws://localhost:${address.port}/ws`);
  if (config.staticDir) {
    console.log(`Static files: ${config.staticDir}`);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
