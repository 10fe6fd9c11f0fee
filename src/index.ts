/**
 * Shortlist Engine - Main Entry Point
 *
 * Candidate evaluation service: structured requirement extraction, candidate
 * resolution, scoring and ranking, exposed over HTTP with pollable jobs.
 */

import 'dotenv/config';
import { createApp } from './api/app.js';
import { createServices } from './bootstrap.js';
import { loadConfig } from './config.js';

// =============================================================================
// STARTUP
// =============================================================================

async function start() {
  const config = loadConfig();

  console.log(`Environment: ${config.nodeEnv}`);
  console.log('Starting Shortlist Engine...\n');

  const services = createServices(config);
  const app = createApp(services);

  const server = app.listen(config.port, () => {
    console.log(`\nShortlist Engine API running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
    console.log(`API base: http://localhost:${config.port}/api\n`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);

    server.close(() => {
      console.log('HTTP server closed');

      services
        .close()
        .then(() => {
          console.log('Shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    });

    // Force exit after timeout
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// =============================================================================
// RUN
// =============================================================================

start().catch((error: unknown) => {
  console.error('Failed to start Shortlist Engine:', error);
  process.exit(1);
});
