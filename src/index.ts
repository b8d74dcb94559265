#!/usr/bin/env node

/**
 * cms-engine - Main Entry Point
 *
 * Executes the CLI program defined in cli.ts.
 * Environment files are loaded per content directory by config.ts.
 */

import { run } from './cli.js';

process.on('unhandledRejection', (reason, promise) => {
  console.error('[FATAL] Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  console.error('[FATAL] Uncaught Exception:', error);
  process.exit(1);
});

run().catch((error) => {
  console.error('[FATAL] Failed to run cms-engine:', error);
  process.exit(1);
});
