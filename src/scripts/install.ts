#!/usr/bin/env node
// Makes sure the configured package is importable in the editor's embedded Python.
import { bootstrap } from '../bootstrap.js';
import { logger } from '../shared/logger.js';

async function main(): Promise<void> {
  const { pip } = bootstrap();
  const ok = await pip.ensureInstalled();
  process.exitCode = ok ? 0 : 1;
}

main().catch((err) => {
  logger.fatal({ error: err }, 'Install script failed');
  process.exit(1);
});
