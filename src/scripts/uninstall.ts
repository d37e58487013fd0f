#!/usr/bin/env node
// Removes the configured package from the editor's embedded Python, verifies
// it no longer resolves, then sweeps leftover files out of site-packages.
import type { EmbeddedPip } from '../pip/embedded-pip.js';
import type { HostLog } from '../shared/logger.js';
import { bootstrap } from '../bootstrap.js';
import { createHostLog, logger } from '../shared/logger.js';

const RULE = '='.repeat(50);

export async function runUninstaller(pip: EmbeddedPip, log: HostLog, cleanupAfter: boolean): Promise<boolean> {
  const pkg = pip.packageName;
  log.info(`${pkg} uninstaller for the engine's embedded Python`);
  log.info(RULE);

  if (!(await pip.locate())) {
    log.error('No embedded Python found.');
    log.info(RULE);
    return false;
  }

  let removed = true;
  if (await pip.isAvailable()) {
    log.info(`${pkg} is currently installed.`);
    removed = await pip.uninstallAndVerify();
    if (removed) {
      if (cleanupAfter) await pip.cleanup();
      log.info(`${pkg} uninstallation completed successfully.`);
    } else {
      log.error(`${pkg} uninstallation failed.`);
    }
  } else {
    log.info(`${pkg} is not currently installed in the engine's Python environment.`);
  }

  log.info(RULE);
  return removed;
}

async function main(): Promise<void> {
  const { pip, config } = bootstrap();
  const ok = await runUninstaller(pip, createHostLog(), config.cleanup.run_after_uninstall);
  process.exitCode = ok ? 0 : 1;
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ error: err }, 'Uninstall script failed');
    process.exit(1);
  });
}
