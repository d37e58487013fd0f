import { loadConfig, type ConfigResult } from './config/loader.js';
import type { EmbeddedPipConfig } from './config/schema.js';
import type { HostEnvironment } from './locator/editor.js';
import { EmbeddedPip } from './pip/embedded-pip.js';
import { execaExecutor } from './shared/exec.js';
import { createHostLog, logger } from './shared/logger.js';

/**
 * The configured editor executable stands in for the host-reported one.
 * Without it the node binary is reported, which the locator rejects in
 * favour of the invocation path.
 */
export function currentHost(config: EmbeddedPipConfig): HostEnvironment {
  return {
    executablePath: config.editor.executable ?? process.execPath,
    invocationPath: process.argv[1] ?? process.cwd(),
    platform: process.platform,
  };
}

export interface Bootstrapped extends ConfigResult {
  pip: EmbeddedPip;
}

export function bootstrap(): Bootstrapped {
  const result = loadConfig();
  logger.info({ configPath: result.configPath, firstRun: result.firstRun }, 'Configuration loaded');
  const pip = new EmbeddedPip({
    host: currentHost(result.config),
    config: result.config,
    log: createHostLog(),
    executor: execaExecutor,
  });
  return { ...result, pip };
}
