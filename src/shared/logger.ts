import pino from 'pino';

// Always stderr: the MCP server owns stdout.
export const logger = pino(
  {
    name: 'embedded-pip',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination({ dest: 2, sync: true }),
);

/**
 * The three-level logging surface an editor host offers. Locator and runner
 * code only ever logs through this.
 */
export interface HostLog {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export type LeveledLogger = Pick<pino.Logger, 'info' | 'warn' | 'error'>;

export function createHostLog(target: LeveledLogger = logger): HostLog {
  return {
    info: (message) => target.info(message),
    warning: (message) => target.warn(message),
    error: (message) => target.error(message),
  };
}
