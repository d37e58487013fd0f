import execa from 'execa';
import { EmbeddedPipError, EmbeddedPipErrorCode } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Process boundary used by the runner and the OS helpers. Tests swap in a
 * fake so nothing is spawned.
 */
export interface Executor {
  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult>;
  launch(command: string, args: string[], options?: { cwd?: string }): Promise<void>;
}

export async function run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
  let result: execa.ExecaReturnValue;
  try {
    result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      reject: false,
    });
  } catch (err) {
    throw new EmbeddedPipError(EmbeddedPipErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  // With reject: false a missing binary resolves as a failed result without an exit code.
  if (result.failed && typeof result.exitCode !== 'number' && !result.signal) {
    throw new EmbeddedPipError(EmbeddedPipErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, {
      cause: result instanceof Error ? result.message : result.stderr,
    });
  }
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: typeof result.exitCode === 'number' ? result.exitCode : result.killed ? 128 : 1,
    signal: result.signal ?? undefined,
  };
}

// Starts a detached process and returns once it has spawned; the caller never waits for it to exit.
export async function launch(command: string, args: string[], options?: { cwd?: string }): Promise<void> {
  const child = execa(command, args, {
    cwd: options?.cwd,
    detached: true,
    stdio: 'ignore',
    reject: false,
  });
  await new Promise<void>((resolve, reject) => {
    const fail = (err: unknown) =>
      reject(
        new EmbeddedPipError(EmbeddedPipErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, {
          cause: err instanceof Error ? err.message : String(err),
        })
      );
    child.once('spawn', () => resolve());
    child.once('error', fail);
    // Invalid arguments fail inside execa before any process exists: no event
    // fires and only the promise rejects.
    child.catch(fail);
  });
  child.unref();
}

export const execaExecutor: Executor = { run, launch };
