import fs from 'fs/promises';
import { glob } from 'glob';
import type { Executor, ExecResult } from '../shared/exec.js';
import { describeError } from '../shared/errors.js';
import type { HostLog } from '../shared/logger.js';
import { findModuleSpec, sitePackagesDirs, versionTagOf } from '../locator/site-packages.js';

export interface PipRunnerOptions {
  platform: NodeJS.Platform;
  installArgs: string[];
  uninstallArgs: string[];
}

export const SITE_PACKAGES_PROBE = 'import site; print(site.getsitepackages()[0])';

/**
 * pip operations against one already-located interpreter. Nothing here
 * throws: failures are logged and come back as false or null.
 */
export class PipRunner {
  constructor(
    private readonly executor: Executor,
    private readonly log: HostLog,
    private readonly options: PipRunnerOptions
  ) {}

  async install(python: string, pkg: string, extraArgs: string[] = []): Promise<boolean> {
    const args = ['-m', 'pip', 'install', ...this.options.installArgs, pkg, ...extraArgs];
    this.log.info(`Running: ${[python, ...args].join(' ')}`);
    const result = await this.exec(python, args);
    if (result.exitCode === 0) {
      this.log.info(`Installed ${pkg} into engine Python site-packages.`);
      return true;
    }
    this.log.error(`pip install failed: ${failureText(result)}`);
    return false;
  }

  async uninstall(python: string, pkg: string, extraArgs: string[] = []): Promise<boolean> {
    const args = ['-m', 'pip', 'uninstall', ...this.options.uninstallArgs, pkg, ...extraArgs];
    this.log.info(`Running: ${[python, ...args].join(' ')}`);
    const result = await this.exec(python, args);
    if (result.exitCode === 0) {
      this.log.info(`Successfully uninstalled ${pkg} from engine Python site-packages.`);
      return true;
    }
    this.log.error(`pip uninstall failed: ${failureText(result)}`);
    return false;
  }

  async show(python: string, pkg: string): Promise<string | null> {
    const result = await this.exec(python, ['-m', 'pip', 'show', pkg]);
    return result.exitCode === 0 ? result.stdout : null;
  }

  async list(python: string): Promise<string | null> {
    this.log.info('Packages installed in engine Python:');
    const result = await this.exec(python, ['-m', 'pip', 'list']);
    if (result.exitCode !== 0) {
      this.log.error(`Failed to list packages: ${failureText(result)}`);
      return null;
    }
    this.log.info(result.stdout);
    return result.stdout;
  }

  async sitePackages(python: string): Promise<string | null> {
    const result = await this.exec(python, ['-c', SITE_PACKAGES_PROBE]);
    const dir = result.exitCode === 0 ? result.stdout.trim() : '';
    if (!dir) {
      this.log.error(`Failed to get site-packages directory: ${failureText(result)}`);
      return null;
    }
    return dir;
  }

  // Answered from the files in site-packages; no process is started.
  async isAvailable(python: string, moduleName: string): Promise<boolean> {
    const { platform } = this.options;
    const searchPaths = await sitePackagesDirs(python, platform);
    const version = searchPaths.map(versionTagOf).find((tag) => tag !== null) ?? null;
    return (await findModuleSpec(moduleName, searchPaths, { platform, version })) !== null;
  }

  /**
   * Removes whatever matches `patterns` in site-packages. A path that cannot
   * be removed is reported and skipped. False only when site-packages itself
   * could not be determined.
   */
  async cleanup(python: string, pkg: string, patterns: string[]): Promise<boolean> {
    const sitePackages = await this.sitePackages(python);
    if (!sitePackages) return false;

    const matches = new Set<string>();
    for (const pattern of patterns) {
      for (const hit of await glob(pattern, { cwd: sitePackages, absolute: true })) {
        matches.add(hit);
      }
    }

    if (matches.size === 0) {
      this.log.info(`No ${pkg} remnants found.`);
      return true;
    }

    this.log.info(`Found potential ${pkg} remnants:`);
    for (const target of [...matches].sort()) {
      this.log.info(`  - ${target}`);
      try {
        const stat = await fs.lstat(target);
        if (stat.isDirectory()) {
          await fs.rm(target, { recursive: true });
          this.log.info(`  Removed directory: ${target}`);
        } else {
          await fs.unlink(target);
          this.log.info(`  Removed file: ${target}`);
        }
      } catch (err) {
        this.log.warning(`  Could not remove ${target}: ${describeError(err)}`);
      }
    }
    return true;
  }

  // A process that never started is reported like one that exited with -1.
  private async exec(python: string, args: string[]): Promise<ExecResult> {
    try {
      return await this.executor.run(python, args);
    } catch (err) {
      return { stdout: '', stderr: describeError(err), exitCode: SPAWN_FAILURE_EXIT };
    }
  }
}

const SPAWN_FAILURE_EXIT = -1;

function failureText(result: ExecResult): string {
  if (result.exitCode === SPAWN_FAILURE_EXIT) return result.stderr;
  const stderr = result.stderr.trim();
  return stderr ? `exit code ${result.exitCode}: ${stderr}` : `exit code ${result.exitCode}`;
}
