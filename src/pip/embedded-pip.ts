import path from 'path';
import type { EmbeddedPipConfig } from '../config/schema.js';
import type { Executor } from '../shared/exec.js';
import { describeError } from '../shared/errors.js';
import type { HostLog } from '../shared/logger.js';
import type { HostEnvironment } from '../locator/editor.js';
import { locateEmbeddedPython } from '../locator/interpreter.js';
import { PipRunner } from './runner.js';

export interface EmbeddedPipDeps {
  host: HostEnvironment;
  config: EmbeddedPipConfig;
  log: HostLog;
  executor: Executor;
}

const FILE_BROWSERS: Partial<Record<NodeJS.Platform, string>> = {
  win32: 'explorer',
  darwin: 'open',
};

/**
 * Package workflows for the editor's embedded Python. The interpreter is
 * located again for every call; when it cannot be found the call logs an
 * error and returns false or null.
 */
export class EmbeddedPip {
  private readonly runner: PipRunner;

  constructor(private readonly deps: EmbeddedPipDeps) {
    this.runner = new PipRunner(deps.executor, deps.log, {
      platform: deps.host.platform,
      installArgs: deps.config.pip.install_args,
      uninstallArgs: deps.config.pip.uninstall_args,
    });
  }

  get packageName(): string {
    return this.deps.config.package;
  }

  locate(): Promise<string | null> {
    return locateEmbeddedPython(this.deps.host, this.deps.log, this.deps.config.editor.name_prefix);
  }

  async isAvailable(pkg = this.packageName): Promise<boolean> {
    const python = await this.requirePython();
    return python ? this.runner.isAvailable(python, pkg) : false;
  }

  async install(pkg = this.packageName, extraArgs: string[] = []): Promise<boolean> {
    const python = await this.requirePython();
    return python ? this.runner.install(python, pkg, extraArgs) : false;
  }

  async uninstall(pkg = this.packageName, extraArgs: string[] = []): Promise<boolean> {
    const python = await this.requirePython();
    return python ? this.runner.uninstall(python, pkg, extraArgs) : false;
  }

  async show(pkg = this.packageName): Promise<string | null> {
    const python = await this.requirePython();
    return python ? this.runner.show(python, pkg) : null;
  }

  async list(): Promise<string | null> {
    const python = await this.requirePython();
    return python ? this.runner.list(python) : null;
  }

  async cleanup(pkg = this.packageName): Promise<boolean> {
    const python = await this.requirePython();
    return python ? this.runner.cleanup(python, pkg, this.deps.config.cleanup.patterns) : false;
  }

  async ensureInstalled(pkg = this.packageName): Promise<boolean> {
    const python = await this.requirePython();
    if (!python) return false;
    const { log } = this.deps;
    if (await this.runner.isAvailable(python, pkg)) {
      log.info(`${pkg} already available.`);
      return true;
    }
    log.warning(`${pkg} not found. Attempting installation...`);
    return this.runner.install(python, pkg);
  }

  async uninstallAndVerify(pkg = this.packageName, extraArgs: string[] = []): Promise<boolean> {
    const python = await this.requirePython();
    if (!python) return false;
    const { log } = this.deps;
    if (!(await this.runner.isAvailable(python, pkg))) {
      log.info(`${pkg} is not installed in the engine's Python environment.`);
      return false;
    }

    const info = await this.runner.show(python, pkg);
    if (info) {
      log.info(`Current ${pkg} installation info:`);
      log.info(info);
    }

    log.warning(`Attempting to uninstall ${pkg}...`);
    if (!(await this.runner.uninstall(python, pkg, extraArgs))) {
      log.error(`Failed to uninstall ${pkg}.`);
      return false;
    }
    if (await this.runner.isAvailable(python, pkg)) {
      log.warning(`Uninstall command completed but ${pkg} still appears to be available.`);
      return false;
    }
    log.info(`${pkg} successfully uninstalled and verified.`);
    return true;
  }

  async openPythonFolder(): Promise<boolean> {
    const folder = await this.pythonFolder();
    if (!folder) return false;
    this.deps.log.info(`Opening: ${folder}`);
    const browser = FILE_BROWSERS[this.deps.host.platform] ?? 'xdg-open';
    return this.launch(browser, [folder], undefined);
  }

  async openTerminalAtPython(): Promise<boolean> {
    const folder = await this.pythonFolder();
    if (!folder) return false;
    if (this.deps.host.platform !== 'win32') {
      this.deps.log.warning('Terminal helper is Windows-only.');
      return false;
    }
    this.deps.log.info(`Opening terminal at: ${folder}`);
    return this.launch('cmd.exe', [], folder);
  }

  private async pythonFolder(): Promise<string | null> {
    const python = await this.requirePython();
    if (!python) return null;
    const folder = path.dirname(python);
    this.deps.log.info(`Python folder: ${folder}`);
    return folder;
  }

  private async launch(command: string, args: string[], cwd: string | undefined): Promise<boolean> {
    try {
      await this.deps.executor.launch(command, args, { cwd });
      return true;
    } catch (err) {
      this.deps.log.error(`Could not start ${command}: ${describeError(err)}`);
      return false;
    }
  }

  private async requirePython(): Promise<string | null> {
    const python = await this.locate();
    if (!python) {
      this.deps.log.error('No embedded Python found.');
    }
    return python;
  }
}
