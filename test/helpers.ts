import fs from 'fs/promises';
import path from 'path';
import type { Executor, ExecResult, RunOptions } from '../src/shared/exec.js';
import type { HostLog } from '../src/shared/logger.js';

export interface LogEntry {
  level: 'info' | 'warning' | 'error';
  message: string;
}

export class RecordingLog implements HostLog {
  readonly entries: LogEntry[] = [];

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warning(message: string): void {
    this.entries.push({ level: 'warning', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message);
  }
}

export interface ExecCall {
  command: string;
  args: string[];
  cwd?: string;
}

export type ExecHandler = (call: ExecCall) => ExecResult | Error | Promise<ExecResult | Error>;

export function ok(stdout = ''): ExecResult {
  return { stdout, stderr: '', exitCode: 0 };
}

export function failed(exitCode: number, stderr = ''): ExecResult {
  return { stdout: '', stderr, exitCode };
}

export class FakeExecutor implements Executor {
  readonly calls: ExecCall[] = [];
  readonly launches: ExecCall[] = [];
  launchError: Error | null = null;

  constructor(private readonly handler: ExecHandler = () => ok()) {}

  async run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
    const call = { command, args, cwd: options?.cwd };
    this.calls.push(call);
    const result = await this.handler(call);
    if (result instanceof Error) throw result;
    return result;
  }

  async launch(command: string, args: string[], options?: { cwd?: string }): Promise<void> {
    this.launches.push({ command, args, cwd: options?.cwd });
    if (this.launchError) throw this.launchError;
  }
}

export interface FakeEngine {
  editorExe: string;
  python: string;
  sitePackages: string;
}

const LAYOUTS: Record<'linux' | 'win32' | 'darwin', { editor: string[]; python: string[]; site: string[] }> = {
  linux: {
    editor: ['Linux', 'UnrealEditor'],
    python: ['Linux', 'bin', 'python3'],
    site: ['Linux', 'lib', 'python3.11', 'site-packages'],
  },
  win32: {
    editor: ['Win64', 'UnrealEditor.exe'],
    python: ['Win64', 'python.exe'],
    site: ['Win64', 'Lib', 'site-packages'],
  },
  darwin: {
    editor: ['Mac', 'UnrealEditor'],
    python: ['Mac', 'bin', 'python3'],
    site: ['Mac', 'lib', 'python3.11', 'site-packages'],
  },
};

/** Lays out <root>/Engine/Binaries the way an installed engine does. */
export async function makeEngine(root: string, platform: 'linux' | 'win32' | 'darwin'): Promise<FakeEngine> {
  const layout = LAYOUTS[platform];
  const binaries = path.join(root, 'Engine', 'Binaries');
  const python3 = path.join(binaries, 'ThirdParty', 'Python3');
  const editorExe = path.join(binaries, ...layout.editor);
  const python = path.join(python3, ...layout.python);
  const sitePackages = path.join(python3, ...layout.site);

  await writeExecutable(editorExe);
  await writeExecutable(python);
  await fs.mkdir(sitePackages, { recursive: true });
  return { editorExe, python, sitePackages };
}

export async function writeExecutable(file: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, '', { mode: 0o755 });
}

export async function writeFile(file: string, content = ''): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, 'utf-8');
}
