import fs from 'fs/promises';
import path from 'path';

/** What the locator needs to know about the running editor process. */
export interface HostEnvironment {
  /** Executable the host reports for itself. */
  executablePath: string;
  /** Path the current process was invoked through. */
  invocationPath: string;
  platform: NodeJS.Platform;
}

export const DEFAULT_EDITOR_PREFIX = 'unrealeditor';

// Some engine builds report the editor binary as the executable, others a
// helper; only trust the reported path when it is named like the editor.
export async function resolveEditorExecutable(host: HostEnvironment, namePrefix = DEFAULT_EDITOR_PREFIX): Promise<string> {
  const name = basenameFor(host.executablePath, host.platform).toLowerCase();
  if (name.startsWith(namePrefix.toLowerCase())) {
    return host.executablePath;
  }
  return realPathOrResolved(host.invocationPath);
}

// Follows symlinks so a launcher link resolves to the binary inside the engine
// tree; a path that does not exist is only made absolute.
async function realPathOrResolved(p: string): Promise<string> {
  const resolved = path.resolve(p);
  try {
    return await fs.realpath(resolved);
  } catch {
    return resolved;
  }
}

function basenameFor(filePath: string, platform: NodeJS.Platform): string {
  return platform === 'win32' ? path.win32.basename(filePath) : path.basename(filePath);
}
