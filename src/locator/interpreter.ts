import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import { glob } from 'glob';
import type { HostLog } from '../shared/logger.js';
import { DEFAULT_EDITOR_PREFIX, resolveEditorExecutable, type HostEnvironment } from './editor.js';

// .../Engine/Binaries/<Platform>/<editor> -> .../Engine/Binaries/ThirdParty
export function thirdPartyRoot(editorExe: string): string | null {
  let dir = path.resolve(editorExe);
  for (let i = 0; i < 3; i++) {
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
  return path.join(dir, 'Binaries', 'ThirdParty');
}

export function interpreterCandidates(editorExe: string, platform: NodeJS.Platform): string[] {
  const thirdParty = thirdPartyRoot(editorExe);
  if (!thirdParty) return [];
  const python3 = path.join(thirdParty, 'Python3');
  switch (platform) {
    case 'win32':
      return [path.join(python3, 'Win64', 'python.exe'), path.join(python3, 'Win64', 'python3.exe')];
    case 'darwin':
      return [path.join(python3, 'Mac', 'bin', 'python3')];
    default:
      return [path.join(python3, 'Linux', 'bin', 'python3')];
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

async function isExecutableFile(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    if (!stat.isFile()) return false;
    await fs.access(p, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Finds the interpreter bundled with the engine that ships `editorExe`.
 * Known per-platform locations are tried first, then any executable named
 * python* anywhere under ThirdParty/Python*. Returns null when nothing fits.
 */
export async function findEmbeddedPython(editorExe: string, platform: NodeJS.Platform): Promise<string | null> {
  const thirdParty = thirdPartyRoot(editorExe);
  if (!thirdParty) return null;

  for (const candidate of interpreterCandidates(editorExe, platform)) {
    if (await exists(candidate)) return candidate;
  }

  let hits: string[];
  try {
    hits = await glob('Python*/**/python*', { cwd: thirdParty, absolute: true });
  } catch {
    return null;
  }
  for (const hit of hits.sort()) {
    if (await isExecutableFile(hit)) return hit;
  }
  return null;
}

export async function locateEmbeddedPython(
  host: HostEnvironment,
  log: HostLog,
  namePrefix = DEFAULT_EDITOR_PREFIX
): Promise<string | null> {
  const editorExe = await resolveEditorExecutable(host, namePrefix);
  const python = await findEmbeddedPython(editorExe, host.platform);
  if (!python) {
    log.warning('Could not resolve embedded Python automatically.');
  }
  return python;
}
