import fs from 'fs/promises';
import path from 'path';
import { glob } from 'glob';

export type ModuleKind = 'package' | 'namespace' | 'module' | 'extension' | 'bytecode';

/** Which compiled extensions the interpreter can load. */
export interface ExtensionTarget {
  platform: NodeJS.Platform;
  /** CPython version tag such as "311"; null accepts any version tag. */
  version: string | null;
}

export interface ModuleSpec {
  name: string;
  kind: ModuleKind;
  /** File the module loads from; null for namespace packages. */
  origin: string | null;
  /** Where submodules are looked up; empty for plain modules. */
  searchLocations: string[];
}

/**
 * site-packages directories of an embedded interpreter, derived from where
 * the binary sits rather than by asking it.
 *   Windows: <Python3/Win64>/Lib/site-packages
 *   others:  <Python3/Linux>/lib/python3.X/site-packages (binary is in bin/)
 */
export async function sitePackagesDirs(python: string, platform: NodeJS.Platform): Promise<string[]> {
  const candidates =
    platform === 'win32'
      ? [path.join(path.dirname(python), 'Lib', 'site-packages')]
      : (await glob('lib/python3*/site-packages', { cwd: path.dirname(path.dirname(python)), absolute: true })).sort();

  const dirs: string[] = [];
  for (const dir of candidates) {
    if (await isDirectory(dir)) dirs.push(dir);
  }
  return dirs;
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch {
    return [];
  }
}

/** Version tag of the interpreter that owns `lib/python3.X/site-packages`. */
export function versionTagOf(sitePackagesDir: string): string | null {
  const match = /^python(\d+)\.(\d+)$/.exec(path.basename(path.dirname(sitePackagesDir)));
  return match ? `${match[1]}${match[2]}` : null;
}

// Windows loads <name>.pyd or <name>.cp311-win_amd64.pyd; other platforms load
// <name>.so, <name>.abi3.so or <name>.cpython-311-<platform>.so.
function isExtensionFile(entry: string, name: string, target: ExtensionTarget): boolean {
  if (target.platform === 'win32') {
    if (entry === `${name}.pyd`) return true;
    const tag = target.version ? `cp${target.version}-` : 'cp';
    return entry.startsWith(`${name}.${tag}`) && entry.endsWith('.pyd');
  }
  if (entry === `${name}.so` || entry === `${name}.abi3.so`) return true;
  const tag = target.version ? `cpython-${target.version}-` : 'cpython-';
  return entry.startsWith(`${name}.${tag}`) && entry.endsWith('.so');
}

/** Looks one name up in each search path, the way the path-based finder does. */
async function findInPaths(
  fullName: string,
  leaf: string,
  searchPaths: string[],
  target: ExtensionTarget
): Promise<ModuleSpec | null> {
  const namespacePortions: string[] = [];

  for (const dir of searchPaths) {
    const entries = await listDir(dir);
    if (entries.length === 0) continue;

    if (entries.includes(leaf)) {
      const pkgDir = path.join(dir, leaf);
      if (await isDirectory(pkgDir)) {
        const init = path.join(pkgDir, '__init__.py');
        if ((await listDir(pkgDir)).includes('__init__.py')) {
          return { name: fullName, kind: 'package', origin: init, searchLocations: [pkgDir] };
        }
        namespacePortions.push(pkgDir);
      }
    }

    const extension = entries.filter((e) => isExtensionFile(e, leaf, target)).sort()[0];
    if (extension) {
      return { name: fullName, kind: 'extension', origin: path.join(dir, extension), searchLocations: [] };
    }
    if (entries.includes(`${leaf}.py`)) {
      return { name: fullName, kind: 'module', origin: path.join(dir, `${leaf}.py`), searchLocations: [] };
    }
    if (entries.includes(`${leaf}.pyc`)) {
      return { name: fullName, kind: 'bytecode', origin: path.join(dir, `${leaf}.pyc`), searchLocations: [] };
    }
  }

  if (namespacePortions.length > 0) {
    return { name: fullName, kind: 'namespace', origin: null, searchLocations: namespacePortions };
  }
  return null;
}

/**
 * Resolves a module name (dotted names included) against `searchPaths`.
 * Extension modules only count when built for `target`. Returns null when
 * the name does not resolve.
 */
export async function findModuleSpec(
  name: string,
  searchPaths: string[],
  target: ExtensionTarget
): Promise<ModuleSpec | null> {
  const parts = name.split('.');
  if (parts.some((p) => p.length === 0)) return null;

  let spec: ModuleSpec | null = null;
  let paths = searchPaths;
  for (let i = 0; i < parts.length; i++) {
    spec = await findInPaths(parts.slice(0, i + 1).join('.'), parts[i], paths, target);
    if (!spec) return null;
    if (i < parts.length - 1 && spec.searchLocations.length === 0) return null;
    paths = spec.searchLocations;
  }
  return spec;
}
