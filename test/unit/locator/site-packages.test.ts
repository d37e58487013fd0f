import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { findModuleSpec, sitePackagesDirs, versionTagOf, type ExtensionTarget } from '../../../src/locator/site-packages.js';
import { makeEngine, writeFile } from '../../helpers.js';

describe('sitePackagesDirs', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'embedded-pip-site-'));
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it('finds lib/python3.X/site-packages next to bin/ on Linux', async () => {
    const engine = await makeEngine(tmp, 'linux');
    expect(await sitePackagesDirs(engine.python, 'linux')).toEqual([engine.sitePackages]);
  });

  it('finds Lib/site-packages beside python.exe on Windows', async () => {
    const engine = await makeEngine(tmp, 'win32');
    expect(await sitePackagesDirs(engine.python, 'win32')).toEqual([engine.sitePackages]);
  });

  it('returns nothing when the directory does not exist', async () => {
    expect(await sitePackagesDirs(path.join(tmp, 'Win64', 'python.exe'), 'win32')).toEqual([]);
  });
});

describe('versionTagOf', () => {
  it('reads the version from lib/python3.X', () => {
    expect(versionTagOf('/py/lib/python3.11/site-packages')).toBe('311');
    expect(versionTagOf('/py/Lib/site-packages')).toBeNull();
  });
});

describe('findModuleSpec', () => {
  const linux311: ExtensionTarget = { platform: 'linux', version: '311' };
  let first: string;
  let second: string;

  beforeEach(async () => {
    first = await fs.mkdtemp(path.join(os.tmpdir(), 'embedded-pip-spec-a-'));
    second = await fs.mkdtemp(path.join(os.tmpdir(), 'embedded-pip-spec-b-'));
  });

  afterEach(async () => {
    await fs.rm(first, { recursive: true, force: true });
    await fs.rm(second, { recursive: true, force: true });
  });

  it('resolves a regular package', async () => {
    await writeFile(path.join(first, 'PySide6', '__init__.py'));
    expect(await findModuleSpec('PySide6', [first], linux311)).toEqual({
      name: 'PySide6',
      kind: 'package',
      origin: path.join(first, 'PySide6', '__init__.py'),
      searchLocations: [path.join(first, 'PySide6')],
    });
  });

  it('resolves extension, source and bytecode modules', async () => {
    await writeFile(path.join(first, 'shiboken6.abi3.so'));
    await writeFile(path.join(first, 'helper.py'));
    await writeFile(path.join(first, 'compiled.pyc'));

    expect(await findModuleSpec('shiboken6', [first], linux311)).toMatchObject({ kind: 'extension', origin: path.join(first, 'shiboken6.abi3.so') });
    expect(await findModuleSpec('helper', [first], linux311)).toMatchObject({ kind: 'module', origin: path.join(first, 'helper.py') });
    expect(await findModuleSpec('compiled', [first], linux311)).toMatchObject({ kind: 'bytecode', origin: path.join(first, 'compiled.pyc') });
  });

  it('accepts only extensions built for the interpreter', async () => {
    await writeFile(path.join(first, 'stale.cpython-39-x86_64-linux-gnu.so'));
    await writeFile(path.join(first, 'current.cpython-311-x86_64-linux-gnu.so'));
    await writeFile(path.join(first, 'bare.so'));

    expect(await findModuleSpec('stale', [first], linux311)).toBeNull();
    expect(await findModuleSpec('current', [first], linux311)).toMatchObject({
      kind: 'extension',
      origin: path.join(first, 'current.cpython-311-x86_64-linux-gnu.so'),
    });
    expect(await findModuleSpec('bare', [first], linux311)).toMatchObject({ kind: 'extension', origin: path.join(first, 'bare.so') });
  });

  it('loads .pyd files on Windows only', async () => {
    await writeFile(path.join(first, 'QtGui.pyd'));
    await writeFile(path.join(first, 'QtCore.cp311-win_amd64.pyd'));

    expect(await findModuleSpec('QtGui', [first], linux311)).toBeNull();
    expect(await findModuleSpec('QtGui', [first], { platform: 'win32', version: null })).toMatchObject({
      kind: 'extension',
      origin: path.join(first, 'QtGui.pyd'),
    });
    expect(await findModuleSpec('QtCore', [first], { platform: 'win32', version: null })).toMatchObject({
      origin: path.join(first, 'QtCore.cp311-win_amd64.pyd'),
    });
    expect(await findModuleSpec('QtCore', [first], { platform: 'darwin', version: null })).toBeNull();
  });

  it('collects namespace portions across search paths', async () => {
    await fs.mkdir(path.join(first, 'shared'));
    await fs.mkdir(path.join(second, 'shared'));
    expect(await findModuleSpec('shared', [first, second], linux311)).toEqual({
      name: 'shared',
      kind: 'namespace',
      origin: null,
      searchLocations: [path.join(first, 'shared'), path.join(second, 'shared')],
    });
  });

  it('prefers a module in a later path over a namespace portion', async () => {
    await fs.mkdir(path.join(first, 'tool'));
    await writeFile(path.join(second, 'tool.py'));
    expect(await findModuleSpec('tool', [first, second], linux311)).toMatchObject({ kind: 'module', origin: path.join(second, 'tool.py') });
  });

  it('resolves dotted names inside a package', async () => {
    await writeFile(path.join(first, 'PySide6', '__init__.py'));
    await writeFile(path.join(first, 'PySide6', 'QtCore.abi3.so'));
    expect(await findModuleSpec('PySide6.QtCore', [first], linux311)).toMatchObject({
      name: 'PySide6.QtCore',
      kind: 'extension',
      origin: path.join(first, 'PySide6', 'QtCore.abi3.so'),
    });
  });

  it('does not descend into plain modules', async () => {
    await writeFile(path.join(first, 'helper.py'));
    expect(await findModuleSpec('helper.sub', [first], linux311)).toBeNull();
  });

  it('matches names case-sensitively', async () => {
    await writeFile(path.join(first, 'PySide6', '__init__.py'));
    expect(await findModuleSpec('pyside6', [first], linux311)).toBeNull();
  });

  it('returns null for unknown or malformed names', async () => {
    expect(await findModuleSpec('missing', [first, path.join(first, 'nope')], linux311)).toBeNull();
    expect(await findModuleSpec('a..b', [first], linux311)).toBeNull();
  });
});
