// Config loader — reads ~/.config/embedded-pip/config.yaml and deep-merges it over DEFAULT_CONFIG.
// First run (no file) writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// Environment overrides are applied last: EMBEDDED_PIP_EDITOR, EMBEDDED_PIP_PACKAGE.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_CONFIG, EmbeddedPipConfigSchema, type EmbeddedPipConfig } from './schema.js';
import { logger } from '../shared/logger.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'embedded-pip', 'config.yaml');

const DEFAULT_CONFIG_YAML = `# embedded-pip configuration
# Generated automatically on first run. All values shown are defaults.

# Package installed into the editor's embedded Python.
package: PySide6

editor:
  # Editor executable, e.g. .../Engine/Binaries/Win64/UnrealEditor.exe
  # EMBEDDED_PIP_EDITOR overrides this value.
  executable: null
  # Executables whose name starts with this prefix are taken as the editor.
  name_prefix: unrealeditor

pip:
  install_args: ["--no-warn-script-location"]
  uninstall_args: ["--yes"]

cleanup:
  # Globs matched inside site-packages after an uninstall.
  patterns: ["PySide6*", "shiboken6*", "*pyside6*"]
  run_after_uninstall: true
`;

export interface ConfigResult {
  config: EmbeddedPipConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? env.EMBEDDED_PIP_CONFIG ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, 'No config file found, writing defaults (first run)');
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, 'utf-8');
    } catch (err) {
      logger.warn({ configPath, error: err }, 'Could not write default config file');
    }
    return { config: applyEnv(cloneDefaults(), env), configPath, firstRun: true };
  }

  let config: EmbeddedPipConfig;
  try {
    const raw = readFileSync(configPath, 'utf-8');
    const parsed: unknown = parseYaml(raw);
    const merged = deepMerge(cloneDefaults(), isRecord(parsed) ? parsed : {});
    const result = EmbeddedPipConfigSchema.safeParse(merged);
    if (result.success) {
      config = result.data;
    } else {
      logger.error({ configPath, issues: result.error.issues }, 'Invalid config, using defaults');
      config = cloneDefaults();
    }
  } catch (err) {
    logger.error({ configPath, error: err }, 'Failed to parse config, using defaults');
    config = cloneDefaults();
  }
  return { config: applyEnv(config, env), configPath, firstRun: false };
}

function applyEnv(config: EmbeddedPipConfig, env: NodeJS.ProcessEnv): EmbeddedPipConfig {
  const editor = env.EMBEDDED_PIP_EDITOR;
  const pkg = env.EMBEDDED_PIP_PACKAGE;
  return {
    ...config,
    package: pkg ? pkg : config.package,
    editor: { ...config.editor, executable: editor ? editor : config.editor.executable },
  };
}

function cloneDefaults(): EmbeddedPipConfig {
  return structuredClone(DEFAULT_CONFIG);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
