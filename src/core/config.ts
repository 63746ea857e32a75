import { homedir } from 'os';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';

import type { DialogBackend, ExecutionOptions, PkgdeckConfig, PkgdeckConfigFile } from '../types/index.js';
import { resolveManagerKind } from './package-managers/registry.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration for the pkgdeck CLI.
 *
 * Precedence: command-line flag > environment > config file > default.
 * Built once at startup and frozen; components receive it by reference.
 */

const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'];
const DIALOG_BACKENDS: readonly DialogBackend[] = ['clack', 'dialog', 'whiptail'];

export const ENV_VARS = {
  MANAGER: 'PKGDECK_MANAGER',
  CATALOG: 'PKGDECK_CATALOG',
  DIALOG: 'PKGDECK_DIALOG',
  ASSUME_YES: 'PKGDECK_ASSUME_YES',
  SUDO: 'PKGDECK_SUDO'
} as const;

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../config/catalog.yml', import.meta.url));

export interface ConfigSources {
  flags: ExecutionOptions;
  env: Record<string, string | undefined>;
  /** Directory holding config.jsonc; derived from XDG_CONFIG_HOME when omitted. */
  configDir?: string;
  /** Whether the process already runs as root. */
  isRoot: boolean;
  /** Receives non-fatal startup warnings. */
  onWarning?: (message: string) => void;
}

export function getConfigDir(env: Record<string, string | undefined>): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, 'pkgdeck');
}

async function readConfigFile(configDir: string): Promise<PkgdeckConfigFile> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const path = join(configDir, fileName);
    if (await exists(path)) {
      logger.debug(`Loading config from: ${path}`);
      return parseConfigFile(await readJsonOrJsoncFile(path), path);
    }
  }
  return {};
}

/**
 * Validate the untyped contents of a config file.
 */
export function parseConfigFile(value: unknown, path: string): PkgdeckConfigFile {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError(`${path}: expected an object`);
  }

  const file: PkgdeckConfigFile = {};
  for (const key of ['manager', 'catalog', 'dialog', 'sudo'] as const) {
    const field: unknown = Reflect.get(value, key);
    if (field === undefined) continue;
    if (typeof field !== 'string') {
      throw new ConfigError(`${path}: '${key}' must be a string`);
    }
    file[key] = field;
  }

  const assumeYes: unknown = Reflect.get(value, 'assumeYes');
  if (assumeYes !== undefined) {
    if (typeof assumeYes !== 'boolean') {
      throw new ConfigError(`${path}: 'assumeYes' must be a boolean`);
    }
    file.assumeYes = assumeYes;
  }

  return file;
}

function parseDialogBackend(value: string): DialogBackend {
  const match = DIALOG_BACKENDS.find(backend => backend === value.trim().toLowerCase());
  if (!match) {
    throw new ConfigError(`Unknown dialog '${value}'. Expected one of: ${DIALOG_BACKENDS.join(', ')}`);
  }
  return match;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Build the process-wide configuration.
 */
export async function loadConfig(sources: ConfigSources): Promise<PkgdeckConfig> {
  const { flags, env } = sources;
  const file = await readConfigFile(sources.configDir ?? getConfigDir(env));

  const managerValue = flags.manager ?? env[ENV_VARS.MANAGER] ?? file.manager ?? '';
  const manager = resolveManagerKind(managerValue);

  if (managerValue.trim() === '') {
    sources.onWarning?.(
      `No package manager configured. Set ${ENV_VARS.MANAGER} or pass --manager (apt-get, pacman).`
    );
  }

  const catalog = flags.catalog ?? env[ENV_VARS.CATALOG] ?? file.catalog;
  const dialog = flags.dialog ?? env[ENV_VARS.DIALOG] ?? file.dialog;
  const privilegeCommand = env[ENV_VARS.SUDO] ?? file.sudo ?? (sources.isRoot ? '' : 'sudo');

  const config: PkgdeckConfig = Object.freeze({
    manager: Object.freeze(manager),
    catalogPath: catalog ? resolve(catalog) : DEFAULT_CATALOG_PATH,
    dialog: dialog ? parseDialogBackend(dialog) : 'clack',
    assumeYes: flags.yes ?? parseFlag(env[ENV_VARS.ASSUME_YES]) ?? file.assumeYes ?? false,
    privilegeCommand: privilegeCommand.trim()
  });

  logger.debug('Resolved configuration', config);
  return config;
}
