import type { ManagerKind, SupportedManagerName } from '../../types/index.js';
import type { AdapterOptions, PackageManagerAdapter } from './types.js';
import { AptGetPackageManager } from './apt-get.js';
import { PacmanPackageManager } from './pacman.js';
import { UnsupportedPackageManager } from './unsupported.js';

/**
 * Recognised configuration values, after trimming and lower-casing.
 */
const KNOWN_MANAGERS: Readonly<Record<string, SupportedManagerName>> = {
  'apt': 'apt-get',
  'apt-get': 'apt-get',
  'pacman': 'pacman'
};

const ADAPTER_FACTORIES: Readonly<Record<SupportedManagerName, (options: AdapterOptions) => PackageManagerAdapter>> = {
  'apt-get': options => new AptGetPackageManager(options),
  'pacman': options => new PacmanPackageManager(options)
};

/**
 * Resolve a backend configuration value. Pure and total: anything that is not
 * a known name, the empty string included, becomes `unsupported` carrying the
 * value as given.
 */
export function resolveManagerKind(value: string | undefined): ManagerKind {
  const raw = value ?? '';
  const name = KNOWN_MANAGERS[raw.trim().toLowerCase()];
  if (name === 'apt-get') {
    return { kind: 'apt-get' };
  }
  if (name === 'pacman') {
    return { kind: 'pacman' };
  }
  return { kind: 'unsupported', raw };
}

export interface ManagerRegistry {
  adapterFor(kind: ManagerKind): PackageManagerAdapter;
}

/**
 * Strategy table from manager kind to adapter.
 */
export function createManagerRegistry(options: AdapterOptions): ManagerRegistry {
  return {
    adapterFor(kind: ManagerKind): PackageManagerAdapter {
      if (kind.kind === 'unsupported') {
        return new UnsupportedPackageManager(kind.raw);
      }
      return ADAPTER_FACTORIES[kind.kind](options);
    }
  };
}
