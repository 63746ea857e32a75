import type { ManagerKind, PackageId, RemoveOrphansResult } from '../../types/index.js';
import type { PackageManagerAdapter } from './types.js';
import { UnsupportedManagerError } from '../../utils/errors.js';

/**
 * Adapter for a configuration value that named no known backend.
 * Every operation fails without starting any process.
 */
export class UnsupportedPackageManager implements PackageManagerAdapter {
  readonly kind: ManagerKind;

  constructor(private readonly raw: string) {
    this.kind = { kind: 'unsupported', raw };
  }

  async install(_ids: readonly PackageId[]): Promise<void> {
    throw new UnsupportedManagerError(this.raw);
  }

  async remove(_ids: readonly PackageId[]): Promise<void> {
    throw new UnsupportedManagerError(this.raw);
  }

  search(_query: string): AsyncIterable<string> {
    const raw = this.raw;
    return {
      [Symbol.asyncIterator](): AsyncIterator<string> {
        return {
          next(): Promise<IteratorResult<string>> {
            return Promise.reject(new UnsupportedManagerError(raw));
          }
        };
      }
    };
  }

  async syncIndex(): Promise<void> {
    throw new UnsupportedManagerError(this.raw);
  }

  async upgradeAll(): Promise<void> {
    throw new UnsupportedManagerError(this.raw);
  }

  async removeOrphans(): Promise<RemoveOrphansResult> {
    throw new UnsupportedManagerError(this.raw);
  }
}
