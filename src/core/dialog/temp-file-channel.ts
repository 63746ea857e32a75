import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import type { ResultChannel, ResultChannelFactory } from '../ports/dialog.js';
import { exists, readTextFile, remove, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

const CHANNEL_PREFIX = 'pkgdeck-dialog-';
const ANSWER_FILE = 'answer';

class TempFileChannel implements ResultChannel {
  private consumed = false;

  constructor(
    private readonly dir: string,
    readonly location: string
  ) {}

  async write(raw: string): Promise<void> {
    await writeTextFile(this.location, raw);
  }

  async read(): Promise<string> {
    if (this.consumed) {
      throw new Error(`Dialog result channel already read: ${this.location}`);
    }
    this.consumed = true;
    return readTextFile(this.location);
  }

  async release(): Promise<void> {
    await remove(this.dir);
  }
}

/**
 * Result channels backed by a private file in a fresh temp directory.
 * The directory is created with mode 0700 and removed on release.
 */
export function createTempFileChannelFactory(baseDir: string = tmpdir()): ResultChannelFactory {
  return {
    async open(): Promise<ResultChannel> {
      const dir = await fs.mkdtemp(join(baseDir, CHANNEL_PREFIX));
      const location = join(dir, ANSWER_FILE);
      await fs.writeFile(location, '', { mode: 0o600 });
      logger.debug(`Opened dialog result channel: ${location}`);
      return new TempFileChannel(dir, location);
    },

    exists(location: string): Promise<boolean> {
      return exists(location);
    }
  };
}
