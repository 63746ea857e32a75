import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readdir, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

import { createTempFileChannelFactory } from '../../../src/core/dialog/temp-file-channel.js';

describe('temp-file result channel', () => {
  let base: string;

  beforeEach(async () => {
    base = await mkdtemp(join(tmpdir(), 'pkgdeck-channel-test-'));
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it('creates an empty private file under the base directory', async () => {
    const factory = createTempFileChannelFactory(base);
    const channel = await factory.open();

    assert.equal(dirname(dirname(channel.location)), base);
    assert.equal(await factory.exists(channel.location), true);
    assert.equal((await stat(channel.location)).mode & 0o777, 0o600);
    assert.equal(await channel.read(), '');
    await channel.release();
  });

  it('round-trips what the dialog wrote', async () => {
    const channel = await createTempFileChannelFactory(base).open();
    await channel.write('"git" "vim"');
    assert.equal(await channel.read(), '"git" "vim"');
    await channel.release();
  });

  it('can be read only once', async () => {
    const channel = await createTempFileChannelFactory(base).open();
    await channel.read();
    await assert.rejects(channel.read(), /already read/);
    await channel.release();
  });

  it('removes its directory on release', async () => {
    const factory = createTempFileChannelFactory(base);
    const channel = await factory.open();

    await channel.release();

    assert.equal(await factory.exists(channel.location), false);
    assert.deepEqual(await readdir(base), []);
  });

  it('gives every open call its own location', async () => {
    const factory = createTempFileChannelFactory(base);
    const first = await factory.open();
    const second = await factory.open();
    assert.notEqual(first.location, second.location);
    await first.release();
    await second.release();
  });
});
