import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createManagerRegistry, resolveManagerKind } from '../../../src/core/package-managers/registry.js';
import { AptGetPackageManager } from '../../../src/core/package-managers/apt-get.js';
import { PacmanPackageManager } from '../../../src/core/package-managers/pacman.js';
import { UnsupportedPackageManager } from '../../../src/core/package-managers/unsupported.js';
import { RecordingRunner } from '../../fakes.js';

describe('resolveManagerKind', () => {
  it('maps apt names to apt-get', () => {
    assert.deepEqual(resolveManagerKind('apt-get'), { kind: 'apt-get' });
    assert.deepEqual(resolveManagerKind('apt'), { kind: 'apt-get' });
    assert.deepEqual(resolveManagerKind(' APT-GET '), { kind: 'apt-get' });
  });

  it('maps pacman', () => {
    assert.deepEqual(resolveManagerKind('pacman'), { kind: 'pacman' });
    assert.deepEqual(resolveManagerKind('Pacman'), { kind: 'pacman' });
  });

  it('keeps the raw value of anything else', () => {
    assert.deepEqual(resolveManagerKind('dnf'), { kind: 'unsupported', raw: 'dnf' });
    assert.deepEqual(resolveManagerKind(' yum '), { kind: 'unsupported', raw: ' yum ' });
    assert.deepEqual(resolveManagerKind('constructor'), { kind: 'unsupported', raw: 'constructor' });
  });

  it('treats empty and absent values as unsupported', () => {
    assert.deepEqual(resolveManagerKind(''), { kind: 'unsupported', raw: '' });
    assert.deepEqual(resolveManagerKind(undefined), { kind: 'unsupported', raw: '' });
  });
});

describe('createManagerRegistry', () => {
  const registry = createManagerRegistry({
    runner: new RecordingRunner(),
    assumeYes: false,
    highlighter: null,
    warn: () => undefined
  });

  it('returns one adapter class per kind', () => {
    assert.ok(registry.adapterFor({ kind: 'apt-get' }) instanceof AptGetPackageManager);
    assert.ok(registry.adapterFor({ kind: 'pacman' }) instanceof PacmanPackageManager);
    const unsupported = registry.adapterFor({ kind: 'unsupported', raw: 'zypper' });
    assert.ok(unsupported instanceof UnsupportedPackageManager);
    assert.deepEqual(unsupported.kind, { kind: 'unsupported', raw: 'zypper' });
  });
});
