import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { CategoryCatalog } from '../../../src/core/catalog/category-catalog.js';
import { runBulkInstallFlow } from '../../../src/core/install/bulk-install.js';
import { createManagerRegistry } from '../../../src/core/package-managers/registry.js';
import { INSTALL_TAG } from '../../../src/core/selection/selection-session.js';
import { CommandFailedError } from '../../../src/utils/errors.js';
import { MemoryChannelFactory, RecordingOutput, RecordingRunner, ScriptedDialog, testConfig } from '../../fakes.js';

function catalog(): CategoryCatalog {
  return new CategoryCatalog({
    order: ['core', 'pip', 'optional', 'apps'],
    categories: {
      core: ['git', 'vim', 'curl'],
      pip: ['python3-pip', 'python3-venv'],
      optional: ['fzf', 'ripgrep'],
      apps: ['firefox', 'vlc']
    }
  });
}

function context(managerValue: string, runner: RecordingRunner) {
  const config = testConfig(managerValue);
  const registry = createManagerRegistry({ runner, assumeYes: false, highlighter: null, warn: () => undefined });
  return { config, output: new RecordingOutput(), adapter: registry.adapterFor(config.manager) };
}

// core: git + vim, optional and pip cancelled, apps: vlc, then confirm
const scenario = () => new ScriptedDialog([
  { outcome: 'ok', raw: 'core' },
  { outcome: 'ok', raw: '"git" "vim"' },
  { outcome: 'ok', raw: 'optional' },
  { outcome: 'cancel' },
  { outcome: 'ok', raw: 'pip' },
  { outcome: 'cancel' },
  { outcome: 'ok', raw: 'apps' },
  { outcome: 'ok', raw: '"vlc"' },
  { outcome: 'ok', raw: INSTALL_TAG },
  { outcome: 'ok' }
]);

describe('runBulkInstallFlow', () => {
  it('installs the confirmed selection category by category', async () => {
    const runner = new RecordingRunner();
    const ctx = context('apt-get', runner);

    const outcome = await runBulkInstallFlow(ctx, {
      catalog: catalog(),
      dialog: scenario(),
      channels: new MemoryChannelFactory()
    });

    assert.ok(outcome.status === 'completed');
    assert.deepEqual(outcome.report.entries, [
      { categoryId: 'core', outcome: { status: 'succeeded', packages: ['git', 'vim'] } },
      { categoryId: 'pip', outcome: { status: 'skipped-empty' } },
      { categoryId: 'optional', outcome: { status: 'skipped-empty' } },
      { categoryId: 'apps', outcome: { status: 'succeeded', packages: ['vlc'] } }
    ]);
    assert.deepEqual(runner.calls.map(call => call.invocation), [
      { command: 'apt-get', args: ['install', 'git', 'vim'], privileged: true },
      { command: 'apt-get', args: ['install', 'vlc'], privileged: true }
    ]);
    assert.deepEqual(ctx.output.lines, [
      'step: Installing core: git vim',
      'step: Installing apps: vlc',
      'success: core: 2 package(s) installed',
      'message: pip: nothing selected',
      'message: optional: nothing selected',
      'success: apps: 1 package(s) installed',
      'info: 2 succeeded, 0 failed, 2 skipped'
    ]);
  });

  it('records a failing category and still installs the rest', async () => {
    const runner = new RecordingRunner();
    runner.failOn.set('-S git vim', new CommandFailedError('pacman -S git vim', 1));
    const ctx = context('pacman', runner);

    const outcome = await runBulkInstallFlow(ctx, {
      catalog: catalog(),
      dialog: scenario(),
      channels: new MemoryChannelFactory()
    });

    assert.ok(outcome.status === 'completed');
    assert.deepEqual(outcome.report.entries.map(entry => entry.outcome.status), [
      'failed', 'skipped-empty', 'skipped-empty', 'succeeded'
    ]);
    assert.equal(runner.calls.length, 2);
  });

  it('stops before any dialog when the manager is unsupported', async () => {
    const runner = new RecordingRunner();
    const ctx = context('', runner);
    const dialog = scenario();

    const outcome = await runBulkInstallFlow(ctx, { catalog: catalog(), dialog, channels: new MemoryChannelFactory() });

    assert.deepEqual(outcome, { status: 'unsupported-manager' });
    assert.equal(dialog.requests.length, 0);
    assert.equal(runner.calls.length, 0);
    assert.deepEqual(ctx.output.lines, [
      "warn: No supported package manager configured (got ''); nothing to install."
    ]);
  });

  it('warns and stops when the dialog is unavailable', async () => {
    const runner = new RecordingRunner();
    const ctx = context('apt-get', runner);

    const outcome = await runBulkInstallFlow(ctx, {
      catalog: catalog(),
      dialog: new ScriptedDialog([], false),
      channels: new MemoryChannelFactory()
    });

    assert.deepEqual(outcome, { status: 'dialog-unavailable' });
    assert.deepEqual(ctx.output.lines, ["warn: Interactive dialog 'scripted' is not available"]);
    assert.equal(runner.calls.length, 0);
  });

  it('installs nothing when the session is aborted', async () => {
    const runner = new RecordingRunner();
    const ctx = context('apt-get', runner);

    const outcome = await runBulkInstallFlow(ctx, {
      catalog: catalog(),
      dialog: new ScriptedDialog([{ outcome: 'ok', raw: 'core' }, { outcome: 'ok', raw: '"git"' }, { outcome: 'cancel' }]),
      channels: new MemoryChannelFactory()
    });

    assert.deepEqual(outcome, { status: 'aborted' });
    assert.equal(runner.calls.length, 0);
    assert.deepEqual(ctx.output.lines, ['info: Installation cancelled.']);
  });
});
