import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { sanitizeDialogTag, sanitizeDialogTags } from '../../../src/core/selection/dialog-tags.js';
import { encodeDialogTags } from '../../../src/core/ports/dialog.js';

describe('dialog tag sanitising', () => {
  it('strips single and double quotes', () => {
    assert.equal(sanitizeDialogTag('"vim"'), 'vim');
    assert.equal(sanitizeDialogTag("'git'"), 'git');
    assert.equal(sanitizeDialogTag(' "py\'thon" '), 'python');
  });

  it('splits checklist answers on whitespace', () => {
    assert.deepEqual(sanitizeDialogTags('"vim" "git"\n', 'multi'), ['vim', 'git']);
    assert.deepEqual(sanitizeDialogTags('vim git', 'multi'), ['vim', 'git']);
    assert.deepEqual(sanitizeDialogTags('  ', 'multi'), []);
  });

  it('reads a menu answer as one tag', () => {
    assert.deepEqual(sanitizeDialogTags('"core"\n', 'single'), ['core']);
    assert.deepEqual(sanitizeDialogTags('', 'single'), []);
  });

  it('decodes what encodeDialogTags writes', () => {
    const tags = ['git', 'python3-pip'];
    assert.equal(encodeDialogTags(tags, 'multi'), '"git" "python3-pip"');
    assert.deepEqual(sanitizeDialogTags(encodeDialogTags(tags, 'multi'), 'multi'), tags);
    assert.equal(encodeDialogTags(['apps'], 'single'), 'apps');
    assert.equal(encodeDialogTags([], 'single'), '');
  });
});
