import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import pc from 'picocolors';

import { createColorHighlighter } from '../../src/cli/color-highlighter.js';

describe('createColorHighlighter', () => {
  const colors = pc.createColors(true);
  const mark = (text: string) => colors.bold(colors.red(text));

  it('is unavailable without colour support', () => {
    assert.equal(createColorHighlighter(false), null);
  });

  it('marks every match, ignoring case', () => {
    const highlighter = createColorHighlighter(true);
    assert.ok(highlighter);
    assert.equal(
      highlighter.highlight('Vim - vi improved', 'vim'),
      `${mark('Vim')} - vi improved`
    );
    assert.equal(
      highlighter.highlight('neovim, gvim', 'vim'),
      `neo${mark('vim')}, g${mark('vim')}`
    );
  });

  it('treats the query literally', () => {
    const highlighter = createColorHighlighter(true);
    assert.ok(highlighter);
    assert.equal(highlighter.highlight('libc++ and libc', 'c++'), `lib${mark('c++')} and libc`);
    assert.equal(highlighter.highlight('anything', ''), 'anything');
  });
});
