import pc from 'picocolors';

import type { Highlighter } from '../core/ports/highlighter.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Highlight query matches in bold red. Returns null when the terminal
 * cannot show colour, so callers fall back to plain output.
 */
export function createColorHighlighter(enabled: boolean = pc.isColorSupported): Highlighter | null {
  if (!enabled) {
    return null;
  }
  const colors = pc.createColors(true);

  return {
    highlight(line: string, query: string): string {
      if (query === '') {
        return line;
      }
      const pattern = new RegExp(escapeRegExp(query), 'gi');
      return line.replace(pattern, match => colors.bold(colors.red(match)));
    }
  };
}
