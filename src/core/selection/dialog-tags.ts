import type { DialogMode } from '../ports/dialog.js';

const QUOTES = /["']/g;

/**
 * Strip the quote characters dialog transports wrap around tags.
 */
export function sanitizeDialogTag(tag: string): string {
  return tag.replace(QUOTES, '').trim();
}

/**
 * Decode a raw dialog answer into clean tags. Multi-choice answers are
 * whitespace separated; a single-choice answer is one tag.
 */
export function sanitizeDialogTags(raw: string, mode: DialogMode): string[] {
  const parts = mode === 'multi' ? raw.split(/\s+/) : [raw];
  return parts.map(sanitizeDialogTag).filter(tag => tag.length > 0);
}
