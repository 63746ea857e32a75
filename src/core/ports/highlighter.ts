/**
 * Highlighter Port
 *
 * Marks occurrences of a search query inside one line of backend output.
 */
export interface Highlighter {
  highlight(line: string, query: string): string;
}
