import type { Highlighter } from '../ports/highlighter.js';

/**
 * Search output that re-runs its query on every iteration.
 */
export class SearchResults implements AsyncIterable<string> {
  constructor(
    private readonly query: string,
    private readonly produce: () => AsyncIterable<string>,
    private readonly highlighter: Highlighter | null
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<string> {
    for await (const line of this.produce()) {
      yield this.highlighter ? this.highlighter.highlight(line, this.query) : line;
    }
  }
}
