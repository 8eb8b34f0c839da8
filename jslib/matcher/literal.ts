// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { found, InvalidMatcherError, NOT_FOUND, type Matcher, type MatchResult } from '#matcher';

// Exact substring; never zero-width
export function literal(delim: string): Matcher {
  if (delim.length === 0) {
    throw new InvalidMatcherError('Literal delimiter must be nonempty');
  }

  return {
    find(str: string, from: number): MatchResult {
      const start = str.indexOf(delim, from);
      return start < 0 ? NOT_FOUND : found(start, start + delim.length);
    },
  };
}
