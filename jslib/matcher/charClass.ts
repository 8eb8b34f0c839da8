// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { found, InvalidMatcherError, NOT_FOUND, type Matcher, type MatchResult } from '#matcher';

// Any single member of a set of characters
// Members are whole code points, so an astral character is a 2 code unit match
export function charClass(chars: Iterable<string>): Matcher {
  const members = new Set<number>();
  for (const s of chars) {
    for (const c of s) {
      // iterating a string yields code points, so codePointAt(0) is always defined
      members.add(c.codePointAt(0) ?? 0);
    }
  }
  if (members.size === 0) {
    throw new InvalidMatcherError('Character class must have at least one member');
  }

  return {
    find(str: string, from: number): MatchResult {
      let i = from;
      while (i < str.length) {
        const cp = str.codePointAt(i) ?? 0;
        const width = cp > 0xFFFF ? 2 : 1;
        if (members.has(cp)) {
          return found(i, i + width);
        }
        i += width;
      }
      return NOT_FOUND;
    },
  };
}
