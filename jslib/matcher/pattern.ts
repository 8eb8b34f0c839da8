// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { found, NOT_FOUND, type Matcher, type MatchResult } from '#matcher';

// General regex delimiter
//
// Searches with a private global copy, so the caller's lastIndex is never touched and
// sticky patterns lose their anchoring. A zero-width match exactly at `from` would split
// off nothing, so the search is retried one character on: /x*/ over "abc" splits
// between every character instead of looping.
export function pattern(re: RegExp): Matcher {
  const flags = re.flags.replace('y', '').replace('g', '') + 'g';
  const re_delim = new RegExp(re.source, flags);
  const byCodePoint = re.unicode || re.flags.includes('v');

  function step(str: string, i: number) {
    if (byCodePoint && (str.codePointAt(i) ?? 0) > 0xFFFF) {
      return i + 2;
    }
    return i + 1;
  }

  return {
    find(str: string, from: number): MatchResult {
      let i = from;
      while (i <= str.length) {
        re_delim.lastIndex = i;
        const match = re_delim.exec(str);
        if (match === null) {
          return NOT_FOUND;
        }

        const end = match.index + match[0].length;
        if (end > from) {
          return found(match.index, end);
        }
        i = step(str, from);
      }
      return NOT_FOUND;
    },
  };
}

// Maximal run of whitespace
export const whitespace: Matcher = pattern(/\s+/);
