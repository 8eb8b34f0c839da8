// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { devAssert } from '#util';
import { checkLimit, DEFAULT, limitOf, maxFields, trimsTrailing, type Limit } from '#limit';
import { InvalidMatcherResultError, type Found, type Matcher } from '#matcher';
import { literal } from '#matcher/literal';
import { pattern } from '#matcher/pattern';
import type { LexStream } from '#types';

export type Tag = 'field' | 'delim';

export type Delimiter = string | RegExp | Matcher;

function checkMatch(str: string, cursor: number, match: Found) {
  const { start, end } = match;
  const ok = Number.isInteger(start) && Number.isInteger(end)
    && cursor <= start && start <= end && end <= str.length
    && end > cursor;
  if (!ok) {
    throw new InvalidMatcherResultError(
      `Matcher returned [${start}, ${end}) searching from ${cursor} in string of length ${str.length}`);
  }
}

function* scan(str: string, matcher: Matcher, limit: Limit): LexStream<Tag> {
  const max = maxFields(limit);
  let cursor = 0, fields = 0;

  // once one field is left under the limit, stop searching and take the remainder whole
  while (fields < max - 1) {
    const match = matcher.find(str, cursor);
    if (!match.found) {
      break;
    }
    checkMatch(str, cursor, match);

    yield { tag: 'field', start: cursor, end: match.start };
    yield { tag: 'delim', start: match.start, end: match.end };
    cursor = match.end;
    fields += 1;
  }

  devAssert(cursor <= str.length);
  yield { tag: 'field', start: cursor, end: str.length };
}

// Splits str on matcher, as a stream of alternating <field> and <delim> spans
//
// Always starts and ends with a <field>, possibly empty; spans are contiguous and cover str.
// Limit is checked up front, so an invalid limit throws before the matcher is ever called.
// No trailing trim here, see tokenize().
export function lex(str: string, matcher: Matcher, limit: Limit = DEFAULT): LexStream<Tag> {
  checkLimit(limit);
  return scan(str, matcher, limit);
}

export function tokenize(str: string, matcher: Matcher, limit: Limit = DEFAULT): string[] {
  const fields: string[] = [];
  for (const { tag, start, end } of lex(str, matcher, limit)) {
    if (tag === 'field') {
      fields.push(str.substring(start, end));
    }
  }

  if (trimsTrailing(limit)) {
    while (fields.length > 0 && fields[fields.length - 1] === '') {
      fields.pop();
    }
  }
  return fields;
}

export function toMatcher(delimiter: Delimiter): Matcher {
  if (typeof delimiter === 'string') {
    return literal(delimiter);
  } else if (delimiter instanceof RegExp) {
    return pattern(delimiter);
  }
  return delimiter;
}

// Convenience using the nullable-integer limit convention, see limitOf()
export function split(str: string, delimiter: Delimiter, limit?: number): string[] {
  return tokenize(str, toMatcher(delimiter), limitOf(limit));
}
