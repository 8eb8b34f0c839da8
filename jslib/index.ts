// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

export { lex, tokenize, split, toMatcher, type Tag, type Delimiter } from '#tokenizer';
export { DEFAULT, UNBOUNDED, bounded, limitOf, checkLimit, InvalidLimitError, type Limit } from '#limit';
export {
  found,
  NOT_FOUND,
  InvalidMatcherError,
  InvalidMatcherResultError,
  type Found,
  type NotFound,
  type MatchResult,
  type Matcher,
} from '#matcher';
export { literal } from '#matcher/literal';
export { charClass } from '#matcher/charClass';
export { pattern, whitespace } from '#matcher/pattern';
export type { Token, LexStream } from '#types';
export { AssertionError } from '#util';
