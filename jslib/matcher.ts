// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

// Base interface for delimiter matchers
// Conceptually a search for the next delimiter occurrence in the remainder of a string

export interface Found {
  found: true,
  start: number,
  end: number,
}

export interface NotFound {
  found: false,
}

export type MatchResult = Found | NotFound;

// find() is only ever called with 0 <= from <= str.length
// A match must satisfy from <= start <= end <= str.length and may not be zero-width at `from`
export interface Matcher {
  find(str: string, from: number): MatchResult;
}

export const NOT_FOUND: NotFound = Object.freeze({ found: false });

export function found(start: number, end: number): Found {
  return { found: true, start, end };
}

// Matcher construction with an unusable delimiter
export class InvalidMatcherError extends Error {
  constructor(message: string, options?: { cause: unknown }) {
    super(message, options);
    this.name = 'InvalidMatcherError';
  }
}

// Matcher broke the contract above while scanning
export class InvalidMatcherResultError extends Error {
  constructor(message: string, options?: { cause: unknown }) {
    super(message, options);
    this.name = 'InvalidMatcherResultError';
  }
}
