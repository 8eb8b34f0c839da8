// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { exhaustive } from '#util';

export class InvalidLimitError extends Error {
  constructor(message: string, options?: { cause: unknown }) {
    super(message, options);
    this.name = 'InvalidLimitError';
  }
}

// Split everything, then drop trailing empty fields
interface Default {
  mode: 'default';
}

// Split everything, keep every empty field
interface Unbounded {
  mode: 'unbounded';
}

// At most `count` fields, the last one absorbing the rest of the input
interface Bounded {
  mode: 'bounded';
  count: number;
}

export type Limit = Default | Unbounded | Bounded;

export const DEFAULT: Limit = Object.freeze({ mode: 'default' });
export const UNBOUNDED: Limit = Object.freeze({ mode: 'unbounded' });

function isCount(n: number) {
  return Number.isInteger(n) && n >= 1;
}

export function bounded(count: number): Limit {
  if (!isCount(count)) {
    throw new InvalidLimitError(`Bounded split needs a positive integer count, got {${count}}`);
  }
  return { mode: 'bounded', count };
}

// Nullable-integer convention: absent => default, -1 => unbounded, N >= 1 => at most N fields
// 0 and other negatives have no meaning and are rejected
export function limitOf(value?: number): Limit {
  if (value === undefined) {
    return DEFAULT;
  } else if (value === -1) {
    return UNBOUNDED;
  } else if (isCount(value)) {
    return bounded(value);
  }
  throw new InvalidLimitError(`Split limit must be absent, -1 or a positive integer, got {${value}}`);
}

// For Limit values built by hand rather than through bounded()
export function checkLimit(limit: Limit): void {
  switch (limit.mode) {
    case 'default':
    case 'unbounded':
      return;
    case 'bounded':
      bounded(limit.count);
      return;
    /* v8 ignore next */ default: exhaustive(limit);
  }
}

// Number of fields a scan may emit before the remainder is taken whole
export function maxFields(limit: Limit): number {
  switch (limit.mode) {
    case 'default':
    case 'unbounded':
      return Infinity;
    case 'bounded':
      return limit.count;
    /* v8 ignore next */ default: return exhaustive(limit);
  }
}

// Only the default mode trims trailing empty fields
export function trimsTrailing(limit: Limit): boolean {
  return limit.mode === 'default';
}
