// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

/* v8 ignore start */
export class AssertionError extends Error {
  constructor(message = 'assertion failed') {
    super(message);
    this.name = 'AssertionError';
  }
}

export function devAssert(p: unknown, message?: string): asserts p {
  if (!import.meta.env.PROD && !p) {
    throw new AssertionError(message);
  }
}

export function exhaustive(p: never): never {
  throw new AssertionError(`unhandled variant ${JSON.stringify(p)}`);
}
/* v8 ignore stop */
