// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import fc from 'fast-check';
import type { Arbitrary } from 'fast-check';

// Field text never contains the delimiter; units cover single/multi code unit and astral characters
const fieldUnit = fc.constantFrom('a', 'b', ' ', 'က', String.fromCodePoint(0x10300), 'cd');

export const DELIM = ',';

export function arbField(maxLength = 6): Arbitrary<string> {
  return fc.string({ unit: fieldUnit, maxLength });
}

// Nonempty list of fields, possibly empty ones, so joins can start/end with or repeat the delimiter
export const arbFields: Arbitrary<string[]> = fc.array(arbField(), { minLength: 1, maxLength: 8 });

// Raw input with delimiters anywhere, including adjacent and trailing
export const arbInput: Arbitrary<string> = fc.string({
  unit: fc.oneof(fieldUnit, fc.constant(DELIM)),
  maxLength: 24,
});

export const arbCount: Arbitrary<number> = fc.integer({ min: 1, max: 10 });

export function countDelims(str: string): number {
  return str.split(DELIM).length - 1;
}
