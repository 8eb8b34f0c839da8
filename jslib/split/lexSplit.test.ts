// Copyright Jeffrey Tsang <jeffrey.tsang@ieee.org>
// GNU AGPL, 3.0 or later <https://www.gnu.org/licenses/agpl-3.0.html>

import { expect, test } from 'vitest';
import fc from 'fast-check';
import type { Arbitrary } from 'fast-check';
import { lex, type Tag } from '#tokenizer';
import { bounded, DEFAULT, UNBOUNDED, type Limit } from '#limit';
import { literal } from '#matcher/literal';
import { charClass } from '#matcher/charClass';
import type { Token } from '#types';
import { arbCount, arbInput, DELIM } from '#split/tokenize.arbitrary';

const comma = literal(DELIM);

test('empty string lexes as a single empty field', () => {
  expect(Array.from(lex('', comma))).toEqual([{ tag: 'field', start: 0, end: 0 }]);
});

test('delimiters are reported between fields', () => {
  expect(Array.from(lex('ab,,c', comma))).toEqual([
    { tag: 'field', start: 0, end: 2 },
    { tag: 'delim', start: 2, end: 3 },
    { tag: 'field', start: 3, end: 3 },
    { tag: 'delim', start: 3, end: 4 },
    { tag: 'field', start: 4, end: 5 },
  ]);
});

test('astral class member is a two code unit delimiter', () => {
  const str = 'a\u{1F600}b';
  expect(Array.from(lex(str, charClass(['\u{1F600}'])))).toEqual([
    { tag: 'field', start: 0, end: 1 },
    { tag: 'delim', start: 1, end: 3 },
    { tag: 'field', start: 3, end: 4 },
  ]);
});

const arbLimit: Arbitrary<Limit> = fc.oneof(
  fc.constant(DEFAULT),
  fc.constant(UNBOUNDED),
  arbCount.map(bounded),
);

function checkHarness(predicate: (s: string, r: Token<Tag>[]) => void) {
  fc.assert(
    fc.property(arbInput, arbLimit, (str, limit) => {
      predicate(str, Array.from(lex(str, comma, limit)));
    }),
    { examples: [['', DEFAULT], [',', UNBOUNDED], ['a,b,', bounded(2)]] },
  );
}

test('first token is a field starting at 0', () => {
  checkHarness((_str, result) => {
    expect(result[0].tag).toBe('field');
    expect(result[0].start).toBe(0);
  });
});

test('adjacent tokens are contiguous', () => {
  checkHarness((_str, result) => {
    for (let i = 0; i < result.length - 1; i++) {
      expect(result[i].end).toBe(result[i + 1].start);
    }
  });
});

test('last token is a field ending at end of input', () => {
  checkHarness((str, result) => {
    expect(result[result.length - 1].tag).toBe('field');
    expect(result[result.length - 1].end).toBe(str.length);
  });
});

test('fields and delimiters alternate', () => {
  checkHarness((_str, result) => {
    result.forEach(({ tag }, i) => {
      expect(tag).toBe(i % 2 === 0 ? 'field' : 'delim');
    });
  });
});

test('every delimiter span is the delimiter text', () => {
  checkHarness((str, result) => {
    result.filter(({ tag }) => tag === 'delim')
      .forEach(({ start, end }) => {
        expect(str.substring(start, end)).toBe(DELIM);
      });
  });
});

test('spans reconstruct the input', () => {
  checkHarness((str, result) => {
    expect(result.map(({ start, end }) => str.substring(start, end)).join('')).toBe(str);
  });
});

test('bounded limit caps the number of fields', () => {
  fc.assert(
    fc.property(arbInput, arbCount, (str, n) => {
      const fields = Array.from(lex(str, comma, bounded(n))).filter(({ tag }) => tag === 'field');
      expect(fields.length).toBeLessThanOrEqual(n);
    }),
  );
});
