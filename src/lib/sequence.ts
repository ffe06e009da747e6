/**
 * Sequence Parsing
 *
 * Parses compact numeric range expressions such as "1,3..5" into sorted,
 * de-duplicated integer lists. Used for inventory group membership.
 */

import { SequenceError } from '../core/errors.js';

/**
 * Range token: two non-negative integers joined by "..", ":" or "-".
 */
const RANGE_PATTERN = /^(\d+)\s*(?:\.\.|:|-)\s*(\d+)$/;

const NUMBER_PATTERN = /^\d+$/;

/**
 * Parse a sequence expression.
 *
 * @param text - Comma separated numbers and ranges, e.g. "1,2..3"
 * @returns Sorted unique integers covered by the expression
 * @throws SequenceError naming the first invalid token
 */
export function parseSequence(text: string): number[] {
  const numbers = new Set<number>();

  for (const rawToken of text.split(',')) {
    const token = rawToken.trim();
    if (token === '') {
      continue;
    }

    if (NUMBER_PATTERN.test(token)) {
      numbers.add(Number.parseInt(token, 10));
      continue;
    }

    const match = RANGE_PATTERN.exec(token);
    if (!match?.[1] || !match[2]) {
      throw new SequenceError(`Invalid sequence token '${token}'`, token);
    }

    const first = Number.parseInt(match[1], 10);
    const last = Number.parseInt(match[2], 10);
    if (first > last) {
      throw new SequenceError(`Invalid sequence token '${token}'`, token);
    }

    for (let n = first; n <= last; n++) {
      numbers.add(n);
    }
  }

  return Array.from(numbers).sort((a, b) => a - b);
}

/**
 * Render numbers in the compact form parseSequence reads back, e.g.
 * [1, 2, 3, 5] as "1..3,5". Runs shorter than three stay listed.
 */
export function formatSequence(numbers: Iterable<number>): string {
  const sorted = Array.from(new Set(numbers)).sort((a, b) => a - b);
  const tokens: string[] = [];

  let start = 0;
  while (start < sorted.length) {
    let end = start;
    while (end + 1 < sorted.length && sorted[end + 1] === (sorted[end] ?? 0) + 1) {
      end++;
    }
    if (end - start >= 2) {
      tokens.push(`${sorted[start]}..${sorted[end]}`);
    } else {
      tokens.push(...sorted.slice(start, end + 1).map(String));
    }
    start = end + 1;
  }

  return tokens.join(',');
}
