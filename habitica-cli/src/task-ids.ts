import { ParseError, TaskIndexError } from './errors.js';

const INTEGER = /^\d+$/;

/** Widest range accepted; no task list comes close to it. */
export const MAX_RANGE_SIZE = 10000;

/**
 * Resolves user-facing task ids into zero-based list indices.
 *
 * Accepts the forms people type on the command line:
 *   habitica todos done 3
 *   habitica todos done 1,2,3
 *   habitica todos done 2 3
 *   habitica todos done 1-3,4 8
 *
 * Throws ParseError on the first malformed piece, so callers can parse
 * everything before touching the server.
 */
export function parseTaskIds(tokens: readonly string[]): Set<number> {
  const ids = new Set<number>();
  for (const token of tokens) {
    for (const raw of token.split(',')) {
      const piece = raw.trim();
      if (piece.includes('-')) {
        const bounds = piece.split('-');
        if (bounds.length !== 2) {
          throw new ParseError(piece, 'a range needs exactly two endpoints');
        }
        const start = parseId(bounds[0], piece);
        const stop = parseId(bounds[1], piece);
        if (start > stop) {
          throw new ParseError(piece, 'range start is after its end');
        }
        if (stop - start + 1 > MAX_RANGE_SIZE) {
          throw new ParseError(piece, `a range may cover at most ${MAX_RANGE_SIZE} ids`);
        }
        for (let id = start; id <= stop; id += 1) ids.add(id);
      } else {
        ids.add(parseId(piece, piece));
      }
    }
  }
  return new Set(Array.from(ids, (id) => id - 1));
}

function parseId(value: string, piece: string): number {
  const text = value.trim();
  if (!INTEGER.test(text)) {
    throw new ParseError(piece, `"${text}" is not a number`);
  }
  const id = Number(text);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ParseError(piece, 'ids start at 1');
  }
  return id;
}

export function sortedAscending(indices: Iterable<number>): number[] {
  return Array.from(indices).sort((a, b) => a - b);
}

/**
 * Returns a copy of `list` without the entries at `indices`.
 * Removal runs from the highest index down so earlier removals never shift
 * the positions still to be removed.
 */
export function removeAtIndices<T>(list: readonly T[], indices: ReadonlySet<number>): T[] {
  const result = list.slice();
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= result.length) {
      throw new TaskIndexError(index, result.length);
    }
  }
  for (const index of sortedAscending(indices).reverse()) {
    result.splice(index, 1);
  }
  return result;
}
