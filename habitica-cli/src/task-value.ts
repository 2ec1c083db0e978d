// Task value curve published by Habitica: each score moves the value by BASE^value.
export const TASK_VALUE_BASE = 0.9747;

export type Direction = 'up' | 'down';

const SCORE_BREAKPOINTS: readonly number[] = [-20, -10, -1, 1, 5, 10];

/** Local estimate of a habit's value after scoring it; the server keeps the real one. */
export function projectHabitValue(value: number, direction: Direction): number {
  const delta = TASK_VALUE_BASE ** value;
  return direction === 'up' ? value + delta : value - delta;
}

export function qualitativeScore(value: number): string {
  let bucket = 0;
  while (bucket < SCORE_BREAKPOINTS.length && SCORE_BREAKPOINTS[bucket] <= value) {
    bucket += 1;
  }
  return '*'.repeat(bucket + 1);
}
