// Lookup tables for the feed/hatch/sell loops. Magic hatching potions are not covered.

/** Non-magic hatching potion colors, in the order creatures are hatched. */
export const POTION_KINDS: readonly string[] = Object.freeze([
  'Base',
  'CottonCandyBlue',
  'CottonCandyPink',
  'Golden',
  'White',
  'Red',
  'Shade',
  'Skeleton',
  'Desert',
  'Zombie',
]);

export const IGNORE_FOOD = 'ignore';

/** Food name → pet color suffix it is the favourite of. */
export const FEEDING: Readonly<Record<string, string>> = Object.freeze({
  Saddle: IGNORE_FOOD,
  Meat: 'Base',
  CottonCandyBlue: 'CottonCandyBlue',
  CottonCandyPink: 'CottonCandyPink',
  Honey: 'Golden',
  Milk: 'White',
  Strawberry: 'Red',
  Chocolate: 'Shade',
  Fish: 'Skeleton',
  Potatoe: 'Desert',
  RottenMeat: 'Zombie',
});

export const PRIORITY = Object.freeze({
  easy: 1,
  medium: 1.5,
  hard: 2,
});

export type Difficulty = keyof typeof PRIORITY;

export function isDifficulty(value: string): value is Difficulty {
  return Object.prototype.hasOwnProperty.call(PRIORITY, value);
}

export const MAX_FED_LEVEL = 5;

/**
 * Suffix a food feeds best, or undefined when unknown.
 * Seasonal foods such as `Cake_Skeleton` carry the suffix after the first underscore.
 */
export function foodSuffix(food: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(FEEDING, food)) return FEEDING[food];
  const underscore = food.indexOf('_');
  if (underscore >= 0 && underscore < food.length - 1) {
    return food.slice(underscore + 1);
  }
  return undefined;
}
