import { submitOps, type LoopResult, type Reporter } from './batch.js';
import { InvariantError } from './errors.js';
import { countOf, hasMount, type InventorySnapshot } from './inventory.js';
import { IGNORE_FOOD, MAX_FED_LEVEL, foodSuffix } from './stable.js';
import type { BatchApi } from './types.js';

export interface FeedStep {
  food: string;
  pet: string;
}

export interface FeedPlan {
  step: FeedStep | null;
  unknownFoods: string[];
}

/**
 * Picks the next food to feed and the pet to feed it to.
 * Among pets matching the food's suffix, the one closest to becoming a mount wins.
 */
export function planFeed(snapshot: InventorySnapshot): FeedPlan {
  const unknownFoods: string[] = [];
  for (const [food, count] of Object.entries(snapshot.food)) {
    if (count <= 0) continue;
    const suffix = foodSuffix(food);
    if (suffix === undefined) {
      unknownFoods.push(food);
      continue;
    }
    if (suffix === IGNORE_FOOD) continue;

    let mouth: string | null = null;
    let best = 0;
    for (const [pet, fed] of Object.entries(snapshot.pets)) {
      if (fed <= 0) continue;
      if (fed === MAX_FED_LEVEL && hasMount(snapshot, pet)) continue;
      if (!pet.endsWith(`-${suffix}`)) continue;
      if (fed > best) {
        best = fed;
        mouth = pet;
      }
    }
    if (mouth) {
      return { step: { food, pet: mouth }, unknownFoods };
    }
  }
  return { step: null, unknownFoods };
}

export function describePet(pet: string): string {
  return pet.split('-').reverse().join(' ');
}

export async function feedAll(
  api: BatchApi,
  initial: InventorySnapshot,
  report: Reporter
): Promise<LoopResult<FeedStep>> {
  const steps: FeedStep[] = [];
  const reported = new Set<string>();
  let snapshot = initial;

  for (;;) {
    const plan = planFeed(snapshot);
    for (const food of plan.unknownFoods) {
      if (reported.has(food)) continue;
      reported.add(food);
      report(`Unknown food: ${food}`);
    }
    const { step } = plan;
    if (!step) break;

    report(`Feeding ${step.food} to ${describePet(step.pet)}`);
    const before = countOf(snapshot.food, step.food);
    snapshot = await submitOps(api, [{ op: 'feed', params: { pet: step.pet, food: step.food } }]);
    steps.push(step);
    if (countOf(snapshot.food, step.food) !== before - 1) {
      throw new InvariantError(`failed to feed ${step.food} to ${step.pet}`);
    }
  }

  return { snapshot, steps };
}
