import { repeatOp, submitOps, type LoopResult, type Reporter } from './batch.js';
import { InvariantError } from './errors.js';
import { UNHATCHED, countOf, fedLevel, hasMount, type InventorySnapshot } from './inventory.js';
import { POTION_KINDS } from './stable.js';
import type { BatchApi } from './types.js';
import { plural } from './utils.js';

export type HatchStep =
  | { kind: 'hatch'; egg: string; potion: string; creature: string }
  | { kind: 'sell'; egg: string; quantity: number; before: number };

/** Eggs of one type, after every creature they could still hatch has hatched. */
export interface EggAssessment {
  egg: string;
  count: number;
  needed: number;
  needing: string[];
}

export interface HatchPlan {
  step: HatchStep | null;
  assessed: EggAssessment[];
}

export function creaturesFor(egg: string): string[] {
  return POTION_KINDS.map((kind) => `${egg}-${kind}`);
}

/** Eggs still worth keeping: one per missing mount plus one per unhatched pet. */
export function assessEgg(snapshot: InventorySnapshot, egg: string): EggAssessment {
  const needing: string[] = [];
  for (const creature of creaturesFor(egg)) {
    if (!hasMount(snapshot, creature)) needing.push(`${creature} [m]`);
    if (fedLevel(snapshot, creature) === UNHATCHED) needing.push(`${creature} [p]`);
  }
  return { egg, count: countOf(snapshot.eggs, egg), needed: needing.length, needing };
}

export function planHatch(snapshot: InventorySnapshot): HatchPlan {
  const assessed: EggAssessment[] = [];
  for (const [egg, count] of Object.entries(snapshot.eggs)) {
    if (count <= 0) continue;

    for (const potion of POTION_KINDS) {
      const creature = `${egg}-${potion}`;
      if (fedLevel(snapshot, creature) !== UNHATCHED) continue;
      if (countOf(snapshot.hatchingPotions, potion) <= 0) continue;
      return { step: { kind: 'hatch', egg, potion, creature }, assessed };
    }

    const assessment = assessEgg(snapshot, egg);
    assessed.push(assessment);
    const excess = assessment.count - assessment.needed;
    if (excess > 0) {
      return { step: { kind: 'sell', egg, quantity: excess, before: assessment.count }, assessed };
    }
  }
  return { step: null, assessed };
}

function formatAssessment(assessment: EggAssessment): string {
  const detail = assessment.needing.length > 0 ? ` (${assessment.needing.join(', ')})` : '';
  return `${assessment.egg}: need ${assessment.needed}${detail} of ${assessment.count}`;
}

/**
 * Hatches every egg that has a matching potion and no pet yet, then sells the
 * eggs that no future pet or mount will need.
 */
export async function hatchAll(
  api: BatchApi,
  initial: InventorySnapshot,
  report: Reporter
): Promise<LoopResult<HatchStep>> {
  const steps: HatchStep[] = [];
  const reported = new Set<string>();
  let snapshot = initial;

  for (;;) {
    const { step, assessed } = planHatch(snapshot);
    for (const assessment of assessed) {
      if (reported.has(assessment.egg)) continue;
      reported.add(assessment.egg);
      report(formatAssessment(assessment));
    }
    if (!step) break;

    if (step.kind === 'hatch') {
      report(`Hatching a ${step.potion} ${step.egg}`);
      snapshot = await submitOps(api, [{ op: 'hatch', params: { egg: step.egg, hatchingPotion: step.potion } }]);
      steps.push(step);
      if (fedLevel(snapshot, step.creature) === UNHATCHED) {
        throw new InvariantError(`failed to hatch ${step.creature}`);
      }
      continue;
    }

    report(`Selling ${step.quantity} ${step.egg} ${plural(step.quantity, 'egg')}`);
    const ops = repeatOp({ op: 'sell', params: { type: 'eggs', key: step.egg } }, step.quantity);
    snapshot = await submitOps(api, ops);
    steps.push(step);
    if (countOf(snapshot.eggs, step.egg) !== step.before - step.quantity) {
      throw new InvariantError(`failed to sell ${step.egg} egg`);
    }
  }

  return { snapshot, steps };
}
