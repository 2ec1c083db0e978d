import { repeatOp, submitOps, type LoopResult, type Reporter } from './batch.js';
import { InvariantError } from './errors.js';
import { countOf, type InventorySnapshot } from './inventory.js';
import { POTION_KINDS } from './stable.js';
import type { BatchApi } from './types.js';
import { plural } from './utils.js';

export const SELL_ALL = 'all';

export interface SellStep {
  potion: string;
  quantity: number;
}

export function expandPotionKinds(requested: readonly string[]): string[] {
  if (requested.length === 1 && requested[0] === SELL_ALL) return POTION_KINDS.slice();
  return Array.from(new Set(requested));
}

/** First requested potion kind still held, or null when nothing is left to sell. */
export function planPotionSale(snapshot: InventorySnapshot, kinds: readonly string[]): SellStep | null {
  for (const potion of kinds) {
    const quantity = countOf(snapshot.hatchingPotions, potion);
    if (quantity > 0) return { potion, quantity };
  }
  return null;
}

/**
 * Sells every held unit of each requested hatching potion kind, one batched
 * request per kind. Unknown and unheld kinds are reported and skipped.
 */
export async function sellPotions(
  api: BatchApi,
  initial: InventorySnapshot,
  requested: readonly string[],
  report: Reporter
): Promise<LoopResult<SellStep>> {
  const sellable: string[] = [];
  for (const potion of expandPotionKinds(requested)) {
    if (!POTION_KINDS.includes(potion)) {
      report(`That isn't a valid kind of potion: ${potion}`);
    } else if (countOf(initial.hatchingPotions, potion) <= 0) {
      report(`You don't have any ${potion} potions.`);
    } else {
      sellable.push(potion);
    }
  }

  const steps: SellStep[] = [];
  let snapshot = initial;
  for (;;) {
    const step = planPotionSale(snapshot, sellable);
    if (!step) break;

    report(`Selling ${step.quantity} ${step.potion} ${plural(step.quantity, 'potion')}`);
    const ops = repeatOp({ op: 'sell', params: { type: 'hatchingPotions', key: step.potion } }, step.quantity);
    snapshot = await submitOps(api, ops);
    steps.push(step);
    if (countOf(snapshot.hatchingPotions, step.potion) !== 0) {
      throw new InvariantError(`failed to sell ${step.potion} potion`);
    }
  }

  return { snapshot, steps };
}
