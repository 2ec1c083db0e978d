import { snapshotFromUser, type InventorySnapshot } from './inventory.js';
import type { BatchApi, BatchOp } from './types.js';

export type Reporter = (line: string) => void;

export interface LoopResult<Step> {
  snapshot: InventorySnapshot;
  steps: Step[];
}

/** Submits one batch-update round-trip and returns the snapshot the server answered with. */
export async function submitOps(api: BatchApi, ops: BatchOp[]): Promise<InventorySnapshot> {
  const user = await api.postBatchOps('user', ops);
  return snapshotFromUser(user);
}

export function repeatOp(op: BatchOp, times: number): BatchOp[] {
  return Array.from({ length: times }, () => ({ op: op.op, params: { ...op.params } }));
}
