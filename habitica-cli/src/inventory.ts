import type { User } from './schemas.js';

export const UNHATCHED = -1;

export type CountMap = Readonly<Record<string, number>>;

export interface InventorySnapshot {
  readonly food: CountMap;
  readonly pets: CountMap;
  readonly mounts: Readonly<Record<string, 0 | 1>>;
  readonly eggs: CountMap;
  readonly hatchingPotions: CountMap;
}

/** Builds a fresh snapshot from a user payload; key order follows the server's. */
export function snapshotFromUser(user: User): InventorySnapshot {
  const { items } = user;
  const pets: Record<string, number> = {};
  for (const [name, level] of Object.entries(items.pets)) {
    pets[name] = level ?? UNHATCHED;
  }
  const mounts: Record<string, 0 | 1> = {};
  for (const [name, owned] of Object.entries(items.mounts)) {
    mounts[name] = owned === true || (typeof owned === 'number' && owned > 0) ? 1 : 0;
  }
  return Object.freeze({
    food: Object.freeze({ ...items.food }),
    pets: Object.freeze(pets),
    mounts: Object.freeze(mounts),
    eggs: Object.freeze({ ...items.eggs }),
    hatchingPotions: Object.freeze({ ...items.hatchingPotions }),
  });
}

export function countOf(map: CountMap, name: string): number {
  return Object.prototype.hasOwnProperty.call(map, name) ? map[name] : 0;
}

/** Fed level of a pet, UNHATCHED when the server does not list it. */
export function fedLevel(snapshot: InventorySnapshot, pet: string): number {
  return Object.prototype.hasOwnProperty.call(snapshot.pets, pet) ? snapshot.pets[pet] : UNHATCHED;
}

export function hasMount(snapshot: InventorySnapshot, creature: string): boolean {
  return snapshot.mounts[creature] === 1;
}
