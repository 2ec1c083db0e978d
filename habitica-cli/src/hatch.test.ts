import { describe, expect, it } from 'vitest';
import { InvariantError } from './errors.js';
import { assessEgg, hatchAll, planHatch } from './hatch.js';
import { snapshotFromUser } from './inventory.js';
import { POTION_KINDS } from './stable.js';
import { FakeHabitica, makeUser, type ItemsInput } from './test-helpers.js';
import type { BatchOpName } from './types.js';

function setup(items: ItemsInput, ignoredOps: BatchOpName[] = []) {
  const user = makeUser(items);
  const api = new FakeHabitica({ user, ignoredOps });
  const lines: string[] = [];
  return { api, lines, snapshot: snapshotFromUser(user), report: (line: string) => lines.push(line) };
}

function allPets(egg: string, level: number): Record<string, number> {
  return Object.fromEntries(POTION_KINDS.map((kind) => [`${egg}-${kind}`, level]));
}

describe('hatchAll', () => {
  it('hatches a Base Wolf from one egg and one potion', async () => {
    const { api, lines, snapshot, report } = setup({
      eggs: { Wolf: 1 },
      hatchingPotions: { Base: 1 },
      pets: { 'Wolf-Base': -1 },
    });

    const result = await hatchAll(api, snapshot, report);

    expect(api.batches).toEqual([[{ op: 'hatch', params: { egg: 'Wolf', hatchingPotion: 'Base' } }]]);
    expect(result.snapshot.pets['Wolf-Base']).toBe(5);
    expect(lines).toEqual(['Hatching a Base Wolf']);
  });

  it('fails when the creature is still unhatched afterwards', async () => {
    const { api, snapshot, report } = setup(
      { eggs: { Wolf: 1 }, hatchingPotions: { Base: 1 }, pets: { 'Wolf-Base': -1 } },
      ['hatch']
    );
    await expect(hatchAll(api, snapshot, report)).rejects.toThrow('failed to hatch Wolf-Base');
  });

  it('hatches colors in the fixed order while eggs and potions last', async () => {
    const { api, lines, snapshot, report } = setup({
      eggs: { Wolf: 2 },
      hatchingPotions: { Red: 1, Base: 1 },
    });

    await hatchAll(api, snapshot, report);

    expect(api.batches.map((ops) => ops[0].params.hatchingPotion)).toEqual(['Base', 'Red']);
    expect(lines).toEqual(['Hatching a Base Wolf', 'Hatching a Red Wolf']);
  });

  it('sells the eggs no pet or mount still needs', async () => {
    const mounts = Object.fromEntries(POTION_KINDS.map((kind) => [`Fox-${kind}`, kind !== 'Base' && kind !== 'Red']));
    const { api, lines, snapshot, report } = setup({
      eggs: { Fox: 5 },
      pets: allPets('Fox', 5),
      mounts,
    });

    const result = await hatchAll(api, snapshot, report);

    expect(api.batches).toHaveLength(1);
    expect(api.batches[0]).toHaveLength(3);
    expect(api.batches[0][0]).toEqual({ op: 'sell', params: { type: 'eggs', key: 'Fox' } });
    expect(result.snapshot.eggs.Fox).toBe(2);
    expect(lines).toEqual(['Fox: need 2 (Fox-Base [m], Fox-Red [m]) of 5', 'Selling 3 Fox eggs']);
  });

  it('keeps every egg that is still needed', async () => {
    const { api, lines, snapshot, report } = setup({ eggs: { Fox: 1 }, pets: allPets('Fox', 5) });

    await hatchAll(api, snapshot, report);

    expect(api.batches).toEqual([]);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^Fox: need 10 \(Fox-Base \[m\], .*\) of 1$/);
  });

  it('fails when the sold eggs are still there', async () => {
    const mounts = Object.fromEntries(POTION_KINDS.map((kind) => [`Fox-${kind}`, true]));
    const { api, snapshot, report } = setup({ eggs: { Fox: 2 }, pets: allPets('Fox', 5), mounts }, ['sell']);
    await expect(hatchAll(api, snapshot, report)).rejects.toThrow(InvariantError);
  });
});

describe('planHatch', () => {
  it('ignores egg types that are not held', () => {
    const { snapshot } = setup({ eggs: { Wolf: 0 }, hatchingPotions: { Base: 3 } });
    expect(planHatch(snapshot)).toEqual({ step: null, assessed: [] });
  });

  it('needs a potion with a positive count', () => {
    const { snapshot } = setup({ eggs: { Wolf: 1 }, hatchingPotions: { Base: 0 } });
    expect(planHatch(snapshot).step).toBeNull();
  });
});

describe('assessEgg', () => {
  it('counts one egg per missing mount and one per unhatched pet', () => {
    const { snapshot } = setup({ eggs: { Wolf: 4 }, pets: { 'Wolf-Base': 5 }, mounts: { 'Wolf-Base': true } });
    const assessment = assessEgg(snapshot, 'Wolf');
    expect(assessment.count).toBe(4);
    expect(assessment.needed).toBe(18);
    expect(assessment.needing[0]).toBe('Wolf-CottonCandyBlue [m]');
    expect(assessment.needing[1]).toBe('Wolf-CottonCandyBlue [p]');
  });
});
