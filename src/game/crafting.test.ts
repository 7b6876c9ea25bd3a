import { describe, it, expect } from 'vitest';
import { acquireIngredients, runCraftingPipeline, shortfallUnits } from './crafting.js';
import { ManualClock } from './clock.js';
import { FakeGameClient } from './fake-client.test-helper.js';
import type { CraftingDeps } from './crafting.js';
import type { DispatchLogger } from '../activities/types.js';

const UNF = 20697;
const HERB = 20698;
const POTION_4 = 20699;
const POTION_3 = 20700;

function setup(targetUnits: number, settles = true) {
  const client = new FakeGameClient();
  const clock = new ManualClock();
  const entries: Array<[string, string]> = [];
  const log: DispatchLogger = (type, message) => { entries.push([type, message]); };
  const deps: CraftingDeps = {
    ctx: { client, clock, log, signal: new AbortController().signal },
    targetUnits,
    waitForIdle: async () => settles,
  };
  return { client, clock, entries, deps };
}

describe('shortfallUnits', () => {
  it('measures missing potions in doses', () => {
    expect(shortfallUnits(0, 3)).toBe(3);
    expect(shortfallUnits(5, 2)).toBe(1);
    expect(shortfallUnits(7, 2)).toBe(1);
    expect(shortfallUnits(8, 2)).toBe(0);
    expect(shortfallUnits(12, 2)).toBe(0);
  });
});

describe('runCraftingPipeline', () => {
  it('takes, picks and combines up to the target', async () => {
    const { client, clock, deps } = setup(2);
    client.targets['supply-source'] = [FakeGameClient.target('supply-source')];
    client.targets['ingredient-source'] = [FakeGameClient.target('ingredient-source')];
    client.hover['supply-source'] = 'Take-from Potion crate';
    client.hover['ingredient-source'] = 'Pick Sprouting roots';

    let slotClicks = 0;
    client.onClick = (hover, c) => {
      if (hover.startsWith('Take')) c.give(UNF);
      else if (hover.startsWith('Pick')) c.give(HERB);
      else if (hover === '' && ++slotClicks === 2) {
        c.items = c.items.filter(i => i.id !== UNF && i.id !== HERB);
        c.give(POTION_4);
        c.give(POTION_4);
      }
    };

    const report = await runCraftingPipeline(deps);

    expect(report).toEqual({
      startDoses: 0,
      finalDoses: 8,
      containersTaken: 2,
      ingredientsPicked: 2,
      combined: 2,
    });
    // herb slot first, then the potion it goes on
    expect(client.calls.filter(c => c.startsWith('slot:'))).toEqual(['slot:2', 'slot:0']);
    expect(clock.sleeps).toEqual([600, 600, 2400]);
  });

  it('does nothing once the target is held', async () => {
    const { client, deps } = setup(2);
    client.give(POTION_4);
    client.give(POTION_4);

    const report = await runCraftingPipeline(deps);

    expect(report).toEqual({ startDoses: 8, finalDoses: 8, containersTaken: 0, ingredientsPicked: 0, combined: 0 });
    expect(client.calls).toEqual([]);
  });

  it('counts part-drunk potions toward the target', async () => {
    const { client, deps } = setup(2);
    client.give(POTION_4);
    client.give(POTION_3);
    client.targets['supply-source'] = [FakeGameClient.target('supply-source')];
    client.hover['supply-source'] = 'Take-from Potion crate';
    client.onClick = (hover, c) => { if (hover.startsWith('Take')) c.give(UNF); };

    const report = await runCraftingPipeline(deps);

    expect(report.startDoses).toBe(7);
    expect(report.containersTaken).toBe(1);
  });

  it('backs off when the crate is not tagged', async () => {
    const { clock, entries, deps } = setup(1);

    const report = await runCraftingPipeline(deps);

    expect(report.containersTaken).toBe(0);
    expect(report.combined).toBe(0);
    expect(clock.sleeps).toEqual([2000]);
    expect(entries).toContainEqual(['step', 'no tagged supply-source found. Tag the potion crate.']);
  });

  it('stops taking potions when the inventory is full', async () => {
    const { client, deps } = setup(2);
    client.full = true;
    client.targets['supply-source'] = [FakeGameClient.target('supply-source')];

    const report = await runCraftingPipeline(deps);

    expect(report.containersTaken).toBe(0);
    expect(client.calls).toEqual([]);
  });
});

describe('acquireIngredients', () => {
  it('stops as soon as a pick is interrupted', async () => {
    const { client, deps } = setup(2, false);
    client.give(UNF);
    client.give(UNF);
    client.targets['ingredient-source'] = [FakeGameClient.target('ingredient-source')];
    client.hover['ingredient-source'] = 'Pick Sprouting roots';
    client.onClick = (hover, c) => { if (hover.startsWith('Pick')) c.give(HERB); };

    expect(await acquireIngredients(deps, 2)).toBe(1);
    expect(client.calls).toEqual(['moveTo:ingredient-source', 'click']);
  });
});
