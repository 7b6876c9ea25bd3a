import { describe, it, expect } from 'vitest';
import { countWarmItems, ensureReady, hardRequirements } from './gear.js';
import { ManualClock } from './clock.js';
import { FakeGameClient } from './fake-client.test-helper.js';
import type { GameContext } from './context.js';

const AXE = 1351;
const TINDERBOX = 590;
const BRUMA_TORCH = 20720;
const HAMMER = 2347;
const KNIFE = 946;
const WARM = [20704, 20706, 20708, 20710];

function setup() {
  const client = new FakeGameClient();
  const entries: Array<[string, string]> = [];
  const ctx: GameContext = {
    client,
    clock: new ManualClock(),
    log: (type, message) => { entries.push([type, message]); },
    signal: new AbortController().signal,
  };
  return { client, entries, ctx };
}

describe('hardRequirements', () => {
  it('adds the knife only when fletching', () => {
    expect(hardRequirements(false).map(r => r.label)).toEqual(['axe', 'ignition tool', 'repair tool']);
    expect(hardRequirements(true).map(r => r.label)).toEqual(['axe', 'ignition tool', 'repair tool', 'cutting tool']);
  });
});

describe('ensureReady', () => {
  it('is ready with the tools carried', async () => {
    const { client, entries, ctx } = setup();
    client.give(AXE);
    client.give(TINDERBOX);
    client.give(HAMMER);
    WARM.forEach(id => client.equipped.add(id));

    const check = await ensureReady(ctx, { convertEnabled: false });

    expect(check).toEqual({ ready: true, missing: [], warmItems: 4 });
    expect(entries).toEqual([]);
    expect(client.calls).toEqual([]);
  });

  it('accepts an equipped axe and a bruma torch as the ignition tool', async () => {
    const { client, ctx } = setup();
    client.equipped.add(AXE);
    client.equipped.add(BRUMA_TORCH);
    client.give(HAMMER);

    const check = await ensureReady(ctx, { convertEnabled: false });

    expect(check.ready).toBe(true);
    expect(check.warmItems).toBe(1);
  });

  it('warns about thin clothing without blocking the run', async () => {
    const { client, entries, ctx } = setup();
    client.give(AXE);
    client.give(TINDERBOX);
    client.give(HAMMER);

    const check = await ensureReady(ctx, { convertEnabled: false });

    expect(check.ready).toBe(true);
    expect(entries).toEqual([['thought', 'only 0/4 warm items equipped. expect heavier damage.']]);
  });

  it('fetches a missing tool from the bank', async () => {
    const { client, ctx } = setup();
    client.give(AXE);
    client.give(TINDERBOX);
    client.equipped.add(HAMMER);
    client.targets.bank = [FakeGameClient.target('bank')];
    client.bank.Hammer = { id: HAMMER, quantity: 1 };

    const check = await ensureReady(ctx, { convertEnabled: false });

    expect(check.ready).toBe(true);
    expect(client.calls).toEqual(['moveTo:bank', 'click', 'search:Hammer', 'withdraw:1', 'closeSearch', 'key:escape']);
  });

  it('reports what the bank could not supply', async () => {
    const { client, entries, ctx } = setup();
    client.give(AXE);
    client.give(TINDERBOX);
    client.give(HAMMER);
    client.targets.bank = [FakeGameClient.target('bank')];

    const check = await ensureReady(ctx, { convertEnabled: true });

    expect(check.ready).toBe(false);
    expect(check.missing).toEqual(['cutting tool']);
    expect(entries).toContainEqual(['error', 'still missing after banking: cutting tool.']);
  });

  it('does not count a knife as anything but the cutting tool', async () => {
    const { client, ctx } = setup();
    client.give(KNIFE);

    const check = await ensureReady(ctx, { convertEnabled: true });

    expect(check.missing).toEqual(['axe', 'ignition tool', 'repair tool']);
  });
});

describe('countWarmItems', () => {
  it('counts only equipped warm clothing', async () => {
    const { client, ctx } = setup();
    client.equipped.add(WARM[0]);
    client.equipped.add(AXE);
    expect(await countWarmItems(ctx)).toBe(1);
  });
});
