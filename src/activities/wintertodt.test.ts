import { describe, it, expect, beforeAll, vi } from 'vitest';
import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { registerWintertodtActivity } from './wintertodt.js';
import { getActivity } from './registry.js';
import { getDispatch, waitForDispatch } from './runner.js';
import { launchPreset } from '../index.js';
import { ManualClock } from '../game/clock.js';
import { ARENA_POS, FakeGameClient } from '../game/fake-client.test-helper.js';

const AXE = 1351;
const TINDERBOX = 590;
const HAMMER = 2347;
const SALMON = 329;

let nextClient: FakeGameClient = new FakeGameClient();

beforeAll(() => {
  vi.stubEnv('STATE_DIR', mkdtempSync(join(tmpdir(), 'wt-activity-')));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  registerWintertodtActivity(async () => nextClient, { clock: new ManualClock(), random: () => 1 });
});

describe('wintertodt activity', () => {
  it('registers with defaults for every option', () => {
    const activity = getActivity('wintertodt');
    expect(activity?.paramSchema.map(f => f.key)).toEqual([
      'runMinutes',
      'damageThreshold',
      'targetCount',
      'survival',
      'foodName',
      'convertEnabled',
      'takeBreaks',
      'useRespawnTimer',
    ]);
  });

  it('fails the dispatch when required gear is missing', async () => {
    nextClient = new FakeGameClient();

    const launched = launchPreset('wintertodt-potions', { runMinutes: 1 });
    if (!launched.ok) throw new Error(launched.error);
    const result = await waitForDispatch(launched.plan.id);

    expect(launched.plan.params).toMatchObject({ survival: 'potions', targetCount: 2, useRespawnTimer: true, runMinutes: 1, damageThreshold: 3 });
    expect(result?.success).toBe(false);
    expect(result?.summary).toBe('missing required gear: axe, ignition tool, repair tool');
    expect(getDispatch(launched.plan.id).plan?.status).toBe('failed');
  });

  it('plays a round and finishes when the time budget runs out', async () => {
    const client = new FakeGameClient();
    client.give(AXE);
    client.give(TINDERBOX);
    client.give(HAMMER);
    for (let i = 0; i < 5; i++) client.give(SALMON);
    client.position = ARENA_POS;
    client.chatScript = ['The cold of the Wintertodt bites.', 'The Wintertodt has been subdued!'];
    nextClient = client;

    const launched = launchPreset('wintertodt-food', { runMinutes: 1 });
    if (!launched.ok) throw new Error(launched.error);
    const result = await waitForDispatch(launched.plan.id);

    expect(result?.success).toBe(true);
    expect(result?.summary).toBe('finished. rounds completed: 1');
    expect(result?.stats?.roundsCompleted).toBe(1);
  });

  it('refuses invalid params before launching', () => {
    expect(launchPreset('wintertodt-food', { runMinutes: 0 })).toEqual({
      ok: false,
      error: 'invalid params: runMinutes: Number must be greater than or equal to 1',
    });
  });

  it('refuses an unknown preset', () => {
    expect(launchPreset('wintertodt-hardcore')).toEqual({ ok: false, error: 'unknown preset "wintertodt-hardcore"' });
  });
});
