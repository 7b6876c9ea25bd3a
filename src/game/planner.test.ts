import { describe, it, expect } from 'vitest';
import { nextAction } from './planner.js';
import type { PlannerInput } from './planner.js';

const empty: PlannerInput = { hasRawMaterial: false, hasIntermediate: false, inventoryFull: false, convertEnabled: false };

describe('nextAction', () => {
  it('gathers with nothing to feed', () => {
    expect(nextAction(empty)).toBe('gather');
    expect(nextAction({ ...empty, convertEnabled: true })).toBe('gather');
  });

  it('feeds raw material straight away when converting is off', () => {
    expect(nextAction({ ...empty, hasRawMaterial: true })).toBe('feed');
  });

  it('converts raw material when converting is on', () => {
    expect(nextAction({ ...empty, hasRawMaterial: true, convertEnabled: true })).toBe('convert');
  });

  it('feeds intermediate product before converting more', () => {
    expect(nextAction({ ...empty, hasRawMaterial: true, hasIntermediate: true, convertEnabled: true })).toBe('feed');
  });

  it('never gathers with a full inventory', () => {
    for (const hasRawMaterial of [false, true]) {
      for (const hasIntermediate of [false, true]) {
        for (const convertEnabled of [false, true]) {
          const action = nextAction({ hasRawMaterial, hasIntermediate, convertEnabled, inventoryFull: true });
          expect(action).not.toBe('gather');
        }
      }
    }
  });
});
