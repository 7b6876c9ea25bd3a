import { describe, it, expect } from 'vitest';
import { ARENA_REGION, SAFE_AREA_REGION, isArena, locate, regionIdOf, zoneOfRegion } from './region.js';

describe('regionIdOf', () => {
  it('packs the 64-tile chunk coordinates', () => {
    expect(regionIdOf({ x: 1630, y: 3970 })).toBe(ARENA_REGION);
    expect(regionIdOf({ x: 1630, y: 3944 })).toBe(SAFE_AREA_REGION);
  });

  it('splits the arena and the camp at the door line', () => {
    expect(regionIdOf({ x: 1630, y: 3967 })).toBe(SAFE_AREA_REGION);
    expect(regionIdOf({ x: 1630, y: 3968 })).toBe(ARENA_REGION);
  });

  it('maps a far away tile to its own region', () => {
    expect(regionIdOf({ x: 3200, y: 3200 })).toBe((50 << 8) | 50);
  });
});

describe('zoneOfRegion', () => {
  it('names the two known regions', () => {
    expect(zoneOfRegion(6462)).toBe('arena');
    expect(zoneOfRegion(6461)).toBe('safe-area');
    expect(zoneOfRegion(12850)).toBe('unknown');
  });
});

describe('locate', () => {
  it('reads the zone from the position', async () => {
    expect(await locate(async () => ({ x: 1630, y: 3970, plane: 0 }))).toBe('arena');
  });

  it('yields unknown when the position read fails', async () => {
    const zone = await locate(async () => { throw new Error('status endpoint down'); });
    expect(zone).toBe('unknown');
    expect(isArena(zone)).toBe(false);
  });
});
