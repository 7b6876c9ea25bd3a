import type { Position, Zone } from './types.js';

// regionId = ((x >> 6) << 8) | (y >> 6)
// Arena at ~(1630, 3970) -> 6462; camp/bank at ~(1630, 3944) -> 6461. Boundary is the doors at y=3968.
export const ARENA_REGION = 6462;
export const SAFE_AREA_REGION = 6461;

export function regionIdOf(pos: Pick<Position, 'x' | 'y'>): number {
  return ((pos.x >> 6) << 8) | (pos.y >> 6);
}

export function zoneOfRegion(regionId: number): Zone {
  if (regionId === ARENA_REGION) return 'arena';
  if (regionId === SAFE_AREA_REGION) return 'safe-area';
  return 'unknown';
}

/**
 * Where the player is right now. A failed position read yields 'unknown', which callers
 * handle like the safe area.
 */
export async function locate(readPosition: () => Promise<Position>): Promise<Zone> {
  try {
    const pos = await readPosition();
    return zoneOfRegion(regionIdOf(pos));
  } catch {
    return 'unknown';
  }
}

export function isArena(zone: Zone): boolean {
  return zone === 'arena';
}
