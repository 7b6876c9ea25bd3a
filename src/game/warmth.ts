import type { InventoryItem, SurvivalUnit, WarmthAction } from './types.js';

// Warmth itself is never read. Each counted damage event stands in for a chunk of lost warmth.
export function shouldDrinkOrEat(damageCounter: number, threshold: number, hasResource: boolean): WarmthAction {
  if (damageCounter < threshold) return 'none-needed';
  return hasResource ? 'consume' : 'exhausted';
}

/**
 * Slot of the highest-value unit held (a 4-dose potion before a 1-dose, a whole cake
 * before a slice). Ties go to the lowest slot. Null when nothing usable is carried.
 */
export function pickBestUnit(inventory: InventoryItem[], units: SurvivalUnit[]): number | null {
  const valueOf = new Map(units.map(u => [u.id, u.value]));
  let bestSlot: number | null = null;
  let bestValue = 0;
  for (const item of [...inventory].sort((a, b) => a.slot - b.slot)) {
    const value = valueOf.get(item.id) ?? 0;
    if (value > bestValue) {
      bestSlot = item.slot;
      bestValue = value;
    }
  }
  return bestSlot;
}
