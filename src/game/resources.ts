import { loadItemCatalogue, survivalUnits, toolIds } from './items.js';
import type { InventoryItem, ResourceState, SurvivalKind, SurvivalUnit } from './types.js';

export function countOf(inventory: InventoryItem[], id: number): number {
  return inventory.filter(i => i.id === id).reduce((sum, i) => sum + i.quantity, 0);
}

export function slotsOf(inventory: InventoryItem[], ids: Iterable<number>): number[] {
  const wanted = new Set(ids);
  return inventory.filter(i => wanted.has(i.id)).map(i => i.slot);
}

/** Σ count × value over every unit type held: doses for potions, bites for food. */
export function totalDoses(inventory: InventoryItem[], units: SurvivalUnit[]): number {
  return units.reduce((sum, unit) => sum + countOf(inventory, unit.id) * unit.value, 0);
}

export function unitCount(inventory: InventoryItem[], units: SurvivalUnit[]): number {
  return units.reduce((sum, unit) => sum + countOf(inventory, unit.id), 0);
}

/**
 * Items that belong to the run and must survive a bank deposit: tools, the survival
 * resource and the potion ingredients.
 */
export function protectedIds(kind: SurvivalKind): Set<number> {
  const { materials } = loadItemCatalogue();
  const ids = toolIds();
  for (const unit of survivalUnits(kind)) ids.add(unit.id);
  if (kind === 'potions') {
    ids.add(materials.unfinishedPotion);
    ids.add(materials.brumaHerb);
  }
  return ids;
}

export function lootSlots(inventory: InventoryItem[], kind: SurvivalKind): number[] {
  const keep = protectedIds(kind);
  return inventory.filter(i => !keep.has(i.id)).map(i => i.slot);
}

export function readResources(
  inventory: InventoryItem[],
  inventoryFull: boolean,
  kind: SurvivalKind,
): ResourceState {
  const { materials } = loadItemCatalogue();
  const units = survivalUnits(kind);
  return {
    rawMaterial: countOf(inventory, materials.brumaRoot),
    intermediate: countOf(inventory, materials.brumaKindling),
    survivalUnits: unitCount(inventory, units),
    survivalValue: totalDoses(inventory, units),
    containers: countOf(inventory, materials.unfinishedPotion),
    ingredients: countOf(inventory, materials.brumaHerb),
    inventoryFull,
    hasLoot: lootSlots(inventory, kind).length > 0,
  };
}
