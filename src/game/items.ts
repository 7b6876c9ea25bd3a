import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { SurvivalKind, SurvivalUnit } from './types.js';

// Item catalogue lives in data/items.json at the repo root (two levels up from src/game and dist/game)
const ITEMS_FILE = fileURLToPath(new URL('../../data/items.json', import.meta.url));

const UnitSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  value: z.number().int().positive(),
});

const ToolSchema = z.object({
  label: z.string(),
  searchName: z.string(),
  where: z.enum(['equipped', 'carried', 'either']),
  ids: z.array(z.number().int()).nonempty(),
});

const CatalogueSchema = z.object({
  materials: z.object({
    brumaRoot: z.number().int(),
    brumaKindling: z.number().int(),
    unfinishedPotion: z.number().int(),
    brumaHerb: z.number().int(),
  }),
  tools: z.object({
    axe: ToolSchema,
    ignition: ToolSchema,
    repair: ToolSchema,
    cutting: ToolSchema,
  }),
  warmClothing: z.object({
    minimum: z.number().int().nonnegative(),
    ids: z.array(z.number().int()),
  }),
  food: z.array(UnitSchema).nonempty(),
  potions: z.array(UnitSchema).nonempty(),
});

export type ToolRequirement = z.infer<typeof ToolSchema>;
export type ItemCatalogue = z.infer<typeof CatalogueSchema>;

let cached: ItemCatalogue | null = null;

export function loadItemCatalogue(): ItemCatalogue {
  if (!cached) {
    cached = CatalogueSchema.parse(JSON.parse(readFileSync(ITEMS_FILE, 'utf-8')));
  }
  return cached;
}

export function survivalUnits(kind: SurvivalKind): SurvivalUnit[] {
  const catalogue = loadItemCatalogue();
  return kind === 'food' ? catalogue.food : catalogue.potions;
}

/** Value of one freshly acquired unit: a full potion, or one piece of food */
export function fullUnitValue(kind: SurvivalKind): number {
  return kind === 'potions' ? Math.max(...survivalUnits(kind).map(u => u.value)) : 1;
}

export function toolIds(): Set<number> {
  const { tools } = loadItemCatalogue();
  return new Set([...tools.axe.ids, ...tools.ignition.ids, ...tools.repair.ids, ...tools.cutting.ids]);
}
