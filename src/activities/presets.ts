// --- Dispatch Presets: the three supported play styles ---

import { createPlan } from './runner.js';
import type { DispatchPlan } from './types.js';

export interface DispatchPreset {
  id: string;
  name: string;
  description: string;
  activity: string;
  params: Record<string, unknown>;
  summary: string;
}

const presets: DispatchPreset[] = [
  {
    id: 'wintertodt-food',
    name: 'Wintertodt (food)',
    description: 'Bank food between rounds, eat after repeated cold damage, leave the arena to restock.',
    activity: 'wintertodt',
    params: { survival: 'food', useRespawnTimer: false },
    summary: 'wintertodt with banked food. eat when the cold bites, restock when low.',
  },
  {
    id: 'wintertodt-timer',
    name: 'Wintertodt (food + respawn timer)',
    description: 'Food strategy, with the fixed respawn period as a fallback round-start signal.',
    activity: 'wintertodt',
    params: { survival: 'food', useRespawnTimer: true },
    summary: 'wintertodt with banked food, trusting the respawn timer between rounds.',
  },
  {
    id: 'wintertodt-potions',
    name: 'Wintertodt (crafted potions)',
    description: 'Craft rejuvenation potions inside the arena and never leave for food.',
    activity: 'wintertodt',
    params: { survival: 'potions', targetCount: 2, useRespawnTimer: true },
    summary: 'wintertodt on crafted potions. crate, sprouting roots, combine, drink.',
  },
];

export function getPresets(): DispatchPreset[] {
  return presets;
}

export function getPreset(id: string): DispatchPreset | undefined {
  return presets.find(p => p.id === id);
}

/** Proposed plan from a preset. `overrides` win over the preset's params. */
export function planFromPreset(id: string, overrides: Record<string, unknown> = {}): DispatchPlan | null {
  const preset = getPreset(id);
  if (!preset) return null;
  return createPlan(preset.activity, { ...preset.params, ...overrides }, preset.summary);
}
