import type { PlannedAction } from './types.js';

export interface PlannerInput {
  hasRawMaterial: boolean;
  hasIntermediate: boolean;
  inventoryFull: boolean;
  convertEnabled: boolean;
}

/**
 * Fixed decision tree for the next gameplay action. Finished or near-finished product is
 * always fed before more roots are gathered, and a full inventory never gathers.
 * Only called while the player is idle.
 */
export function nextAction(input: PlannerInput): PlannedAction {
  const { hasRawMaterial, hasIntermediate, inventoryFull, convertEnabled } = input;
  if (inventoryFull || hasIntermediate || (hasRawMaterial && !convertEnabled)) return 'feed';
  if (convertEnabled && hasRawMaterial) return 'convert';
  return 'gather';
}
