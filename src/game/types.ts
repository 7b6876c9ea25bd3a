// --- Wintertodt: shared game types ---

export type Zone = 'arena' | 'safe-area' | 'unknown';

export type ChatEvent = 'round-end' | 'hazard-out' | 'hazard-broken' | 'damaged' | 'none';

export type RoundPhase =
  | { kind: 'awaiting-round' }
  | { kind: 'round-active'; since: number }
  | { kind: 'round-ending'; endedAt: number };

export interface Position {
  x: number;
  y: number;
  plane: number;
}

export interface InventoryItem {
  id: number;
  slot: number;
  quantity: number;
}

// Categories the operator tags in the client; each maps to one on-screen object type
export type TargetCategory =
  | 'hazard-source'
  | 'raw-material-source'
  | 'passage'
  | 'bank'
  | 'ingredient-source'
  | 'supply-source';

export interface Target {
  id: string;
  category: TargetCategory;
  /** Distance from the centre of the game view, used to pick the closest candidate */
  distance: number;
}

// Survival resource strategy: pre-stocked bank food, or potions crafted in the arena
export type SurvivalKind = 'food' | 'potions';

export interface SurvivalUnit {
  id: number;
  name: string;
  /** Doses for potions, bites for food */
  value: number;
}

export interface ResourceState {
  rawMaterial: number;
  intermediate: number;
  survivalUnits: number;
  survivalValue: number;
  containers: number;
  ingredients: number;
  inventoryFull: boolean;
  hasLoot: boolean;
}

export interface RoundState {
  phase: RoundPhase;
  damageCounter: number;
  roundEndedAt: number | null;
  lastSeenChatLine: string;
  roundsCompleted: number;
  lastConsumedAt: number | null;
  /** Event picked up while waiting on an action, handled before the next chat read */
  pendingEvent: ChatEvent;
  /** The bank ran out of food; go in with what is held until the next round end */
  restockExhausted: boolean;
}

export type PlannedAction = 'gather' | 'convert' | 'feed';

export type WarmthAction = 'consume' | 'none-needed' | 'exhausted';
