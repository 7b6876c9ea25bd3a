import type { InventoryItem, Position, Target, TargetCategory } from './types.js';

// --- Game client port ---
// Perception and actuation are provided by the host (colour tagging, mouse/keyboard, bank
// panel geometry). Actuation is fire-and-forget: success is only ever confirmed by later queries.

export interface GameQueries {
  /** May throw when the status endpoint is unavailable */
  playerPosition(): Promise<Position>;
  /** Newest chat line, or '' */
  latestChatLine(): Promise<string>;
  inventory(): Promise<InventoryItem[]>;
  isInventoryFull(): Promise<boolean>;
  isEquipped(itemId: number): Promise<boolean>;
  isIdle(): Promise<boolean>;
  findTagged(category: TargetCategory): Promise<Target[]>;
  /** Text of the hover tooltip at the cursor, e.g. "Feed Brazier" */
  mouseoverText(): Promise<string>;
  isBankOpen(): Promise<boolean>;
}

export interface GameActuator {
  moveTo(target: Target): Promise<void>;
  moveToSlot(slot: number): Promise<void>;
  click(): Promise<void>;
  pressKey(key: string): Promise<void>;
  typeText(text: string): Promise<void>;
}

export interface BankPanel {
  /** With the bank open, deposit every item in the given inventory slot */
  bankDeposit(slot: number): Promise<void>;
  bankSearch(name: string): Promise<void>;
  /** Withdraw `quantity` of the first search result */
  bankWithdrawFirst(quantity: number): Promise<void>;
  bankCloseSearch(): Promise<void>;
}

export interface GameClient extends GameQueries, GameActuator, BankPanel {
  takeBreak(maxSeconds: number): Promise<void>;
}
