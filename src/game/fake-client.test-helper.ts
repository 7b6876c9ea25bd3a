import type { GameClient } from './client.js';
import type { InventoryItem, Position, Target, TargetCategory } from './types.js';

// In-process stand-in for the game client, used by the tests. Every call is recorded in
// `calls`; scripted sequences replay one value per read and then stick on their last value.

export const ARENA_POS: Position = { x: 1630, y: 3970, plane: 0 };
export const SAFE_AREA_POS: Position = { x: 1630, y: 3944, plane: 0 };

export interface BankStock {
  id: number;
  quantity: number;
}

export class FakeGameClient implements GameClient {
  readonly calls: string[] = [];
  position: Position | Error = SAFE_AREA_POS;
  chatScript: string[] = [];
  chat = '';
  idleScript: boolean[] = [];
  idle = true;
  items: InventoryItem[] = [];
  full = false;
  equipped = new Set<number>();
  targets: Partial<Record<TargetCategory, Target[]>> = {};
  /** Tooltip shown once the cursor is on a target of the category */
  hover: Partial<Record<TargetCategory, string>> = { bank: 'Bank Bank chest' };
  bankOpen = false;
  bank: Record<string, BankStock> = {};
  /** Runs after a click, with the tooltip the cursor was on */
  onClick: ((hoverText: string, client: FakeGameClient) => void) | null = null;

  private hovering = '';
  private searchTerm = '';

  static target(category: TargetCategory, distance = 10): Target {
    return { id: `${category}-${distance}`, category, distance };
  }

  give(id: number, quantity = 1): void {
    const slot = this.freeSlot();
    this.items.push({ id, slot, quantity });
  }

  removeSlot(slot: number): void {
    this.items = this.items.filter(i => i.slot !== slot);
  }

  private freeSlot(): number {
    const used = new Set(this.items.map(i => i.slot));
    let slot = 0;
    while (used.has(slot)) slot++;
    return slot;
  }

  async playerPosition(): Promise<Position> {
    this.calls.push('position');
    if (this.position instanceof Error) throw this.position;
    return this.position;
  }

  async latestChatLine(): Promise<string> {
    const next = this.chatScript.shift();
    if (next !== undefined) this.chat = next;
    return this.chat;
  }

  async inventory(): Promise<InventoryItem[]> {
    return this.items.map(i => ({ ...i }));
  }

  async isInventoryFull(): Promise<boolean> {
    return this.full;
  }

  async isEquipped(itemId: number): Promise<boolean> {
    return this.equipped.has(itemId);
  }

  async isIdle(): Promise<boolean> {
    const next = this.idleScript.shift();
    if (next !== undefined) this.idle = next;
    return this.idle;
  }

  async findTagged(category: TargetCategory): Promise<Target[]> {
    return this.targets[category] ?? [];
  }

  async mouseoverText(): Promise<string> {
    return this.hovering;
  }

  async isBankOpen(): Promise<boolean> {
    return this.bankOpen;
  }

  async moveTo(target: Target): Promise<void> {
    this.calls.push(`moveTo:${target.category}`);
    this.hovering = this.hover[target.category] ?? '';
  }

  async moveToSlot(slot: number): Promise<void> {
    this.calls.push(`slot:${slot}`);
    this.hovering = '';
  }

  async click(): Promise<void> {
    this.calls.push('click');
    if (this.hovering.startsWith('Bank')) this.bankOpen = true;
    this.onClick?.(this.hovering, this);
  }

  async pressKey(key: string): Promise<void> {
    this.calls.push(`key:${key}`);
    if (key === 'escape') this.bankOpen = false;
  }

  async typeText(text: string): Promise<void> {
    this.calls.push(`type:${text}`);
  }

  async bankDeposit(slot: number): Promise<void> {
    this.calls.push(`deposit:${slot}`);
    this.removeSlot(slot);
  }

  async bankSearch(name: string): Promise<void> {
    this.calls.push(`search:${name}`);
    this.searchTerm = name;
  }

  async bankWithdrawFirst(quantity: number): Promise<void> {
    this.calls.push(`withdraw:${quantity}`);
    const stock = this.bank[this.searchTerm];
    if (!stock) return;
    const taken = Math.min(quantity, stock.quantity);
    stock.quantity -= taken;
    for (let i = 0; i < taken; i++) this.give(stock.id);
  }

  async bankCloseSearch(): Promise<void> {
    this.calls.push('closeSearch');
    this.searchTerm = '';
  }

  async takeBreak(maxSeconds: number): Promise<void> {
    this.calls.push(`break:${maxSeconds}`);
  }
}
