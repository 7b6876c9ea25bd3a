import { retryUntil } from './retry.js';
import type { GameContext } from './context.js';
import type { InventoryItem, Target, TargetCategory } from './types.js';

// --- Shared actuation helpers ---

export const MISS_BACKOFF_MS = 2_000;
const BANK_OPEN_ATTEMPTS = 6;
const BANK_OPEN_INTERVAL_MS = 500;
const BANK_CLOSE_DELAY_MS = 800;

const TAG_HINTS: Record<TargetCategory, string> = {
  'hazard-source': 'Tag the brazier.',
  'raw-material-source': 'Tag the bruma roots.',
  'passage': 'Tag the Wintertodt doors.',
  'bank': 'Tag the bank chest.',
  'ingredient-source': 'Tag the sprouting roots.',
  'supply-source': 'Tag the potion crate.',
};

/**
 * Run a status query, falling back to `fallback` when it throws. One bad sample is
 * logged and otherwise ignored.
 */
export async function safeQuery<T>(
  ctx: GameContext,
  label: string,
  query: () => Promise<T>,
  fallback: T,
): Promise<T> {
  try {
    return await query();
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    ctx.log('error', `${label} query failed: ${msg}`);
    return fallback;
  }
}

export function readInventory(ctx: GameContext): Promise<InventoryItem[]> {
  return safeQuery(ctx, 'inventory', () => ctx.client.inventory(), []);
}

export function readInventoryFull(ctx: GameContext): Promise<boolean> {
  return safeQuery(ctx, 'inventory-full', () => ctx.client.isInventoryFull(), false);
}

export function readIdle(ctx: GameContext): Promise<boolean> {
  return safeQuery(ctx, 'idle', () => ctx.client.isIdle(), true);
}

export function readChatLine(ctx: GameContext): Promise<string> {
  return safeQuery(ctx, 'chat', () => ctx.client.latestChatLine(), '');
}

export function readEquipped(ctx: GameContext, itemId: number): Promise<boolean> {
  return safeQuery(ctx, 'equipment', () => ctx.client.isEquipped(itemId), false);
}

/** Quiet visibility check: no log, no backoff */
export async function isVisible(ctx: GameContext, category: TargetCategory): Promise<boolean> {
  const targets = await safeQuery(ctx, category, () => ctx.client.findTagged(category), []);
  return targets.length > 0;
}

/**
 * Closest tagged candidate of a category. A miss is logged and backed off here so
 * callers can simply return and let the next tick retry.
 */
export async function findNearest(ctx: GameContext, category: TargetCategory): Promise<Target | null> {
  const targets = await safeQuery(ctx, category, () => ctx.client.findTagged(category), []);
  if (targets.length === 0) {
    ctx.log('step', `no tagged ${category} found. ${TAG_HINTS[category]}`);
    await ctx.clock.sleep(MISS_BACKOFF_MS, ctx.signal);
    return null;
  }
  return [...targets].sort((a, b) => a.distance - b.distance)[0] ?? null;
}

/** First of `verbs` present in the hover tooltip, or null */
export async function hoverVerb(ctx: GameContext, verbs: readonly string[]): Promise<string | null> {
  const text = await safeQuery(ctx, 'mouseover', () => ctx.client.mouseoverText(), '');
  return verbs.find(v => text.includes(v)) ?? null;
}

export async function clickSlot(ctx: GameContext, slot: number): Promise<void> {
  await ctx.client.moveToSlot(slot);
  await ctx.client.click();
}

export async function openBank(ctx: GameContext): Promise<boolean> {
  if (await safeQuery(ctx, 'bank-open', () => ctx.client.isBankOpen(), false)) return true;

  const chest = await findNearest(ctx, 'bank');
  if (!chest) return false;

  await ctx.client.moveTo(chest);
  if (!(await hoverVerb(ctx, ['Bank', 'Use']))) {
    await ctx.clock.sleep(500, ctx.signal);
    return false;
  }
  await ctx.client.click();

  const opened = await retryUntil(() => ctx.client.isBankOpen(), {
    attempts: BANK_OPEN_ATTEMPTS,
    intervalMs: BANK_OPEN_INTERVAL_MS,
    clock: ctx.clock,
    signal: ctx.signal,
  });
  if (!opened) ctx.log('step', 'bank did not open.');
  return opened;
}

export async function closeBank(ctx: GameContext): Promise<void> {
  await ctx.client.pressKey('escape');
  await ctx.clock.sleep(BANK_CLOSE_DELAY_MS, ctx.signal);
}
