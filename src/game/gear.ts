import { closeBank, openBank, readEquipped, readInventory } from './actions.js';
import { loadItemCatalogue } from './items.js';
import type { ToolRequirement } from './items.js';
import type { GameContext } from './context.js';
import type { InventoryItem } from './types.js';

const WITHDRAW_DELAY_MS = 600;

export interface GearCheck {
  /** Every hard requirement holds. Warm clothing never affects this. */
  ready: boolean;
  /** Labels of hard requirements still unmet */
  missing: string[];
  warmItems: number;
}

export function hardRequirements(convertEnabled: boolean): ToolRequirement[] {
  const { tools } = loadItemCatalogue();
  const required = [tools.axe, tools.ignition, tools.repair];
  if (convertEnabled) required.push(tools.cutting);
  return required;
}

async function isSatisfied(ctx: GameContext, req: ToolRequirement, inventory: InventoryItem[]): Promise<boolean> {
  if (req.where !== 'equipped' && inventory.some(i => req.ids.includes(i.id))) return true;
  if (req.where === 'carried') return false;
  for (const id of req.ids) {
    if (await readEquipped(ctx, id)) return true;
  }
  return false;
}

async function unmet(ctx: GameContext, required: ToolRequirement[]): Promise<ToolRequirement[]> {
  const inventory = await readInventory(ctx);
  const missing: ToolRequirement[] = [];
  for (const req of required) {
    if (!(await isSatisfied(ctx, req, inventory))) missing.push(req);
  }
  return missing;
}

export async function countWarmItems(ctx: GameContext): Promise<number> {
  let count = 0;
  for (const id of loadItemCatalogue().warmClothing.ids) {
    if (await readEquipped(ctx, id)) count++;
  }
  return count;
}

async function withdrawMissing(ctx: GameContext, missing: ToolRequirement[]): Promise<void> {
  if (!(await openBank(ctx))) {
    ctx.log('error', 'could not open the bank to fetch missing gear.');
    return;
  }
  for (const req of missing) {
    ctx.log('action', `withdrawing ${req.label} (${req.searchName})...`);
    await ctx.client.bankSearch(req.searchName);
    await ctx.client.bankWithdrawFirst(1);
    await ctx.client.bankCloseSearch();
    await ctx.clock.sleep(WITHDRAW_DELAY_MS, ctx.signal);
  }
  await closeBank(ctx);
}

/**
 * One-off check before the main loop. Missing hard requirements are fetched from the
 * bank once, then everything is verified again.
 */
export async function ensureReady(ctx: GameContext, opts: { convertEnabled: boolean }): Promise<GearCheck> {
  const { minimum } = loadItemCatalogue().warmClothing;
  const warmItems = await countWarmItems(ctx);
  if (warmItems < minimum) {
    ctx.log('thought', `only ${warmItems}/${minimum} warm items equipped. expect heavier damage.`);
  }

  const required = hardRequirements(opts.convertEnabled);
  let missing = await unmet(ctx, required);
  if (missing.length > 0) {
    ctx.log('step', `missing gear: ${missing.map(r => r.label).join(', ')}. checking the bank.`);
    await withdrawMissing(ctx, missing);
    missing = await unmet(ctx, required);
  }

  const labels = missing.map(r => r.label);
  if (labels.length > 0) {
    ctx.log('error', `still missing after banking: ${labels.join(', ')}.`);
  }
  return { ready: labels.length === 0, missing: labels, warmItems };
}
