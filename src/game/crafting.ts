import { clickSlot, findNearest, hoverVerb, readInventory, readInventoryFull } from './actions.js';
import { loadItemCatalogue, survivalUnits } from './items.js';
import { countOf, slotsOf, totalDoses } from './resources.js';
import type { GameContext } from './context.js';

// --- Rejuvenation potion pipeline ---
// crate (unfinished potion) -> sprouting roots (bruma herb) -> herb on potion.
// Each stage re-reads the inventory and is a no-op once its precondition holds, so a
// pipeline interrupted by a round event just picks up where it left off next time.

export const DOSES_PER_POTION = 4;
const TAKE_DELAY_MS = 600;
const PICK_TIMEOUT_MS = 10_000;
const COMBINE_MS_PER_POTION = 1_200;

export interface CraftingDeps {
  ctx: GameContext;
  /** Whole potions to hold once topped up */
  targetUnits: number;
  /**
   * Wait for the player to go idle. Resolves false if something happened meanwhile
   * (a chat event or a timeout) and the caller should stop and re-evaluate.
   */
  waitForIdle(timeoutMs: number): Promise<boolean>;
}

export interface CraftingReport {
  startDoses: number;
  finalDoses: number;
  containersTaken: number;
  ingredientsPicked: number;
  combined: number;
}

/** Potions still missing to reach the target, measured in doses so part-drunk potions count. */
export function shortfallUnits(doses: number, targetUnits: number): number {
  const missing = targetUnits * DOSES_PER_POTION - doses;
  return missing <= 0 ? 0 : Math.ceil(missing / DOSES_PER_POTION);
}

async function currentDoses(ctx: GameContext): Promise<number> {
  return totalDoses(await readInventory(ctx), survivalUnits('potions'));
}

export async function acquireContainers(deps: CraftingDeps, shortfall: number): Promise<number> {
  const { ctx } = deps;
  const { unfinishedPotion } = loadItemCatalogue().materials;
  const wanted = Math.min(shortfall, deps.targetUnits);

  let held = countOf(await readInventory(ctx), unfinishedPotion);
  if (held >= wanted) return 0;

  const crate = await findNearest(ctx, 'supply-source');
  if (!crate) return 0;

  const start = held;
  const maxAttempts = (wanted - held) * 2;
  for (let attempt = 0; attempt < maxAttempts && held < wanted && !ctx.signal.aborted; attempt++) {
    if (await readInventoryFull(ctx)) break;
    await ctx.client.moveTo(crate);
    if (!(await hoverVerb(ctx, ['Take']))) break;
    await ctx.client.click();
    await ctx.clock.sleep(TAKE_DELAY_MS, ctx.signal);
    held = countOf(await readInventory(ctx), unfinishedPotion);
  }

  const taken = held - start;
  ctx.log('action', `took ${taken} unfinished potion${taken === 1 ? '' : 's'} (${held}/${wanted}).`);
  return taken;
}

export async function acquireIngredients(deps: CraftingDeps, shortfall: number): Promise<number> {
  const { ctx } = deps;
  const { unfinishedPotion, brumaHerb } = loadItemCatalogue().materials;

  const inventory = await readInventory(ctx);
  const wanted = Math.min(countOf(inventory, unfinishedPotion), shortfall);
  let held = countOf(inventory, brumaHerb);
  if (held >= wanted) return 0;

  const start = held;
  const maxAttempts = (wanted - held) * 2;
  for (let attempt = 0; attempt < maxAttempts && held < wanted && !ctx.signal.aborted; attempt++) {
    const roots = await findNearest(ctx, 'ingredient-source');
    if (!roots) break;
    await ctx.client.moveTo(roots);
    if (!(await hoverVerb(ctx, ['Pick']))) break;
    await ctx.client.click();
    const settled = await deps.waitForIdle(PICK_TIMEOUT_MS);
    held = countOf(await readInventory(ctx), brumaHerb);
    if (!settled) break;
  }

  const picked = held - start;
  ctx.log('action', `picked ${picked} bruma herb${picked === 1 ? '' : 's'} (${held}/${wanted}).`);
  return picked;
}

/** Use one herb on one potion; the game pairs up the whole batch from there. Returns potions combined. */
export async function combine(deps: CraftingDeps): Promise<number> {
  const { ctx } = deps;
  const { unfinishedPotion, brumaHerb } = loadItemCatalogue().materials;

  const inventory = await readInventory(ctx);
  const batch = Math.min(countOf(inventory, unfinishedPotion), countOf(inventory, brumaHerb));
  if (batch === 0) return 0;

  const [herbSlot] = slotsOf(inventory, [brumaHerb]);
  const [potionSlot] = slotsOf(inventory, [unfinishedPotion]);
  if (herbSlot === undefined || potionSlot === undefined) return 0;

  await clickSlot(ctx, herbSlot);
  await clickSlot(ctx, potionSlot);
  await ctx.clock.sleep(batch * COMBINE_MS_PER_POTION, ctx.signal);
  return batch;
}

export async function runCraftingPipeline(deps: CraftingDeps): Promise<CraftingReport> {
  const { ctx } = deps;
  const startDoses = await currentDoses(ctx);
  const shortfall = shortfallUnits(startDoses, deps.targetUnits);
  const report: CraftingReport = {
    startDoses,
    finalDoses: startDoses,
    containersTaken: 0,
    ingredientsPicked: 0,
    combined: 0,
  };
  if (shortfall === 0) return report;

  ctx.log('step', `crafting: ${startDoses} doses held, ${shortfall} potion${shortfall === 1 ? '' : 's'} short.`);
  report.containersTaken = await acquireContainers(deps, shortfall);
  if (!ctx.signal.aborted) report.ingredientsPicked = await acquireIngredients(deps, shortfall);
  if (!ctx.signal.aborted) report.combined = await combine(deps);

  report.finalDoses = await currentDoses(ctx);
  ctx.log('result', `crafting done: ${report.startDoses} -> ${report.finalDoses} doses.`);
  return report;
}
