import {
  MISS_BACKOFF_MS,
  clickSlot,
  closeBank,
  findNearest,
  hoverVerb,
  isVisible,
  openBank,
  readChatLine,
  readIdle,
  readInventory,
  readInventoryFull,
} from './actions.js';
import { classifyChatLine } from './chat.js';
import { runCraftingPipeline } from './crafting.js';
import { ensureReady } from './gear.js';
import { fullUnitValue, loadItemCatalogue, survivalUnits } from './items.js';
import {
  LOW_WATER_MARK,
  RESPAWN_INTERVAL_MS,
  RESPAWN_MARGIN_MS,
  ROUND_SETTLE_MS,
  advance,
  createRoundState,
  withConsumeFailed,
  withPendingEvent,
  withRestockExhausted,
} from './lifecycle.js';
import type { Command, LifecycleSettings, Observation } from './lifecycle.js';
import { locate } from './region.js';
import { lootSlots, readResources, slotsOf, unitCount } from './resources.js';
import { retryUntil } from './retry.js';
import { pickBestUnit } from './warmth.js';
import type { RunOptions } from '../config.js';
import type { GameContext } from './context.js';
import type { RoundState, Zone } from './types.js';

// --- Session controller: gathers observations, runs the lifecycle, executes commands ---

const POLL_INTERVAL_MS = 1_000;
const GATHER_TIMEOUT_MS = 15_000;
const CONVERT_TIMEOUT_MS = 30_000;
const FEED_TIMEOUT_MS = 30_000;
const PASSAGE_SETTLE_MS = 3_000;
const PASSAGE_ATTEMPTS = 10;
const LIGHT_DELAY_MS = 3_000;
const CONSUME_DELAY_MS = 1_500;
const CLICK_SETTLE_MS = 500;
const DEPOSIT_DELAY_MS = 300;
const BREAK_CHANCE = 0.02;
const BREAK_MAX_SECONDS = 15;

export type SessionStats = {
  ticks: number;
  roundsCompleted: number;
  consumed: number;
  dosesCrafted: number;
  lootDeposits: number;
  arenaEntries: number;
  failedTransitions: number;
  tickErrors: number;
};

export interface Session {
  ctx: GameContext;
  options: RunOptions;
  settings: LifecycleSettings;
  state: RoundState;
  stats: SessionStats;
  /** Set once the run cannot continue */
  stopReason: string | null;
  random: () => number;
}

export type WaitOutcome = 'idle' | 'interrupted' | 'timeout';

export function settingsFor(options: RunOptions): LifecycleSettings {
  return {
    survival: options.survival,
    damageThreshold: options.damageThreshold,
    targetValue: options.targetCount * fullUnitValue(options.survival),
    lowWaterMark: LOW_WATER_MARK,
    convertEnabled: options.convertEnabled,
    useRespawnTimer: options.useRespawnTimer,
    respawnIntervalMs: RESPAWN_INTERVAL_MS,
    respawnMarginMs: RESPAWN_MARGIN_MS,
    settleMs: ROUND_SETTLE_MS,
  };
}

export function createSession(ctx: GameContext, options: RunOptions, random: () => number = Math.random): Session {
  return {
    ctx,
    options,
    settings: settingsFor(options),
    state: createRoundState(),
    stats: {
      ticks: 0,
      roundsCompleted: 0,
      consumed: 0,
      dosesCrafted: 0,
      lootDeposits: 0,
      arenaEntries: 0,
      failedTransitions: 0,
      tickErrors: 0,
    },
    stopReason: null,
    random,
  };
}

async function readZone(session: Session): Promise<Zone> {
  return locate(() => session.ctx.client.playerPosition());
}

export async function observe(session: Session): Promise<Observation> {
  const { ctx, state, options } = session;
  const zone = await readZone(session);
  const inventory = await readInventory(ctx);
  const full = await readInventoryFull(ctx);
  const inArena = zone === 'arena';
  const awaiting = state.phase.kind === 'awaiting-round';

  return {
    now: ctx.clock.now(),
    zone,
    chatLine: state.pendingEvent === 'none' ? await readChatLine(ctx) : '',
    idle: inArena ? await readIdle(ctx) : true,
    hazardVisible: inArena && awaiting
      && ((await isVisible(ctx, 'hazard-source')) || (await isVisible(ctx, 'raw-material-source'))),
    resources: readResources(inventory, full, options.survival),
  };
}

/**
 * Wait for the current action to finish. Polls idle first, then chat; a new chat event
 * ends the wait and is parked on the state for the next tick.
 */
export async function waitWhileBusy(session: Session, timeoutMs: number): Promise<WaitOutcome> {
  const { ctx } = session;
  const start = ctx.clock.now();
  while (ctx.clock.now() - start < timeoutMs && !ctx.signal.aborted) {
    if (await readIdle(ctx)) return 'idle';

    const { event, lastSeenLine } = classifyChatLine(await readChatLine(ctx), session.state.lastSeenChatLine);
    if (event !== 'none') {
      session.state = withPendingEvent(session.state, event, lastSeenLine);
      return 'interrupted';
    }
    session.state = { ...session.state, lastSeenChatLine: lastSeenLine };
    await ctx.clock.sleep(POLL_INTERVAL_MS, ctx.signal);
  }
  return 'timeout';
}

// --- Staging area ---

async function depositLoot(session: Session): Promise<void> {
  const { ctx } = session;
  ctx.log('step', 'banking loot...');
  if (!(await openBank(ctx))) return;

  const slots = lootSlots(await readInventory(ctx), session.options.survival);
  for (const slot of slots) {
    await ctx.client.bankDeposit(slot);
    await ctx.clock.sleep(DEPOSIT_DELAY_MS, ctx.signal);
  }
  await closeBank(ctx);
  session.stats.lootDeposits++;
  ctx.log('action', `deposited ${slots.length} loot slot${slots.length === 1 ? '' : 's'}.`);
}

async function restockFood(session: Session): Promise<void> {
  const { ctx, options } = session;
  const units = survivalUnits('food');
  const held = unitCount(await readInventory(ctx), units);
  const wanted = Math.max(1, options.targetCount - held);

  ctx.log('step', `restocking ${wanted} ${options.foodName}...`);
  if (!(await openBank(ctx))) return;
  await ctx.client.bankSearch(options.foodName);
  await ctx.client.bankWithdrawFirst(wanted);
  await ctx.client.bankCloseSearch();
  await closeBank(ctx);

  const after = unitCount(await readInventory(ctx), units);
  if (after === 0) {
    session.stopReason = `bank has no ${options.foodName} left and there is no other way to get food`;
    ctx.log('error', session.stopReason);
    return;
  }
  if (after <= held) {
    session.state = withRestockExhausted(session.state);
    ctx.log('thought', `bank is out of ${options.foodName}. going in with ${after} food.`);
    return;
  }
  ctx.log('action', `carrying ${after} food.`);
}

/** Walk through the doors and wait for the region to flip. Failure is reported, not thrown. */
async function usePassage(session: Session, destination: 'arena' | 'safe-area'): Promise<boolean> {
  const { ctx } = session;
  const doors = await findNearest(ctx, 'passage');
  if (!doors) return false;

  await ctx.client.moveTo(doors);
  await ctx.client.click();
  await ctx.clock.sleep(PASSAGE_SETTLE_MS, ctx.signal);

  const arrived = await retryUntil(
    async () => {
      const zone = await readZone(session);
      return destination === 'arena' ? zone === 'arena' : zone !== 'arena';
    },
    { attempts: PASSAGE_ATTEMPTS, intervalMs: POLL_INTERVAL_MS, clock: ctx.clock, signal: ctx.signal },
  );
  if (!arrived) {
    session.stats.failedTransitions++;
    ctx.log('error', destination === 'arena' ? 'failed to enter arena.' : 'failed to exit arena.');
    return false;
  }
  if (destination === 'arena') session.stats.arenaEntries++;
  ctx.log('action', destination === 'arena' ? 'entered arena.' : 'exited arena.');
  return true;
}

// --- Brazier ---

async function relight(session: Session): Promise<void> {
  const { ctx } = session;
  ctx.log('step', 'brazier went out! relighting...');
  const brazier = await findNearest(ctx, 'hazard-source');
  if (!brazier) return;

  await ctx.client.moveTo(brazier);
  const verb = await hoverVerb(ctx, ['Light', 'Feed']);
  if (verb === 'Light') {
    await ctx.client.click();
    await ctx.clock.sleep(LIGHT_DELAY_MS, ctx.signal);
    ctx.log('action', 'brazier relit.');
  } else if (verb === 'Feed') {
    ctx.log('action', 'brazier already relit by another player.');
    await ctx.client.click();
    await ctx.clock.sleep(CLICK_SETTLE_MS, ctx.signal);
  } else {
    await ctx.clock.sleep(POLL_INTERVAL_MS, ctx.signal);
  }
}

async function repair(session: Session): Promise<void> {
  const { ctx } = session;
  ctx.log('step', 'brazier broke! repairing...');
  const brazier = await findNearest(ctx, 'hazard-source');
  if (!brazier) return;

  await ctx.client.moveTo(brazier);
  const verb = await hoverVerb(ctx, ['Fix', 'Light', 'Feed']);
  if (verb === 'Fix') {
    await ctx.client.click();
    await ctx.clock.sleep(LIGHT_DELAY_MS, ctx.signal);
    ctx.log('action', 'brazier repaired.');
  } else if (verb === 'Light') {
    // Someone else fixed it but it still needs a flame
    await ctx.client.click();
    await ctx.clock.sleep(LIGHT_DELAY_MS, ctx.signal);
    ctx.log('action', 'brazier already fixed. lit it.');
  } else {
    await ctx.clock.sleep(POLL_INTERVAL_MS, ctx.signal);
  }
}

// --- Planned actions ---

async function gather(session: Session): Promise<void> {
  const { ctx } = session;
  ctx.log('step', 'chopping bruma roots...');
  const roots = await findNearest(ctx, 'raw-material-source');
  if (!roots) return;

  await ctx.client.moveTo(roots);
  if (!(await hoverVerb(ctx, ['Chop']))) {
    await ctx.clock.sleep(CLICK_SETTLE_MS, ctx.signal);
    return;
  }
  await ctx.client.click();
  await ctx.clock.sleep(CLICK_SETTLE_MS, ctx.signal);
  await waitWhileBusy(session, GATHER_TIMEOUT_MS);
}

async function convert(session: Session): Promise<void> {
  const { ctx } = session;
  const { materials, tools } = loadItemCatalogue();
  const inventory = await readInventory(ctx);
  const [knifeSlot] = slotsOf(inventory, tools.cutting.ids);
  const [rootSlot] = slotsOf(inventory, [materials.brumaRoot]);
  if (knifeSlot === undefined || rootSlot === undefined) {
    ctx.log('step', 'missing knife or roots for fletching.');
    await ctx.clock.sleep(CLICK_SETTLE_MS, ctx.signal);
    return;
  }

  ctx.log('step', 'fletching roots...');
  await clickSlot(ctx, knifeSlot);
  await ctx.clock.sleep(300, ctx.signal);
  await clickSlot(ctx, rootSlot);
  await ctx.clock.sleep(CLICK_SETTLE_MS, ctx.signal);
  await waitWhileBusy(session, CONVERT_TIMEOUT_MS);
}

async function feed(session: Session): Promise<void> {
  const { ctx } = session;
  const brazier = await findNearest(ctx, 'hazard-source');
  if (!brazier) return;

  ctx.log('step', 'feeding brazier...');
  await ctx.client.moveTo(brazier);
  const verb = await hoverVerb(ctx, ['Feed', 'Light']);
  if (verb === 'Light') {
    ctx.log('action', 'lighting brazier...');
    await ctx.client.click();
    await ctx.clock.sleep(LIGHT_DELAY_MS, ctx.signal);
    return;
  }
  if (!verb) {
    await ctx.clock.sleep(CLICK_SETTLE_MS, ctx.signal);
    return;
  }
  await ctx.client.click();
  await ctx.clock.sleep(CLICK_SETTLE_MS, ctx.signal);
  await waitWhileBusy(session, FEED_TIMEOUT_MS);
}

async function consume(session: Session, command: Extract<Command, { type: 'consume' }>): Promise<void> {
  const { ctx, options } = session;
  const slot = pickBestUnit(await readInventory(ctx), survivalUnits(options.survival));
  if (slot === null) {
    session.state = withConsumeFailed(session.state, command);
    ctx.log('step', `nothing to ${options.survival === 'food' ? 'eat' : 'drink'}.`);
    return;
  }
  ctx.log('action', `${options.survival === 'food' ? 'eating' : 'drinking'} (damage counter reset).`);
  await clickSlot(ctx, slot);
  await ctx.clock.sleep(CONSUME_DELAY_MS, ctx.signal);
  session.stats.consumed++;
}

async function resupply(session: Session, reason: 'exhausted' | 'between-rounds'): Promise<void> {
  const { ctx } = session;
  if (reason === 'exhausted') ctx.log('step', 'out of potions. crafting more before it gets worse.');
  const report = await runCraftingPipeline({
    ctx,
    targetUnits: session.options.targetCount,
    waitForIdle: async timeoutMs => (await waitWhileBusy(session, timeoutMs)) === 'idle',
  });
  session.stats.dosesCrafted += Math.max(0, report.finalDoses - report.startDoses);
}

export async function executeCommand(session: Session, command: Command): Promise<void> {
  const { ctx } = session;
  switch (command.type) {
    case 'deposit-loot':
      return depositLoot(session);
    case 'restock':
      return restockFood(session);
    case 'enter-arena':
      ctx.log('step', 'entering Wintertodt arena...');
      await usePassage(session, 'arena');
      return;
    case 'exit-arena':
      ctx.log('step', `leaving arena: ${command.reason}.`);
      await usePassage(session, 'safe-area');
      return;
    case 'relight':
      return relight(session);
    case 'repair':
      return repair(session);
    case 'round-summary':
      session.stats.roundsCompleted = command.roundsCompleted;
      ctx.log('result', `round complete! total rounds: ${command.roundsCompleted}`);
      return;
    case 'consume':
      return consume(session, command);
    case 'resupply':
      return resupply(session, command.reason);
    case 'gather':
      return gather(session);
    case 'convert':
      return convert(session);
    case 'feed':
      return feed(session);
    case 'wait':
      await ctx.clock.sleep(command.ms, ctx.signal);
      return;
  }
}

/** One observe -> advance -> execute cycle. Returns the commands that ran. */
export async function tick(session: Session): Promise<Command[]> {
  const { ctx } = session;
  session.stats.ticks++;
  const { state, commands } = advance(session.state, await observe(session), session.settings);
  session.state = state;

  const executed: Command[] = [];
  for (const command of commands) {
    if (ctx.signal.aborted || session.stopReason) break;
    await executeCommand(session, command);
    executed.push(command);
  }

  if (session.options.takeBreaks && session.state.phase.kind !== 'round-active' && session.random() < BREAK_CHANCE) {
    ctx.log('step', 'taking a short break.');
    await ctx.client.takeBreak(BREAK_MAX_SECONDS);
  }
  return executed;
}

export interface SessionResult {
  success: boolean;
  summary: string;
  stats: SessionStats & { missingGear?: string[] };
}

/**
 * Full run: gear check, then ticks until the time budget runs out, the signal aborts or
 * the run hits something it cannot recover from.
 */
export async function runSession(session: Session): Promise<SessionResult> {
  const { ctx, options } = session;
  const gear = await ensureReady(ctx, { convertEnabled: options.convertEnabled });
  if (!gear.ready) {
    return {
      success: false,
      summary: `missing required gear: ${gear.missing.join(', ')}`,
      stats: { ...session.stats, missingGear: gear.missing },
    };
  }

  const endAt = ctx.clock.now() + options.runMinutes * 60_000;
  while (ctx.clock.now() < endAt && !ctx.signal.aborted && !session.stopReason) {
    try {
      await tick(session);
    } catch (err: unknown) {
      // Actuation failures are transient from the loop's point of view
      const msg = err instanceof Error ? err.message : String(err);
      session.stats.tickErrors++;
      ctx.log('error', `tick failed: ${msg}`);
      await ctx.clock.sleep(MISS_BACKOFF_MS, ctx.signal);
    }
  }

  const rounds = session.state.roundsCompleted;
  session.stats.roundsCompleted = rounds;
  if (session.stopReason) {
    return { success: false, summary: `stopped after ${rounds} rounds: ${session.stopReason}`, stats: session.stats };
  }
  const suffix = ctx.signal.aborted ? ' (killed early)' : '';
  return { success: true, summary: `finished. rounds completed: ${rounds}${suffix}`, stats: session.stats };
}
