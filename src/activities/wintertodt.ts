import { registerActivity } from './registry.js';
import { parseRunOptions, validateRunOptions } from '../config.js';
import { createSession, runSession } from '../game/controller.js';
import { systemClock } from '../game/clock.js';
import type { Clock } from '../game/clock.js';
import type { GameClient } from '../game/client.js';
import type { DispatchPlan, DispatchLogger, DispatchResult } from './types.js';

/** Supplies the live game client for a run. Called once per dispatch. */
export type ClientFactory = (log: DispatchLogger) => Promise<GameClient>;

export interface WintertodtActivityOptions {
  clock?: Clock;
  /** Break roll source; defaults to Math.random */
  random?: () => number;
}

async function executeWintertodt(
  plan: DispatchPlan,
  log: DispatchLogger,
  signal: AbortSignal,
  connect: ClientFactory,
  opts: WintertodtActivityOptions,
): Promise<DispatchResult> {
  const options = parseRunOptions(plan.params);
  log('step', `starting: ${options.runMinutes} min, ${options.survival} survival, threshold ${options.damageThreshold}, target ${options.targetCount}`);
  if (options.useRespawnTimer) log('thought', 'respawn timer enabled as a round-start fallback.');

  const client = await connect(log);
  const session = createSession(
    { client, clock: opts.clock ?? systemClock, log, signal },
    options,
    opts.random,
  );
  const result = await runSession(session);
  return { success: result.success, summary: result.summary, stats: { ...result.stats } };
}

export function registerWintertodtActivity(connect: ClientFactory, opts: WintertodtActivityOptions = {}): void {
  registerActivity({
    id: 'wintertodt',
    name: 'Wintertodt',
    description: 'Play rounds of the Wintertodt minigame: chop, fletch and feed the brazier, relight and repair it, and keep warm with food or crafted rejuvenation potions.',
    paramSchema: [
      {
        key: 'runMinutes',
        label: 'Run Minutes',
        type: 'number',
        default: 60,
        description: 'Wall-clock budget for the run (1-500)',
      },
      {
        key: 'damageThreshold',
        label: 'Damage Threshold',
        type: 'number',
        default: 3,
        description: 'Damage events tolerated before eating or drinking (1-20)',
      },
      {
        key: 'targetCount',
        label: 'Target Count',
        type: 'number',
        default: 5,
        description: 'Food pieces or whole potions to top up to (1-20)',
      },
      {
        key: 'survival',
        label: 'Survival',
        type: 'string',
        default: 'food',
        description: '"food" (restock from the bank) or "potions" (craft in the arena)',
      },
      {
        key: 'foodName',
        label: 'Food Name',
        type: 'string',
        default: 'Salmon',
        description: 'Bank search term used when restocking food',
      },
      {
        key: 'convertEnabled',
        label: 'Fletch Roots',
        type: 'boolean',
        default: false,
        description: 'Fletch roots into kindling before feeding (needs a knife)',
      },
      {
        key: 'takeBreaks',
        label: 'Take Breaks',
        type: 'boolean',
        default: false,
      },
      {
        key: 'useRespawnTimer',
        label: 'Respawn Timer',
        type: 'boolean',
        default: false,
        description: 'Treat 65s after a round end as the next round start',
      },
    ],
    validateParams: validateRunOptions,
    execute: (plan, log, signal) => executeWintertodt(plan, log, signal, connect, opts),
  });
}
