import { classifyChatLine } from './chat.js';
import { nextAction } from './planner.js';
import { shouldDrinkOrEat } from './warmth.js';
import type { ChatEvent, PlannedAction, ResourceState, RoundState, SurvivalKind, Zone } from './types.js';

// --- Round lifecycle: pure transition function ---
// One call per tick. The controller gathers an Observation, calls advance(), and executes
// the returned commands in order. No I/O happens here.

export const RESPAWN_INTERVAL_MS = 60_000;
export const RESPAWN_MARGIN_MS = 5_000;
export const ROUND_SETTLE_MS = 3_000;
export const LOW_WATER_MARK = 2;
const IDLE_WAIT_MS = 2_000;
const BUSY_WAIT_MS = 1_000;

export interface LifecycleSettings {
  survival: SurvivalKind;
  damageThreshold: number;
  /** Survival value (doses or bites) the agent tops up to */
  targetValue: number;
  lowWaterMark: number;
  convertEnabled: boolean;
  useRespawnTimer: boolean;
  respawnIntervalMs: number;
  respawnMarginMs: number;
  settleMs: number;
}

export interface Observation {
  now: number;
  zone: Zone;
  chatLine: string;
  idle: boolean;
  /** Tagged brazier or roots on screen; only meaningful while awaiting a round */
  hazardVisible: boolean;
  resources: ResourceState;
}

export type Command =
  | { type: 'deposit-loot' }
  | { type: 'restock' }
  | { type: 'enter-arena' }
  | { type: 'exit-arena'; reason: string }
  | { type: 'relight' }
  | { type: 'repair' }
  | { type: 'round-summary'; roundsCompleted: number }
  | { type: 'consume'; clearedDamage: number; previousConsumedAt: number | null }
  | { type: 'resupply'; reason: 'exhausted' | 'between-rounds' }
  | { type: PlannedAction }
  | { type: 'wait'; ms: number; reason: string };

export interface Transition {
  state: RoundState;
  commands: Command[];
}

export function createRoundState(): RoundState {
  return {
    phase: { kind: 'awaiting-round' },
    damageCounter: 0,
    roundEndedAt: null,
    lastSeenChatLine: '',
    roundsCompleted: 0,
    lastConsumedAt: null,
    pendingEvent: 'none',
    restockExhausted: false,
  };
}

export function craftsInArena(settings: Pick<LifecycleSettings, 'survival'>): boolean {
  return settings.survival === 'potions';
}

/**
 * Record an event seen outside the main tick (e.g. while waiting on an action).
 * The next advance() handles it before reading a fresh chat line.
 */
export function withPendingEvent(state: RoundState, event: ChatEvent, lastSeenLine: string): RoundState {
  return { ...state, pendingEvent: event, lastSeenChatLine: lastSeenLine };
}

/** Mark the bank as out of food so the staging area stops asking for a restock. */
export function withRestockExhausted(state: RoundState): RoundState {
  return { ...state, restockExhausted: true };
}

/**
 * Undo a consume that found nothing to use. Damage counted since the command was
 * issued is kept on top of what it cleared.
 */
export function withConsumeFailed(state: RoundState, command: Extract<Command, { type: 'consume' }>): RoundState {
  return {
    ...state,
    damageCounter: state.damageCounter + command.clearedDamage,
    lastConsumedAt: command.previousConsumedAt,
  };
}

export function advance(state: RoundState, obs: Observation, settings: LifecycleSettings): Transition {
  if (obs.zone !== 'arena') return advanceInSafeArea(state, obs, settings);
  return advanceInArena(state, obs, settings);
}

function advanceInSafeArea(state: RoundState, obs: Observation, settings: LifecycleSettings): Transition {
  // A failed position read says nothing about the round: phase, parked event and chat
  // memory stay as they were so the next arena tick still sees them.
  let next = state;
  if (obs.zone === 'safe-area') {
    // Keep dedup memory current so a broadcast read here doesn't fire again after entering
    const { lastSeenLine } = classifyChatLine(obs.chatLine, state.lastSeenChatLine);
    next = {
      ...state,
      phase: { kind: 'awaiting-round' },
      lastSeenChatLine: lastSeenLine,
      pendingEvent: 'none',
    };
  }

  if (obs.resources.hasLoot) {
    return { state: next, commands: [{ type: 'deposit-loot' }] };
  }
  if (!craftsInArena(settings) && !state.restockExhausted && obs.resources.survivalValue < settings.targetValue) {
    return { state: next, commands: [{ type: 'restock' }] };
  }
  return { state: next, commands: [{ type: 'enter-arena' }] };
}

function advanceInArena(state: RoundState, obs: Observation, settings: LifecycleSettings): Transition {
  const { now, resources } = obs;
  const commands: Command[] = [];
  let next: RoundState = { ...state };

  let event: ChatEvent;
  if (state.pendingEvent !== 'none') {
    event = state.pendingEvent;
    next.pendingEvent = 'none';
  } else {
    const classified = classifyChatLine(obs.chatLine, state.lastSeenChatLine);
    event = classified.event;
    next.lastSeenChatLine = classified.lastSeenLine;
  }

  switch (event) {
    case 'round-end': {
      const roundsCompleted = state.roundsCompleted + 1;
      next = {
        ...next,
        phase: { kind: 'round-ending', endedAt: now },
        roundsCompleted,
        roundEndedAt: now,
        restockExhausted: false,
      };
      commands.push(
        { type: 'round-summary', roundsCompleted },
        { type: 'wait', ms: settings.settleMs, reason: 'reward resolution' },
      );
      return { state: next, commands };
    }
    case 'hazard-out':
      commands.push({ type: 'relight' });
      break;
    case 'hazard-broken':
      next.damageCounter += 1;
      commands.push({ type: 'repair' });
      break;
    case 'damaged':
      next.damageCounter += 1;
      if (next.phase.kind !== 'round-active') {
        next.phase = { kind: 'round-active', since: now };
      }
      break;
    case 'none':
      break;
  }

  const warmth = shouldDrinkOrEat(next.damageCounter, settings.damageThreshold, resources.survivalUnits > 0);
  if (warmth === 'consume') {
    commands.push({ type: 'consume', clearedDamage: next.damageCounter, previousConsumedAt: next.lastConsumedAt });
    next.damageCounter = 0;
    next.lastConsumedAt = now;
  } else if (warmth === 'exhausted') {
    commands.push(craftsInArena(settings)
      ? { type: 'resupply', reason: 'exhausted' }
      : { type: 'exit-arena', reason: 'out of food' });
    return { state: next, commands };
  }

  if (event === 'hazard-out' || event === 'hazard-broken') {
    return { state: next, commands };
  }

  if (next.phase.kind === 'round-ending') {
    return settleRoundEnd(next, obs, settings, commands, next.phase.endedAt);
  }

  if (next.phase.kind === 'awaiting-round') {
    if (roundLooksActive(next, obs, settings)) {
      next.phase = { kind: 'round-active', since: now };
    } else {
      commands.push(betweenRounds(resources, settings));
      return { state: next, commands };
    }
  }

  if (!obs.idle) {
    commands.push({ type: 'wait', ms: BUSY_WAIT_MS, reason: 'player busy' });
    return { state: next, commands };
  }
  commands.push({
    type: nextAction({
      hasRawMaterial: resources.rawMaterial > 0,
      hasIntermediate: resources.intermediate > 0,
      inventoryFull: resources.inventoryFull,
      convertEnabled: settings.convertEnabled,
    }),
  });
  return { state: next, commands };
}

// Visual check runs before the timer: whichever is true first wins
function roundLooksActive(state: RoundState, obs: Observation, settings: LifecycleSettings): boolean {
  if (obs.hazardVisible) return true;
  if (!settings.useRespawnTimer || state.roundEndedAt === null) return false;
  return obs.now - state.roundEndedAt >= settings.respawnIntervalMs + settings.respawnMarginMs;
}

function betweenRounds(resources: ResourceState, settings: LifecycleSettings): Command {
  if (craftsInArena(settings)) {
    if (resources.survivalValue < settings.targetValue) return { type: 'resupply', reason: 'between-rounds' };
  } else if (resources.survivalUnits === 0) {
    return { type: 'exit-arena', reason: 'no food for the next round' };
  }
  return { type: 'wait', ms: IDLE_WAIT_MS, reason: 'waiting for round' };
}

function settleRoundEnd(
  state: RoundState,
  obs: Observation,
  settings: LifecycleSettings,
  commands: Command[],
  endedAt: number,
): Transition {
  const elapsed = obs.now - endedAt;
  if (elapsed < settings.settleMs) {
    commands.push({ type: 'wait', ms: settings.settleMs - elapsed, reason: 'reward resolution' });
    return { state, commands };
  }

  const next: RoundState = { ...state, phase: { kind: 'awaiting-round' } };
  const { survivalValue } = obs.resources;
  if (craftsInArena(settings)) {
    // Potions come from the arena itself, so top up here instead of walking out
    if (survivalValue < settings.targetValue) commands.push({ type: 'resupply', reason: 'between-rounds' });
  } else if (survivalValue < settings.lowWaterMark) {
    commands.push({ type: 'exit-arena', reason: 'restocking food between rounds' });
  }
  return { state: next, commands };
}
