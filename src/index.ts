import { approvePlan } from './activities/runner.js';
import { planFromPreset } from './activities/presets.js';
import type { DispatchPlan } from './activities/types.js';

export { registerWintertodtActivity } from './activities/wintertodt.js';
export type { ClientFactory, WintertodtActivityOptions } from './activities/wintertodt.js';
export {
  createPlan,
  approvePlan,
  cancelPlan,
  killDispatch,
  waitForDispatch,
  getDispatch,
  getCurrentDispatch,
  getDispatchLog,
  listDispatches,
  restorePersistedPlans,
} from './activities/runner.js';
export type { DispatchSummary } from './activities/runner.js';
export { getActivity, listActivities } from './activities/registry.js';
export { getPresets, getPreset, planFromPreset } from './activities/presets.js';
export type { DispatchPreset } from './activities/presets.js';
export type {
  ActivityConfig,
  DispatchPlan,
  DispatchLogEntry,
  DispatchLogger,
  DispatchResult,
} from './activities/types.js';
export { parseRunOptions, validateRunOptions, RunOptionsSchema } from './config.js';
export type { RunOptions } from './config.js';
export { systemClock, ManualClock } from './game/clock.js';
export type { Clock } from './game/clock.js';
export type { GameClient, GameQueries, GameActuator, BankPanel } from './game/client.js';
export type { InventoryItem, Position, Target, TargetCategory, SurvivalKind } from './game/types.js';

/**
 * Create and approve a plan from a preset in one go. The activity must already be
 * registered (see registerWintertodtActivity).
 */
export function launchPreset(
  presetId: string,
  overrides: Record<string, unknown> = {},
): { ok: true; plan: DispatchPlan } | { ok: false; error: string } {
  const plan = planFromPreset(presetId, overrides);
  if (!plan) return { ok: false, error: `unknown preset "${presetId}"` };

  const approved = approvePlan(plan.id);
  if (!approved.ok) {
    console.warn(`[Dispatch] preset ${presetId} rejected: ${approved.error}`);
    return { ok: false, error: approved.error ?? 'approval failed' };
  }
  return { ok: true, plan };
}
