import { existsSync, mkdirSync, appendFileSync, readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { ensureStateDir, atomicWriteFileSync, statePath } from '../state/persistence.js';
import { getActivity, withParamDefaults } from './registry.js';
import type { ActivityConfig, DispatchPlan, DispatchLogEntry, DispatchLogger, DispatchResult } from './types.js';

const MAX_LOG_ENTRIES = 200;

function dispatchesDir(): string {
  return statePath('dispatches');
}

function ensureDispatchesDir(): void {
  ensureStateDir();
  if (!existsSync(dispatchesDir())) {
    mkdirSync(dispatchesDir(), { recursive: true });
  }
}

function dispatchFilePath(id: string): string {
  return join(dispatchesDir(), `dispatch-${id}.jsonl`);
}

function dispatchPlanPath(id: string): string {
  return join(dispatchesDir(), `plan-${id}.json`);
}

// --- Per-dispatch in-memory state ---

interface DispatchInstance {
  plan: DispatchPlan;
  result: DispatchResult | null;
  logEntries: DispatchLogEntry[];
  abortController: AbortController;
  done: Promise<void> | null;
}

const dispatches = new Map<string, DispatchInstance>();

// --- Dispatch plan persistence ---

function persistPlan(plan: DispatchPlan, result: DispatchResult | null): void {
  ensureDispatchesDir();
  const data = JSON.stringify({ plan, result }, null, 2);
  try { atomicWriteFileSync(dispatchPlanPath(plan.id), data); } catch { /* non-fatal */ }
}

function isPlan(value: unknown): value is DispatchPlan {
  if (typeof value !== 'object' || value === null) return false;
  return 'id' in value && typeof value.id === 'string'
    && 'activity' in value && typeof value.activity === 'string'
    && 'status' in value && typeof value.status === 'string';
}

function isResult(value: unknown): value is DispatchResult {
  return typeof value === 'object' && value !== null
    && 'success' in value && typeof value.success === 'boolean'
    && 'summary' in value && typeof value.summary === 'string';
}

/**
 * Load plans written by an earlier process. Anything that was still running when that
 * process died is marked failed.
 */
export function restorePersistedPlans(): number {
  ensureDispatchesDir();
  let restored = 0;
  try {
    const files = readdirSync(dispatchesDir())
      .filter(f => f.startsWith('plan-') && f.endsWith('.json'));
    for (const f of files) {
      try {
        const data: unknown = JSON.parse(readFileSync(join(dispatchesDir(), f), 'utf-8'));
        if (typeof data !== 'object' || data === null || !('plan' in data)) continue;
        const plan = data.plan;
        if (!isPlan(plan) || dispatches.has(plan.id)) continue;
        let result = 'result' in data && isResult(data.result) ? data.result : null;
        if (plan.status === 'running' || plan.status === 'approved') {
          plan.status = 'failed';
          plan.completedAt = new Date().toISOString();
          result = { success: false, summary: 'run interrupted by process restart' };
        }
        dispatches.set(plan.id, {
          plan,
          result,
          logEntries: [],
          abortController: new AbortController(),
          done: null,
        });
        restored++;
      } catch { /* corrupted plan file */ }
    }
  } catch { /* dir not ready */ }
  return restored;
}

// --- Log persistence ---

function appendLog(id: string, entry: DispatchLogEntry): void {
  ensureDispatchesDir();
  appendFileSync(dispatchFilePath(id), JSON.stringify(entry) + '\n', 'utf-8');
}

function createLogger(id: string): DispatchLogger {
  return (type, message, data) => {
    const entry: DispatchLogEntry = {
      timestamp: new Date().toISOString(),
      type,
      message,
      ...(data ? { data } : {}),
    };
    appendLog(id, entry);

    const inst = dispatches.get(id);
    if (inst) {
      inst.logEntries.push(entry);
      if (inst.logEntries.length > MAX_LOG_ENTRIES) {
        inst.logEntries = inst.logEntries.slice(-MAX_LOG_ENTRIES);
      }
    }
    console.log(`[Dispatch] [${type}] ${message}`);
  };
}

// --- Plan lifecycle ---

export function createPlan(activity: string, params: Record<string, unknown>, summary: string): DispatchPlan {
  const id = Date.now().toString(36) + '-' + Math.random().toString(36).slice(2, 6);
  const config = getActivity(activity);
  const plan: DispatchPlan = {
    id,
    activity,
    params: config ? withParamDefaults(config, params) : params,
    summary,
    status: 'proposed',
    createdAt: new Date().toISOString(),
  };

  dispatches.set(id, {
    plan,
    result: null,
    logEntries: [],
    abortController: new AbortController(),
    done: null,
  });

  const log = createLogger(id);
  log('plan', summary, { activity, params: plan.params });
  persistPlan(plan, null);

  return plan;
}

async function runDispatch(inst: DispatchInstance, activity: ActivityConfig, log: DispatchLogger): Promise<void> {
  const { plan } = inst;
  const signal = inst.abortController.signal;

  try {
    const result = await activity.execute(plan, log, signal);
    plan.status = result.success ? 'complete' : 'failed';
    plan.completedAt = new Date().toISOString();
    inst.result = result;
    persistPlan(plan, result);
    log('complete', result.summary, { success: result.success, ...(result.stats || {}) });
  } catch (err: unknown) {
    plan.completedAt = new Date().toISOString();
    if (signal.aborted) {
      plan.status = 'killed';
      inst.result = { success: false, summary: 'run killed by operator' };
      persistPlan(plan, inst.result);
      log('complete', inst.result.summary, { success: false, killed: true });
      return;
    }
    plan.status = 'failed';
    const msg = err instanceof Error ? err.message : String(err);
    inst.result = { success: false, summary: `run crashed: ${msg}` };
    persistPlan(plan, inst.result);
    log('error', `fatal: ${msg}`);
    log('complete', inst.result.summary, { success: false });
  }
}

export function approvePlan(planId: string): { ok: boolean; error?: string } {
  const inst = dispatches.get(planId);
  if (!inst) {
    return { ok: false, error: 'no matching pending plan' };
  }
  if (inst.plan.status !== 'proposed') {
    return { ok: false, error: `plan status is "${inst.plan.status}", expected "proposed"` };
  }

  const activity = getActivity(inst.plan.activity);
  if (!activity) {
    return { ok: false, error: `unknown activity "${inst.plan.activity}"` };
  }
  const invalid = activity.validateParams?.(inst.plan.params) ?? null;
  if (invalid) {
    return { ok: false, error: `invalid params: ${invalid}` };
  }

  inst.plan.status = 'approved';
  inst.plan.approvedAt = new Date().toISOString();

  const log = createLogger(planId);
  log('approval', 'plan approved, launching run');

  inst.plan.status = 'running';
  persistPlan(inst.plan, null);
  inst.done = runDispatch(inst, activity, log).catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[Dispatch] ${planId} ended abnormally: ${msg}`);
  });

  return { ok: true };
}

export function cancelPlan(planId: string): { ok: boolean; error?: string } {
  const inst = dispatches.get(planId);
  if (!inst) {
    return { ok: false, error: 'no matching plan' };
  }
  if (inst.plan.status !== 'proposed') {
    return { ok: false, error: `can only cancel proposed plans, current is "${inst.plan.status}"` };
  }

  inst.plan.status = 'cancelled';
  inst.plan.completedAt = new Date().toISOString();
  persistPlan(inst.plan, null);
  const log = createLogger(planId);
  log('complete', 'run cancelled by operator', { success: false, cancelled: true });

  return { ok: true };
}

export function killDispatch(dispatchId: string): { ok: boolean; error?: string } {
  const inst = dispatches.get(dispatchId);
  if (!inst) {
    return { ok: false, error: 'no matching dispatch' };
  }
  if (inst.plan.status !== 'running') {
    return { ok: false, error: `can only kill running dispatches, current is "${inst.plan.status}"` };
  }

  inst.abortController.abort();
  return { ok: true };
}

/** Resolves once the dispatch has finished (immediately if it never started). */
export async function waitForDispatch(dispatchId: string): Promise<DispatchResult | null> {
  const inst = dispatches.get(dispatchId);
  if (!inst) return null;
  if (inst.done) await inst.done;
  return inst.result;
}

export function getDispatch(dispatchId: string): {
  plan: DispatchPlan | null;
  result: DispatchResult | null;
  recentLog: DispatchLogEntry[];
} {
  const inst = dispatches.get(dispatchId);
  if (!inst) {
    return { plan: null, result: null, recentLog: [] };
  }
  return {
    plan: inst.plan,
    result: inst.result,
    recentLog: inst.logEntries,
  };
}

/** The running dispatch if there is one, otherwise the most recently created. */
export function getCurrentDispatch(): {
  plan: DispatchPlan | null;
  result: DispatchResult | null;
  recentLog: DispatchLogEntry[];
} {
  for (const inst of dispatches.values()) {
    if (inst.plan.status === 'running') {
      return { plan: inst.plan, result: inst.result, recentLog: inst.logEntries };
    }
  }
  let latest: DispatchInstance | null = null;
  for (const inst of dispatches.values()) {
    if (!latest || inst.plan.createdAt > latest.plan.createdAt) {
      latest = inst;
    }
  }
  if (latest) {
    return { plan: latest.plan, result: latest.result, recentLog: latest.logEntries };
  }
  return { plan: null, result: null, recentLog: [] };
}

function parseEntries(content: string): DispatchLogEntry[] {
  return content
    .trimEnd()
    .split('\n')
    .filter(l => l.trim())
    .map((l): DispatchLogEntry => JSON.parse(l));
}

export function getDispatchLog(id: string): DispatchLogEntry[] {
  try {
    return parseEntries(readFileSync(dispatchFilePath(id), 'utf-8'));
  } catch {
    return [];
  }
}

export interface DispatchSummary {
  id: string;
  activity: string;
  status: string;
  createdAt: string;
  completedAt?: string;
  entryCount: number;
  preview: string;
}

export function listDispatches(): DispatchSummary[] {
  ensureDispatchesDir();
  try {
    const files = readdirSync(dispatchesDir())
      .filter(f => f.startsWith('dispatch-') && f.endsWith('.jsonl'))
      .sort()
      .reverse();

    return files.map(f => {
      const id = f.replace(/^dispatch-/, '').replace(/\.jsonl$/, '');
      let entryCount = 0;
      let preview = '';
      let activity = '';
      let status = '';
      let createdAt = '';
      let completedAt: string | undefined;

      try {
        const entries = parseEntries(readFileSync(join(dispatchesDir(), f), 'utf-8'));
        entryCount = entries.length;

        const first = entries[0];
        if (first) {
          preview = first.message?.slice(0, 80) || '';
          const act = first.data?.activity;
          activity = typeof act === 'string' ? act : '';
          createdAt = first.timestamp;
        }

        const last = [...entries].reverse().find(e => e.type === 'complete');
        if (last) {
          if (last.data?.killed) {
            status = 'killed';
          } else if (last.data?.cancelled) {
            status = 'cancelled';
          } else {
            status = last.data?.success === true ? 'complete' : 'failed';
          }
          completedAt = last.timestamp;
        }
        if (!status) status = 'running';
      } catch { /* corrupted file */ }

      return { id, activity, status, createdAt, completedAt, entryCount, preview };
    });
  } catch {
    return [];
  }
}
