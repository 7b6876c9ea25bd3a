import { describe, it, expect, beforeAll, vi } from 'vitest';
import { mkdtempSync, writeFileSync, mkdirSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  approvePlan,
  cancelPlan,
  createPlan,
  getDispatch,
  getDispatchLog,
  killDispatch,
  listDispatches,
  restorePersistedPlans,
  waitForDispatch,
} from './runner.js';
import { registerActivity } from './registry.js';

let stateDir = '';

beforeAll(() => {
  stateDir = mkdtempSync(join(tmpdir(), 'wt-runner-'));
  vi.stubEnv('STATE_DIR', stateDir);
  vi.spyOn(console, 'log').mockImplementation(() => {});

  registerActivity({
    id: 'test-ok',
    name: 'OK',
    description: 'always succeeds',
    paramSchema: [{ key: 'rounds', label: 'Rounds', type: 'number', default: 3 }],
    validateParams: params => (params.rounds === 0 ? 'rounds must be positive' : null),
    execute: async (_plan, log) => {
      log('step', 'working');
      return { success: true, summary: 'done', stats: { rounds: 3 } };
    },
  });
  registerActivity({
    id: 'test-crash',
    name: 'Crash',
    description: 'always throws',
    paramSchema: [],
    execute: async () => { throw new Error('boom'); },
  });
  registerActivity({
    id: 'test-hang',
    name: 'Hang',
    description: 'runs until aborted',
    paramSchema: [],
    execute: (_plan, _log, signal) => new Promise((_, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')));
    }),
  });
});

describe('createPlan', () => {
  it('fills param defaults from the activity schema', () => {
    const plan = createPlan('test-ok', {}, 'a quick run');
    expect(plan.params).toEqual({ rounds: 3 });
    expect(plan.status).toBe('proposed');
  });
});

describe('approvePlan', () => {
  it('runs the activity and records the result', async () => {
    const plan = createPlan('test-ok', { rounds: 3 }, 'a quick run');
    expect(approvePlan(plan.id)).toEqual({ ok: true });

    const result = await waitForDispatch(plan.id);

    expect(result).toEqual({ success: true, summary: 'done', stats: { rounds: 3 } });
    expect(getDispatch(plan.id).plan?.status).toBe('complete');
    expect(getDispatchLog(plan.id).map(e => e.type)).toEqual(['plan', 'approval', 'step', 'complete']);
  });

  it('rejects params the activity refuses', () => {
    const plan = createPlan('test-ok', { rounds: 0 }, 'bad run');
    expect(approvePlan(plan.id)).toEqual({ ok: false, error: 'invalid params: rounds must be positive' });
    expect(getDispatch(plan.id).plan?.status).toBe('proposed');
  });

  it('rejects an unknown activity', () => {
    const plan = createPlan('nope', {}, 'nothing');
    expect(approvePlan(plan.id)).toEqual({ ok: false, error: 'unknown activity "nope"' });
  });

  it('marks a crashing run failed', async () => {
    const plan = createPlan('test-crash', {}, 'doomed');
    approvePlan(plan.id);

    const result = await waitForDispatch(plan.id);

    expect(result).toEqual({ success: false, summary: 'run crashed: boom' });
    expect(getDispatch(plan.id).plan?.status).toBe('failed');
  });

  it('refuses a plan that already started', async () => {
    const plan = createPlan('test-ok', {}, 'twice');
    approvePlan(plan.id);
    expect(approvePlan(plan.id)).toEqual({ ok: false, error: 'plan status is "running", expected "proposed"' });
    await waitForDispatch(plan.id);
  });
});

describe('killDispatch', () => {
  it('aborts a running dispatch', async () => {
    const plan = createPlan('test-hang', {}, 'forever');
    approvePlan(plan.id);

    expect(killDispatch(plan.id)).toEqual({ ok: true });
    const result = await waitForDispatch(plan.id);

    expect(result).toEqual({ success: false, summary: 'run killed by operator' });
    expect(getDispatch(plan.id).plan?.status).toBe('killed');
  });
});

describe('cancelPlan', () => {
  it('cancels a proposed plan only', () => {
    const plan = createPlan('test-ok', {}, 'maybe later');
    expect(cancelPlan(plan.id)).toEqual({ ok: true });
    expect(cancelPlan(plan.id)).toEqual({ ok: false, error: 'can only cancel proposed plans, current is "cancelled"' });
    expect(listDispatches().find(d => d.id === plan.id)?.status).toBe('cancelled');
  });
});

describe('restorePersistedPlans', () => {
  it('marks plans left running by a dead process as failed', () => {
    const dir = join(stateDir, 'dispatches');
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'plan-old-1.json'), JSON.stringify({
      plan: {
        id: 'old-1',
        activity: 'test-ok',
        params: {},
        summary: 'from before',
        status: 'running',
        createdAt: '2026-01-01T00:00:00.000Z',
      },
      result: null,
    }));
    writeFileSync(join(dir, 'plan-broken.json'), '{ not json');

    expect(restorePersistedPlans()).toBe(1);
    const restored = getDispatch('old-1');
    expect(restored.plan?.status).toBe('failed');
    expect(restored.result).toEqual({ success: false, summary: 'run interrupted by process restart' });
  });
});
