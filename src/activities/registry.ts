import type { ActivityConfig } from './types.js';

const activities = new Map<string, ActivityConfig>();

export function registerActivity(activity: ActivityConfig): void {
  if (activities.has(activity.id)) {
    console.warn(`[Registry] Replacing activity "${activity.id}"`);
  }
  activities.set(activity.id, activity);
}

export function unregisterActivity(id: string): boolean {
  return activities.delete(id);
}

export function getActivity(id: string): ActivityConfig | undefined {
  return activities.get(id);
}

export function listActivities(): ActivityConfig[] {
  return Array.from(activities.values());
}

/** Fill in every param the caller left out that has a declared default. */
export function withParamDefaults(activity: ActivityConfig, params: Record<string, unknown>): Record<string, unknown> {
  const filled: Record<string, unknown> = { ...params };
  for (const field of activity.paramSchema) {
    if (filled[field.key] === undefined && field.default !== undefined) {
      filled[field.key] = field.default;
    }
  }
  return filled;
}
