import 'dotenv/config';
import { z } from 'zod';

export const config = {
  get STATE_DIR() { return process.env.STATE_DIR || './state'; },
};

// Env values arrive as strings; dispatch params may already be typed
const flag = z.preprocess(
  v => (v === 'true' || v === '1' ? true : v === 'false' || v === '0' || v === '' ? false : v),
  z.boolean(),
);

export const RunOptionsSchema = z.object({
  /** Wall-clock budget for the whole run */
  runMinutes: z.coerce.number().int().min(1).max(500).default(60),
  /** Damage events tolerated before eating or drinking */
  damageThreshold: z.coerce.number().int().min(1).max(20).default(3),
  /** Food pieces, or whole potions, to top up to */
  targetCount: z.coerce.number().int().min(1).max(20).default(5),
  survival: z.enum(['food', 'potions']).default('food'),
  /** Bank search term used when restocking food */
  foodName: z.string().min(1).default('Salmon'),
  /** Fletch roots into kindling before feeding */
  convertEnabled: flag.default(false),
  takeBreaks: flag.default(false),
  /** Trust the fixed respawn period as a round-start signal */
  useRespawnTimer: flag.default(false),
});
export type RunOptions = z.infer<typeof RunOptionsSchema>;

const ENV_KEYS: Record<keyof RunOptions, string> = {
  runMinutes: 'WT_RUN_MINUTES',
  damageThreshold: 'WT_DAMAGE_THRESHOLD',
  targetCount: 'WT_TARGET_COUNT',
  survival: 'WT_SURVIVAL',
  foodName: 'WT_FOOD_NAME',
  convertEnabled: 'WT_CONVERT',
  takeBreaks: 'WT_TAKE_BREAKS',
  useRespawnTimer: 'WT_RESPAWN_TIMER',
};

function envDefaults(): Record<string, string> {
  const defaults: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = process.env[envKey];
    if (value !== undefined && value !== '') defaults[key] = value;
  }
  return defaults;
}

function withDefaults(params: Record<string, unknown>): Record<string, unknown> {
  const defined = Object.fromEntries(Object.entries(params).filter(([, v]) => v !== undefined && v !== null));
  return { ...envDefaults(), ...defined };
}

/** Dispatch params over WT_* env vars over built-in defaults. Throws a ZodError when invalid. */
export function parseRunOptions(params: Record<string, unknown>): RunOptions {
  return RunOptionsSchema.parse(withDefaults(params));
}

export function validateRunOptions(params: Record<string, unknown>): string | null {
  const result = RunOptionsSchema.safeParse(withDefaults(params));
  if (result.success) return null;
  return result.error.issues.map(i => `${i.path.join('.') || 'params'}: ${i.message}`).join('; ');
}
