import type { DispatchLogger } from '../activities/types.js';
import type { GameClient } from './client.js';
import type { Clock } from './clock.js';

// Everything a game routine needs to touch the outside world
export interface GameContext {
  client: GameClient;
  clock: Clock;
  log: DispatchLogger;
  signal: AbortSignal;
}
