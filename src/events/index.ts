import type { GameLogEntry } from '../types.js';
import { errorMessage } from '../utils.js';
import { EventBus } from './eventBus.js';

export { EventBus, type EventFilter, type Listener, type Unsubscribe } from './eventBus.js';

/**
 * Process-wide stream of game log entries. Games emit through the logger;
 * the console printer, log files and the replay UI listen here.
 */
export const eventBus = new EventBus<GameLogEntry>((error, entry) => {
  console.error(`Log listener failed on ${entry.type} entry ${entry.id}: ${errorMessage(error)}`);
});

/** Entries of one game, plus the session lines that belong to no game. */
export function forGame(gameId: string): (entry: GameLogEntry) => boolean {
  return entry => entry.game === undefined || entry.game === gameId;
}
