import { randomUUID } from 'crypto';
import { GameEngine, type GameEngineOptions } from './engine/gameEngine.js';

/**
 * Lookup table from game id to engine. Each engine owns its whole state; the
 * registry only creates, finds and forgets them.
 */
export class GameRegistry {
  private games = new Map<string, GameEngine>();

  create(opts: Omit<GameEngineOptions, 'gameId'>): GameEngine {
    const id = randomUUID();
    const engine = new GameEngine({ ...opts, gameId: id });
    this.games.set(id, engine);
    return engine;
  }

  get(id: string): GameEngine | undefined {
    return this.games.get(id);
  }

  require(id: string): GameEngine {
    const engine = this.games.get(id);
    if (!engine) throw new Error(`Unknown game id "${id}".`);
    return engine;
  }

  delete(id: string): boolean {
    const engine = this.games.get(id);
    if (!engine) return false;
    engine.dispose();
    return this.games.delete(id);
  }

  get size(): number {
    return this.games.size;
  }
}
