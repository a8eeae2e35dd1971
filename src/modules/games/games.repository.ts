import { Pool } from 'pg';
import { PersistenceException } from '../../utils/exceptions';

/**
 * Narrow persistence contract for serialized game state.
 */
export interface GameStateStore {
  save(gameId: string, serializedState: string): Promise<void>;
  /** @returns null when no state is stored for the game */
  load(gameId: string): Promise<string | null>;
}

export class GameStateRepository implements GameStateStore {
  constructor(private readonly db: Pool) {}

  async save(gameId: string, serializedState: string): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO game_states (game_id, state, updated_at)
         VALUES ($1, $2, NOW())
         ON CONFLICT (game_id) DO UPDATE
           SET state = EXCLUDED.state, updated_at = NOW()`,
        [gameId, serializedState]
      );
    } catch (error) {
      throw PersistenceException.fromError(error, `save game state ${gameId}`);
    }
  }

  async load(gameId: string): Promise<string | null> {
    try {
      const result = await this.db.query<{ state: string }>(
        'SELECT state FROM game_states WHERE game_id = $1',
        [gameId]
      );

      if (result.rows.length === 0) return null;
      return result.rows[0].state;
    } catch (error) {
      throw PersistenceException.fromError(error, `load game state ${gameId}`);
    }
  }
}

/**
 * Map-backed store for development sessions without a database.
 */
export class InMemoryGameStateRepository implements GameStateStore {
  private states = new Map<string, string>();

  async save(gameId: string, serializedState: string): Promise<void> {
    this.states.set(gameId, serializedState);
  }

  async load(gameId: string): Promise<string | null> {
    return this.states.get(gameId) ?? null;
  }

  has(gameId: string): boolean {
    return this.states.has(gameId);
  }
}
