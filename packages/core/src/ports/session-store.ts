import type { RuntimeResource } from '../lifecycle';
import type { Interaction, NewInteraction, SessionStats } from '../entities/interaction';

/**
 * Append-only interaction log keyed by session id.
 *
 * Every write is a single insert; implementations own their own write
 * serialization, so independent requests may append concurrently.
 */
export interface SessionStore extends RuntimeResource {
  saveInteraction(input: NewInteraction): Promise<Interaction>;
  /** Up to `limit` most recent interactions, newest first. */
  getHistory(sessionId: string, limit: number): Promise<Interaction[]>;
  /** Removes every interaction of the session and returns how many were removed. */
  clear(sessionId: string): Promise<number>;
  stats(sessionId: string): Promise<SessionStats>;
}
