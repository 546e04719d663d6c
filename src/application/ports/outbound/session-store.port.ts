import { InProgressOrder } from '@domain/entities';
import { SessionId } from '@domain/value-objects';

/**
 * Holds the order each session is still building.
 *
 * Implementations hand out and accept snapshots: mutating an order returned
 * by `get` must not change what the store holds until it is `put` back.
 */
export interface ISessionStorePort {
  /**
   * @returns The stored order, or null when the session has none
   */
  get(sessionId: SessionId): Promise<InProgressOrder | null>;

  put(sessionId: SessionId, order: InProgressOrder): Promise<void>;

  /**
   * @returns true if an order was removed
   */
  delete(sessionId: SessionId): Promise<boolean>;

  /** Number of sessions with an order in progress */
  size(): Promise<number>;

  /**
   * Runs `task` while holding the session's lock.
   * Tasks for the same session run one at a time in arrival order;
   * tasks for different sessions are not serialized against each other.
   * A failing task releases the lock and its error reaches the caller.
   */
  runExclusive<T>(sessionId: SessionId, task: () => Promise<T>): Promise<T>;
}
