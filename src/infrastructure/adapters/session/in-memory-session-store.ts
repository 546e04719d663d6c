import { Injectable } from '@nestjs/common';
import { InProgressOrder } from '@domain/entities';
import { SessionId } from '@domain/value-objects';
import { ISessionStorePort } from '@application/ports/outbound';

/**
 * Process-wide store of in-progress orders, keyed by session id.
 *
 * Locking is a promise chain per session: each task waits for the previous
 * task of the same session to settle. The tail of the chain never rejects:
 * a failed task still releases the next one. The entry is dropped once the
 * last queued task settles.
 *
 * Entries never expire; they leave the store on complete or cancel.
 */
@Injectable()
export class InMemorySessionStore implements ISessionStorePort {
  private readonly orders = new Map<string, InProgressOrder>();
  private readonly locks = new Map<string, Promise<void>>();

  async get(sessionId: SessionId): Promise<InProgressOrder | null> {
    const order = this.orders.get(sessionId.value);
    return order ? order.clone() : null;
  }

  async put(sessionId: SessionId, order: InProgressOrder): Promise<void> {
    this.orders.set(sessionId.value, order.clone());
  }

  async delete(sessionId: SessionId): Promise<boolean> {
    return this.orders.delete(sessionId.value);
  }

  async size(): Promise<number> {
    return this.orders.size;
  }

  runExclusive<T>(sessionId: SessionId, task: () => Promise<T>): Promise<T> {
    const key = sessionId.value;
    const previous = this.locks.get(key) ?? Promise.resolve();

    const run = previous.then(() => task());
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(key, tail);

    void tail.then(() => {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    });

    return run;
  }

  /** Sessions with queued or running tasks */
  get lockedSessionCount(): number {
    return this.locks.size;
  }
}
