import { InMemorySessionStore } from '@infrastructure/adapters/session';
import { InProgressOrder } from '@domain/entities';
import { SessionId } from '@domain/value-objects';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('InMemorySessionStore', () => {
  let store: InMemorySessionStore;
  const s1 = SessionId.fromString('s1');
  const s2 = SessionId.fromString('s2');

  beforeEach(() => {
    store = new InMemorySessionStore();
  });

  describe('storage', () => {
    it('should return null for an unknown session', async () => {
      expect(await store.get(s1)).toBeNull();
    });

    it('should store snapshots, not live references', async () => {
      // Arrange
      const order = InProgressOrder.fromEntries([['Pizza', 2]]);
      await store.put(s1, order);

      // Act
      order.setQuantity('Pasta', 1);
      const loaded = await store.get(s1);
      loaded?.removeItem('Pizza');

      // Assert
      expect((await store.get(s1))?.toEntries()).toEqual([['Pizza', 2]]);
    });

    it('should report whether a delete removed anything', async () => {
      // Arrange
      await store.put(s1, InProgressOrder.fromEntries([['Pizza', 1]]));

      // Act & Assert
      expect(await store.delete(s1)).toBe(true);
      expect(await store.delete(s1)).toBe(false);
    });

    it('should count stored sessions', async () => {
      // Arrange
      await store.put(s1, InProgressOrder.empty());
      await store.put(s2, InProgressOrder.fromEntries([['Samosa', 3]]));

      // Act & Assert
      expect(await store.size()).toBe(2);
    });
  });

  describe('runExclusive', () => {
    it('should run tasks of the same session one after another', async () => {
      // Arrange
      const events: string[] = [];
      let release = (): void => undefined;
      const gate = new Promise<void>((resolve) => {
        release = () => resolve();
      });

      // Act
      const first = store.runExclusive(s1, async () => {
        events.push('first:start');
        await gate;
        events.push('first:end');
      });
      const second = store.runExclusive(s1, async () => {
        events.push('second:start');
      });
      await flush();

      // Assert
      expect(events).toEqual(['first:start']);

      release();
      await Promise.all([first, second]);
      expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    it('should not block other sessions', async () => {
      // Arrange
      const events: string[] = [];
      let release = (): void => undefined;
      const gate = new Promise<void>((resolve) => {
        release = () => resolve();
      });
      const held = store.runExclusive(s1, async () => {
        await gate;
        events.push('s1');
      });

      // Act
      await store.runExclusive(s2, async () => {
        events.push('s2');
      });

      // Assert
      expect(events).toEqual(['s2']);
      release();
      await held;
      expect(events).toEqual(['s2', 's1']);
    });

    it('should return the task result', async () => {
      expect(await store.runExclusive(s1, async () => 42)).toBe(42);
    });

    it('should release the lock when a task fails', async () => {
      // Act
      const failing = store.runExclusive(s1, async () => {
        throw new Error('task failed');
      });
      const next = store.runExclusive(s1, async () => 'ran');

      // Assert
      await expect(failing).rejects.toThrow('task failed');
      await expect(next).resolves.toBe('ran');
    });

    it('should drop the lock entry once the queue drains', async () => {
      // Arrange
      const tasks = [1, 2, 3].map((value) => store.runExclusive(s1, async () => value));
      expect(store.lockedSessionCount).toBe(1);

      // Act
      await Promise.all(tasks);
      await flush();

      // Assert
      expect(store.lockedSessionCount).toBe(0);
    });

    it('should drop every lock entry after failed tasks in several sessions', async () => {
      // Arrange
      const failing = store.runExclusive(s1, async () => {
        throw new Error('task failed');
      });
      const afterFailure = store.runExclusive(s1, async () => 'ran');
      const otherSession = store.runExclusive(s2, async () => {
        throw new Error('other task failed');
      });
      expect(store.lockedSessionCount).toBe(2);

      // Act
      await expect(failing).rejects.toThrow('task failed');
      await expect(afterFailure).resolves.toBe('ran');
      await expect(otherSession).rejects.toThrow('other task failed');
      await flush();

      // Assert
      expect(store.lockedSessionCount).toBe(0);
    });

    it('should serialize read-modify-write cycles', async () => {
      // Act
      await Promise.all(
        ['Pizza', 'Pasta', 'Samosa', 'Dosa'].map((dish) =>
          store.runExclusive(s1, async () => {
            const order = (await store.get(s1)) ?? InProgressOrder.empty();
            await flush();
            order.setQuantity(dish, 1);
            await store.put(s1, order);
          }),
        ),
      );

      // Assert
      expect((await store.get(s1))?.toEntries()).toEqual([
        ['Pizza', 1],
        ['Pasta', 1],
        ['Samosa', 1],
        ['Dosa', 1],
      ]);
    });
  });
});
