import { InProgressOrder } from '../entities';

/**
 * Result of removing items from an in-progress order.
 */
export interface RemovalOutcome {
  order: InProgressOrder;
  removed: string[];
  notFound: string[];
}

/**
 * Domain Service holding the pure aggregation rules for in-progress orders.
 * Nothing here reads or writes session state; callers load the order,
 * apply one of these operations and store the result.
 */
export class OrderAggregatorService {
  /**
   * Pairs `items[i]` with `quantities[i]`.
   * Returns null when the sequences have different lengths, since there is
   * no way to tell which quantity belongs to which item.
   */
  pair(items: readonly string[], quantities: readonly number[]): InProgressOrder | null {
    if (items.length !== quantities.length) {
      return null;
    }
    return InProgressOrder.fromEntries(
      items.map((item, index): [string, number] => [item, quantities[index]]),
    );
  }

  /**
   * Merges a candidate into the existing order, or starts a new order from it.
   * The existing order is not mutated.
   */
  merge(existing: InProgressOrder | null, candidate: InProgressOrder): InProgressOrder {
    const merged = existing ? existing.clone() : InProgressOrder.empty();
    merged.merge(candidate);
    return merged;
  }

  /**
   * Removes whole entries by name. Repeated names count once.
   * The existing order is not mutated.
   */
  remove(existing: InProgressOrder, itemNames: readonly string[]): RemovalOutcome {
    const order = existing.clone();
    const removed: string[] = [];
    const notFound: string[] = [];

    for (const name of new Set(itemNames)) {
      if (order.removeItem(name)) {
        removed.push(name);
      } else {
        notFound.push(name);
      }
    }

    return { order, removed, notFound };
  }
}
