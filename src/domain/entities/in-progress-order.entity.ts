import { InvalidOrderException } from '../exceptions';

/**
 * Entity representing the order a session is still building.
 *
 * Maps food-item names to quantities. Item names are compared exactly
 * (no catalog lookup, no case folding); insertion order only matters for
 * the human-readable summary.
 */
export class InProgressOrder {
  private constructor(private readonly _items: Map<string, number>) {}

  static empty(): InProgressOrder {
    return new InProgressOrder(new Map());
  }

  // Later entries for the same name overwrite earlier ones.
  static fromEntries(entries: Iterable<readonly [string, number]>): InProgressOrder {
    const order = InProgressOrder.empty();
    for (const [name, quantity] of entries) {
      order.setQuantity(name, quantity);
    }
    return order;
  }

  get items(): ReadonlyMap<string, number> {
    return new Map(this._items);
  }

  get itemCount(): number {
    return this._items.size;
  }

  get totalQuantity(): number {
    let total = 0;
    for (const quantity of this._items.values()) {
      total += quantity;
    }
    return total;
  }

  has(itemName: string): boolean {
    return this._items.has(itemName);
  }

  quantityOf(itemName: string): number | undefined {
    return this._items.get(itemName);
  }

  // Sets (or overwrites) the quantity of one item.
  setQuantity(itemName: string, quantity: number): void {
    if (!itemName || itemName.trim().length === 0) {
      throw new InvalidOrderException('Food item name cannot be empty');
    }
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new InvalidOrderException(
        `Quantity for "${itemName}" must be a positive whole number, got ${quantity}`,
      );
    }
    this._items.set(itemName, quantity);
  }

  /**
   * Merges another order into this one. Quantities from `other` overwrite
   * existing entries with the same name; everything else is kept.
   */
  merge(other: InProgressOrder): void {
    for (const [name, quantity] of other._items) {
      this._items.set(name, quantity);
    }
  }

  // Removes the whole entry; returns false when the item was not in the order.
  removeItem(itemName: string): boolean {
    return this._items.delete(itemName);
  }

  isEmpty(): boolean {
    return this._items.size === 0;
  }

  clone(): InProgressOrder {
    return new InProgressOrder(new Map(this._items));
  }

  toEntries(): Array<[string, number]> {
    return [...this._items.entries()];
  }

  // "2 Pizza, 1 Pasta"
  toSummary(): string {
    return this.toEntries()
      .map(([name, quantity]) => `${quantity} ${name}`)
      .join(', ');
  }
}
