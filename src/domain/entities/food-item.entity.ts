import { InvalidValueException } from '../exceptions';
import { Money } from '../value-objects';

/**
 * Entity representing a dish on the menu. The name is its identity:
 * line items reference dishes by name, exactly as the agent sends them.
 */
export class FoodItem {
  private constructor(
    public readonly name: string,
    public readonly price: Money,
  ) {
    this.validate();
  }

  static create(props: { name: string; price: Money }): FoodItem {
    return new FoodItem(props.name.trim(), props.price);
  }

  private validate(): void {
    if (!this.name) {
      throw new InvalidValueException('FoodItem', 'name cannot be empty');
    }
    if (this.price.isZero()) {
      throw new InvalidValueException('FoodItem', `price of "${this.name}" must be above zero`);
    }
  }

  equals(other: FoodItem): boolean {
    return this.name === other.name;
  }
}
