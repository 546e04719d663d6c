import { PlacedOrder } from '@domain/entities';
import { Money, OrderId, OrderLine, OrderStatus } from '@domain/value-objects';
import { OrderLineDocument, OrderTrackingDocument } from '../schemas';

/**
 * Mapper between the two order collections and the PlacedOrder entity.
 * A placed order is its tracking record plus every line sharing its id.
 */
export class OrderMapper {
  static toDomain(tracking: OrderTrackingDocument, lines: OrderLineDocument[]): PlacedOrder {
    return PlacedOrder.reconstitute({
      id: OrderId.fromNumber(tracking._id),
      status: OrderStatus.fromString(tracking.status),
      lines: lines.map((line) => this.lineToDomain(line)),
    });
  }

  static lineToDomain(document: OrderLineDocument): OrderLine {
    return OrderLine.create({
      itemName: document.itemName,
      quantity: document.quantity,
      unitPrice: Money.fromCents(document.unitPriceCents, document.currency),
    });
  }

  static lineToDocument(orderId: OrderId, line: OrderLine): OrderLineDocument {
    const document = new OrderLineDocument();
    document.orderId = orderId.value;
    document.itemName = line.itemName;
    document.quantity = line.quantity;
    document.unitPriceCents = line.unitPrice.cents;
    document.currency = line.unitPrice.currency;
    return document;
  }
}
