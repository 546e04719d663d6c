import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { PlacedOrder } from '@domain/entities';
import { DomainException } from '@domain/exceptions';
import { Money, OrderId, OrderLine, OrderStatus } from '@domain/value-objects';
import { IOrderRepositoryPort } from '@application/ports/outbound';
import {
  AppLoggerService,
  DBOperationContext,
} from '@infrastructure/observability/logging/app-logger.service';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import {
  CounterDocument,
  CounterDocumentType,
  FoodItemDocument,
  FoodItemDocumentType,
  OrderLineDocument,
  OrderLineDocumentType,
  OrderTrackingDocument,
  OrderTrackingDocumentType,
} from '../schemas';
import { OrderMapper } from '../mappers';

const ORDER_ID_COUNTER = 'orderId';

/**
 * MongoDB implementation of IOrderRepositoryPort.
 *
 * A placed order is spread over three collections: its lines in `orders`,
 * its status in `order_tracking`, and its id allocated from `counters`.
 * Lines are priced from `food_items` at write time.
 */
@Injectable()
export class MongoOrderRepository implements IOrderRepositoryPort {
  private readonly logger = new Logger(MongoOrderRepository.name);

  constructor(
    @InjectModel(OrderLineDocument.name)
    private readonly orderLineModel: Model<OrderLineDocumentType>,
    @InjectModel(OrderTrackingDocument.name)
    private readonly trackingModel: Model<OrderTrackingDocumentType>,
    @InjectModel(CounterDocument.name)
    private readonly counterModel: Model<CounterDocumentType>,
    @InjectModel(FoodItemDocument.name)
    private readonly foodItemModel: Model<FoodItemDocumentType>,
    private readonly appLogger: AppLoggerService,
    private readonly metrics: MetricsService,
  ) {}

  async nextOrderId(): Promise<OrderId> {
    const counter = await this.timed('update', 'counters', () =>
      this.counterModel.findOneAndUpdate(
        { _id: ORDER_ID_COUNTER },
        { $inc: { seq: 1 } },
        { new: true, upsert: true },
      ),
    );

    if (!counter) {
      throw new Error(`Counter "${ORDER_ID_COUNTER}" could not be incremented`);
    }

    return OrderId.fromNumber(counter.seq);
  }

  /**
   * Failures are reported as false so the caller can roll the order back.
   */
  async insertLineItem(itemName: string, quantity: number, orderId: OrderId): Promise<boolean> {
    try {
      const foodItem = await this.timed('find', 'food_items', () =>
        this.foodItemModel.findOne({ name: itemName }),
      );

      if (!foodItem) {
        this.logger.warn(`"${itemName}" is not on the menu; order ${orderId.toString()} not written`);
        return false;
      }

      const line = OrderLine.create({
        itemName: foodItem.name,
        quantity,
        unitPrice: Money.fromCents(foodItem.priceCents, foodItem.currency),
      });

      await this.timed('insert', 'orders', () =>
        this.orderLineModel.create(OrderMapper.lineToDocument(orderId, line)),
      );
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to write "${itemName}" for order ${orderId.toString()}: ${message}`);
      return false;
    }
  }

  async deleteLineItems(orderId: OrderId): Promise<number> {
    const result = await this.timed('delete', 'orders', () =>
      this.orderLineModel.deleteMany({ orderId: orderId.value }),
    );
    return result.deletedCount;
  }

  async setOrderStatus(orderId: OrderId, status: OrderStatus): Promise<void> {
    await this.timed('update', 'order_tracking', () =>
      this.trackingModel.findByIdAndUpdate(
        orderId.value,
        { $set: { status: status.toString() } },
        { upsert: true, new: true },
      ),
    );
  }

  async getOrderTotal(orderId: OrderId): Promise<Money> {
    const lines = await this.findLines(orderId);
    return Money.sum(lines.map((line) => line.totalPrice));
  }

  async getOrderStatus(orderId: OrderId): Promise<OrderStatus | null> {
    const tracking = await this.timed('find', 'order_tracking', () =>
      this.trackingModel.findById(orderId.value),
    );
    if (!tracking) {
      return null;
    }

    const status = this.restore(orderId, () => OrderStatus.fromString(tracking.status));
    if (!status.isKnown()) {
      this.logger.debug(`Order ${orderId.toString()} has status "${status.toString()}" set elsewhere`);
    }
    return status;
  }

  async findById(orderId: OrderId): Promise<PlacedOrder | null> {
    const tracking = await this.timed('find', 'order_tracking', () =>
      this.trackingModel.findById(orderId.value),
    );

    if (!tracking) {
      return null;
    }

    const lines = await this.timed('find', 'orders', () =>
      this.orderLineModel.find({ orderId: orderId.value }).sort({ _id: 1 }),
    );

    return this.restore(orderId, () => OrderMapper.toDomain(tracking, lines));
  }

  private async findLines(orderId: OrderId): Promise<OrderLine[]> {
    const documents = await this.timed('find', 'orders', () =>
      this.orderLineModel.find({ orderId: orderId.value }),
    );
    return this.restore(orderId, () =>
      documents.map((document) => OrderMapper.lineToDomain(document)),
    );
  }

  /**
   * Stored records that break a domain rule are a server-side fault.
   * They are rethrown as plain errors so callers answer 500, not 400.
   */
  private restore<T>(orderId: OrderId, build: () => T): T {
    try {
      return build();
    } catch (error) {
      if (error instanceof DomainException) {
        throw new Error(`Stored order ${orderId.toString()} is unreadable: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  private async timed<T>(
    operation: DBOperationContext['operation'],
    collection: string,
    query: () => PromiseLike<T>,
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await query();
      this.record({ operation, collection, startTime, success: true });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.record({ operation, collection, startTime, success: false, error: message });
      throw error;
    }
  }

  private record(context: {
    operation: DBOperationContext['operation'];
    collection: string;
    startTime: number;
    success: boolean;
    error?: string;
  }): void {
    const durationMs = Date.now() - context.startTime;
    this.metrics.recordDBQuery(context.operation, context.collection, durationMs / 1000);
    this.appLogger.logDBOperation({
      operation: context.operation,
      collection: context.collection,
      durationMs,
      success: context.success,
      error: context.error,
    });
  }
}
