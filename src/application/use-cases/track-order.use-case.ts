import { Inject, Injectable } from '@nestjs/common';
import { Either, FULFILLMENT_MESSAGES, left, right } from '@application/common';
import { fulfillment, FulfillmentDto, TrackOrderInputDto } from '@application/dtos';
import { ApplicationError, toApplicationError } from '@application/errors';
import { ITrackOrderPort } from '@application/ports/inbound';
import { IOrderRepositoryPort, ORDER_REPOSITORY } from '@application/ports/outbound';
import { OrderId } from '@domain/value-objects';

@Injectable()
export class TrackOrderUseCase implements ITrackOrderPort {
  constructor(
    @Inject(ORDER_REPOSITORY)
    private readonly orderRepository: IOrderRepositoryPort,
  ) {}

  async execute(input: TrackOrderInputDto): Promise<Either<ApplicationError, FulfillmentDto>> {
    try {
      const orderId = OrderId.fromNumber(input.orderId);
      const status = await this.orderRepository.getOrderStatus(orderId);

      if (!status) {
        return right(
          fulfillment(FULFILLMENT_MESSAGES.noSuchOrder(orderId.toString()), 'status_not_found'),
        );
      }

      return right(
        fulfillment(
          FULFILLMENT_MESSAGES.orderStatus(orderId.toString(), status.toString()),
          'status_found',
        ),
      );
    } catch (error) {
      return left(toApplicationError(error));
    }
  }
}
