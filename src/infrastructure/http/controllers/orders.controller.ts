import {
  BadRequestException,
  Controller,
  Get,
  Inject,
  Logger,
  NotFoundException,
  Param,
  ParseIntPipe,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { IOrderRepositoryPort, ORDER_REPOSITORY } from '@application/ports/outbound';
import { OrderId } from '@domain/value-objects';
import { OrderDetailsDto } from '../dtos/response';

/**
 * Read access to placed orders. Orders are only ever created through the
 * webhook's complete intent.
 */
@ApiTags('Orders')
@Controller('api/v1/orders')
export class OrdersController {
  private readonly logger = new Logger(OrdersController.name);

  constructor(
    @Inject(ORDER_REPOSITORY)
    private readonly orderRepository: IOrderRepositoryPort,
  ) {}

  @Get(':id')
  @ApiOperation({
    summary: 'Get order by ID',
    description: 'Retrieve a placed order with its lines, prices and tracking status.',
  })
  @ApiParam({ name: 'id', description: 'Order ID', example: 41 })
  @ApiResponse({ status: 200, description: 'Order found', type: OrderDetailsDto })
  @ApiBadRequestResponse({ description: 'Order ID is not an integer or is out of range' })
  @ApiNotFoundResponse({ description: 'Order not found' })
  async getOrderById(@Param('id', ParseIntPipe) id: number): Promise<OrderDetailsDto> {
    this.logger.debug(`Getting order by ID: ${id}`);

    // ParseIntPipe lets through digit strings too long to be exact numbers
    if (!Number.isSafeInteger(id)) {
      throw new BadRequestException(`Order ID '${id}' is out of range`);
    }

    if (id < 1) {
      throw new NotFoundException(`Order with ID '${id}' not found`);
    }

    const order = await this.orderRepository.findById(OrderId.fromNumber(id));

    if (!order) {
      this.logger.debug(`Order not found: ${id}`);
      throw new NotFoundException(`Order with ID '${id}' not found`);
    }

    return {
      id: order.id.value,
      status: order.status.toString(),
      items: order.lines.map((line) => ({
        itemName: line.itemName,
        quantity: line.quantity,
        unitPrice: line.unitPrice.format(),
        totalPrice: line.totalPrice.format(),
      })),
      totalPrice: order.totalPrice.format(),
      totalQuantity: order.totalQuantity,
    };
  }
}
