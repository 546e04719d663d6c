import { ApiProperty } from '@nestjs/swagger';

export class OrderLineDetailsDto {
  @ApiProperty({ example: 'Pizza' })
  itemName!: string;

  @ApiProperty({ example: 2 })
  quantity!: number;

  @ApiProperty({ example: '$8.00' })
  unitPrice!: string;

  @ApiProperty({ example: '$16.00' })
  totalPrice!: string;
}

export class OrderDetailsDto {
  @ApiProperty({ example: 41 })
  id!: number;

  @ApiProperty({ enum: ['in progress', 'in transit', 'delivered', 'cancelled'] })
  status!: string;

  @ApiProperty({ type: [OrderLineDetailsDto] })
  items!: OrderLineDetailsDto[];

  @ApiProperty({ example: '$16.00' })
  totalPrice!: string;

  @ApiProperty({ example: 2 })
  totalQuantity!: number;
}
