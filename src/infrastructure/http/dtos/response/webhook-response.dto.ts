import { ApiProperty } from '@nestjs/swagger';

export class WebhookResponseDto {
  @ApiProperty({
    description: 'Text the agent reads back to the user',
    example: 'So far you have: 2 Pizza, 1 Pasta. Do you need anything else?',
  })
  fulfillmentText!: string;
}
