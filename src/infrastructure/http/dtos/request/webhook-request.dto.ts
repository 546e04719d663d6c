import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsDefined,
  IsNotEmpty,
  IsObject,
  IsString,
  ValidateNested,
} from 'class-validator';

export class IntentDto {
  @ApiProperty({
    description: 'Intent display name as configured in the agent',
    example: 'order.add- context: ongoing-order',
  })
  @IsString({ message: 'Intent display name must be a string' })
  @IsNotEmpty({ message: 'Intent display name cannot be empty' })
  displayName!: string;
}

export class OutputContextDto {
  @ApiProperty({
    description: 'Full context name; the session id is the segment after /sessions/',
    example: 'projects/food-agent/agent/sessions/4c1d0e2a/contexts/ongoing-order',
  })
  @IsString({ message: 'Context name must be a string' })
  @IsNotEmpty({ message: 'Context name cannot be empty' })
  name!: string;
}

export class QueryResultDto {
  @ApiProperty({ type: IntentDto })
  @IsDefined({ message: 'Intent is required' })
  @IsObject({ message: 'Intent must be an object' })
  @ValidateNested()
  @Type(() => IntentDto)
  intent!: IntentDto;

  @ApiProperty({
    description: 'Slot values extracted by the agent; shape depends on the intent',
    example: { 'food-item': ['Pizza', 'Pasta'], number: [2, 1] },
  })
  @IsObject({ message: 'Parameters must be an object' })
  parameters!: Record<string, unknown>;

  @ApiProperty({ type: [OutputContextDto] })
  @IsArray({ message: 'Output contexts must be an array' })
  @ArrayMinSize(1, { message: 'At least one output context is required' })
  @ValidateNested({ each: true })
  @Type(() => OutputContextDto)
  outputContexts!: OutputContextDto[];
}

/**
 * Fulfillment request sent by the conversational agent on every matched intent.
 *
 * Only the fields the webhook reads are declared; the whitelisting
 * ValidationPipe strips everything else the agent sends.
 */
export class WebhookRequestDto {
  @ApiProperty({ type: QueryResultDto })
  @IsDefined({ message: 'Query result is required' })
  @IsObject({ message: 'Query result must be an object' })
  @ValidateNested()
  @Type(() => QueryResultDto)
  queryResult!: QueryResultDto;
}
