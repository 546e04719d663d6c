import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export type ServiceStatus = 'healthy' | 'unhealthy';

export class MongoHealthDto {
  @ApiProperty({ enum: ['healthy', 'unhealthy'] })
  status!: ServiceStatus;

  @ApiPropertyOptional({ example: 3, description: 'Ping round trip, when connected' })
  responseTimeMs?: number;
}

export class SessionsHealthDto {
  @ApiProperty({ example: 12, description: 'Sessions holding an in-progress order' })
  active!: number;
}

export class HealthServicesDto {
  @ApiProperty({ type: MongoHealthDto })
  mongodb!: MongoHealthDto;

  @ApiProperty({ type: SessionsHealthDto })
  sessions!: SessionsHealthDto;
}

/**
 * Overall status follows MongoDB: without it no order can be placed or tracked.
 */
export class HealthStatusDto {
  @ApiProperty({ enum: ['healthy', 'unhealthy'] })
  status!: ServiceStatus;

  @ApiProperty({ format: 'date-time' })
  timestamp!: string;

  @ApiProperty({ example: '1.0.0' })
  version!: string;

  @ApiProperty({ description: 'Uptime in seconds' })
  uptime!: number;

  @ApiProperty({ example: 'production' })
  environment!: string;

  @ApiProperty({ type: HealthServicesDto })
  services!: HealthServicesDto;
}

export class ReadinessDto {
  @ApiProperty({ enum: ['ready', 'not_ready'] })
  status!: 'ready' | 'not_ready';

  @ApiPropertyOptional({ example: 'MongoDB is not available' })
  reason?: string;
}
