import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, ConnectionStates } from 'mongoose';
import { ISessionStorePort, SESSION_STORE } from '@application/ports/outbound';
import { EnvConfigService } from '@infrastructure/config/env-config.service';
import { HealthStatusDto, MongoHealthDto, ReadinessDto } from '../dtos/response';

/**
 * Health endpoints for monitoring and container orchestration.
 * MongoDB is the only external dependency; the session store lives in
 * process and is reported by size only.
 */
@ApiTags('Health')
@SkipThrottle()
@Controller('api/v1/health')
export class HealthController {
  private readonly startedAt = Date.now();

  constructor(
    private readonly envConfig: EnvConfigService,
    @InjectConnection() private readonly mongoConnection: Connection,
    @Inject(SESSION_STORE) private readonly sessionStore: ISessionStorePort,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Health check', description: 'MongoDB status and session count.' })
  @ApiOkResponse({ type: HealthStatusDto })
  async healthCheck(): Promise<HealthStatusDto> {
    const [mongodb, active] = await Promise.all([this.pingMongo(), this.sessionStore.size()]);

    return {
      status: mongodb.status,
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version ?? '1.0.0',
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      environment: this.envConfig.nodeEnv,
      services: { mongodb, sessions: { active } },
    };
  }

  @Get('live')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiOkResponse({ description: 'Application is alive' })
  live(): { status: 'alive' } {
    return { status: 'alive' };
  }

  @Get('ready')
  @ApiOperation({
    summary: 'Readiness probe',
    description: 'Ready once MongoDB answers; orders cannot be placed before that.',
  })
  @ApiOkResponse({ type: ReadinessDto })
  async ready(): Promise<ReadinessDto> {
    const mongodb = await this.pingMongo();

    return mongodb.status === 'healthy'
      ? { status: 'ready' }
      : { status: 'not_ready', reason: 'MongoDB is not available' };
  }

  private async pingMongo(): Promise<MongoHealthDto> {
    if (this.mongoConnection.readyState !== ConnectionStates.connected) {
      return { status: 'unhealthy' };
    }

    const startTime = Date.now();
    try {
      await this.mongoConnection.db?.admin().ping();
      return { status: 'healthy', responseTimeMs: Date.now() - startTime };
    } catch {
      return { status: 'unhealthy' };
    }
  }
}
