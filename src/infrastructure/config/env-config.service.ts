import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvConfig } from './env.validation';

export type LogLevel = 'debug' | 'info' | 'silent';

export interface ThrottleSettings {
  ttl: number;
  limit: number;
}

/**
 * Typed view over the validated environment. Values are read through
 * ConfigService, which only ever holds what `validateEnv` returned.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): number {
    return this.configService.get('PORT', { infer: true });
  }

  get mongoUri(): string {
    return this.configService.get('MONGO_URI', { infer: true });
  }

  // One window shared by every throttled route
  get throttle(): ThrottleSettings {
    return {
      ttl: this.configService.get('THROTTLE_TTL_MS', { infer: true }),
      limit: this.configService.get('THROTTLE_LIMIT', { infer: true }),
    };
  }

  get logLevel(): LogLevel {
    switch (this.nodeEnv) {
      case 'production':
        return 'info';
      case 'test':
        return 'silent';
      default:
        return 'debug';
    }
  }

  /** Human-readable logs everywhere but production */
  get prettyLogs(): boolean {
    return this.nodeEnv !== 'production';
  }
}
