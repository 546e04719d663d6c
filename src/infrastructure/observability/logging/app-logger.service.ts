import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';

export interface IntentEventContext {
  intent: string;
  outcome: string;
  sessionId?: string;
  durationMs: number;
  success: boolean;
  error?: string;
}

export interface OrderEventContext {
  orderId: string;
  event: 'placed' | 'placement_failed' | 'looked_up';
  itemCount?: number;
  totalPrice?: string;
}

export interface DBOperationContext {
  operation: 'find' | 'insert' | 'update' | 'delete' | 'aggregate';
  collection: string;
  durationMs: number;
  success: boolean;
  error?: string;
}

/**
 * Structured events on top of the request log, one `component` per concern
 * so they can be filtered downstream.
 */
@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  logIntentEvent(context: IntentEventContext): void {
    const logData = { component: 'webhook', ...context };

    if (context.success) {
      this.logger.info(logData, `Intent ${context.intent} handled: ${context.outcome}`);
    } else {
      this.logger.warn(logData, `Intent ${context.intent} rejected: ${context.outcome}`);
    }
  }

  logOrderEvent(context: OrderEventContext): void {
    this.logger.info({ component: 'order', ...context }, `Order ${context.event}: ${context.orderId}`);
  }

  logDBOperation(context: DBOperationContext): void {
    const logData = { component: 'database', ...context };

    if (context.success) {
      this.logger.debug(logData, `DB ${context.operation} on ${context.collection}`);
    } else {
      this.logger.error(logData, `DB ${context.operation} failed on ${context.collection}`);
    }
  }
}
