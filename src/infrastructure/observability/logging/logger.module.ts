import { Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import { randomUUID } from 'crypto';
import { IncomingMessage, ServerResponse } from 'http';
import { EnvConfigService } from '../../config/env-config.service';
import { AppLoggerService } from './app-logger.service';

interface SerializedRequest {
  id: string;
  method: string;
  url: string;
}

interface SerializedResponse {
  statusCode: number;
}

const REQUEST_ID_HEADER = 'x-request-id';

function requestIdFrom(req: IncomingMessage): string {
  const header = req.headers[REQUEST_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value || randomUUID();
}

/**
 * Request logging through pino-http, plus AppLoggerService for structured
 * domain events. Nest's own Logger is bound to pino in main.ts.
 */
@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService): Params => ({
        pinoHttp: {
          level: config.logLevel,

          transport: config.prettyLogs
            ? {
                target: 'pino-pretty',
                options: {
                  colorize: true,
                  singleLine: true,
                  translateTime: 'SYS:standard',
                  ignore: 'pid,hostname',
                },
              }
            : undefined,

          genReqId: requestIdFrom,

          customProps: (req: IncomingMessage): Record<string, unknown> => ({
            requestId: String(req.id),
            userAgent: req.headers['user-agent'],
            ip: req.socket.remoteAddress,
          }),

          // Agent payloads carry the user's phrasing; keep it out of the logs
          redact: {
            paths: [
              'req.headers.authorization',
              'req.headers.cookie',
              'req.body.queryResult.queryText',
              'req.body.originalDetectIntentRequest',
            ],
            censor: '[REDACTED]',
          },

          serializers: {
            req: (req: IncomingMessage): SerializedRequest => ({
              id: String(req.id),
              method: req.method ?? '',
              url: req.url ?? '',
            }),
            res: (res: ServerResponse): SerializedResponse => ({
              statusCode: res.statusCode,
            }),
          },

          customLogLevel: (
            _req: IncomingMessage,
            res: ServerResponse,
            err: Error | undefined,
          ): 'error' | 'warn' | 'info' => {
            if (res.statusCode >= 500 || err) return 'error';
            if (res.statusCode >= 400) return 'warn';
            return 'info';
          },

          customSuccessMessage: (req: IncomingMessage, res: ServerResponse): string =>
            `${req.method ?? 'UNKNOWN'} ${req.url ?? '/'} completed with ${res.statusCode}`,
          customErrorMessage: (req: IncomingMessage, _res: ServerResponse, err: Error): string =>
            `${req.method ?? 'UNKNOWN'} ${req.url ?? '/'} failed: ${err.message}`,
        },
      }),
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
