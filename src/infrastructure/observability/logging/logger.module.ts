import { Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import { randomUUID } from 'crypto';
import { IncomingMessage, ServerResponse } from 'http';
import { EnvConfigService } from '../../config';
import { AppLoggerService } from './app-logger.service';

interface SerializedRequest {
  id: string;
  method: string;
  url: string;
}

interface SerializedResponse {
  statusCode: number;
}

// Trust an incoming x-request-id so traces can span services
export function requestIdFrom(req: IncomingMessage): string {
  const header = req.headers['x-request-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.length > 0 ? value : randomUUID();
}

@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService): Params => {
        return {
          pinoHttp: {
            level: config.logLevel,

            // Readable output in development, JSON in production
            transport: config.isProduction
              ? undefined
              : {
                  target: 'pino-pretty',
                  options: {
                    colorize: true,
                    singleLine: false,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                  },
                },

            genReqId: requestIdFrom,

            customProps: (req: IncomingMessage): Record<string, unknown> => ({
              userAgent: req.headers['user-agent'],
              ip: req.socket.remoteAddress,
            }),

            redact: {
              paths: ['req.headers.authorization', 'req.headers.cookie', 'req.headers["x-api-key"]'],
              censor: '[REDACTED]',
            },

            serializers: {
              req: (req: IncomingMessage & { id?: string }): SerializedRequest => ({
                id: req.id ?? '',
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
        };
      },
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
