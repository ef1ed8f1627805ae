import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'manual-qa-retrieval';
const logDir = process.env.LOG_DIR;

function requestIdOf(req: IncomingMessage): string | undefined {
  const requestId = req.headers['x-request-id'];
  return typeof requestId === 'string' ? requestId : undefined;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        'req.headers["api-key"]',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: requestIdOf(req),
        method: req.method,
        url: req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
    },

    // Stored on the request so RequestIdMiddleware echoes the same id
    genReqId: (req: IncomingMessage) => {
      const requestId = requestIdOf(req) ?? `req-${uuidv4()}`;
      req.headers['x-request-id'] = requestId;
      return requestId;
    },

    customProps: (req: IncomingMessage) => ({
      requestId: requestIdOf(req),
    }),

    stream: multistream([
      // Console output, pretty outside production
      {
        level: 'info' as const,
        stream:
          process.env.NODE_ENV !== 'production'
            ? pinoPretty({
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
                singleLine: false,
              })
            : process.stdout,
      },
      // JSON file output only when a log directory is configured
      ...(logDir
        ? [
            {
              level: 'debug' as const,
              stream: createWriteStream(join(logDir, `${serviceName}.log`), { flags: 'a' }),
            },
          ]
        : []),
    ]),
  },
};
