import { Params } from 'nestjs-pino';
import { multistream, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'upload-intake';
const logDir = process.env.LOG_DIR;

const streams: StreamEntry[] = [
  // Console output, pretty outside production
  {
    level: 'info',
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
];

// JSON file output for log shipping
if (logDir) {
  streams.push({
    level: 'debug',
    stream: createWriteStream(join(logDir, `${serviceName}.log`), {
      flags: 'a',
    }),
  });
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    // Data URIs can be megabytes of base64
    redact: {
      paths: ['dataUri', '*.dataUri', 'payload'],
      censor: '[data-uri]',
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    stream: multistream(streams),
  },
};
