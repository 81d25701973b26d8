import path from 'path';
import winston from 'winston';

const { createLogger: winstonCreateLogger, format, transports } = winston;
const { combine, timestamp, printf, colorize, errors, json } = format;

const LOG_DIR = process.env.LOG_DIR || 'logs';

const lineFormat = printf(({ level, message, timestamp, module, stack, ...metadata }) => {
  let msg = `${timestamp} [${level}]${module ? ` [${module}]` : ''} ${message}`;
  if (stack) {
    msg += `\n${stack}`;
  }
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

export const createLogger = (module: string): winston.Logger => {
  const silent = process.env.LOG_SILENT === 'true';

  return winstonCreateLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent,
    format: combine(errors({ stack: true }), timestamp()),
    transports: [
      new transports.Console({
        format: combine(colorize(), lineFormat),
      }),
      ...(silent
        ? []
        : [
            new transports.File({
              filename: path.join(LOG_DIR, 'error.log'),
              level: 'error',
              format: json(),
            }),
            new transports.File({
              filename: path.join(LOG_DIR, 'combined.log'),
              format: json(),
            }),
          ]),
    ],
    defaultMeta: { module },
  });
};
