import { WinstonModuleOptions } from 'nest-winston';
import * as winston from 'winston';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

export const formatLogValue = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  if (value instanceof Error) {
    return value.message;
  }

  try {
    return JSON.stringify(value);
  } catch {
    return '';
  }
};

export const consoleLine = printf((info) => {
  const context = formatLogValue(info.context);
  const scope = context ? `[${context}]` : '';
  const stack = formatLogValue(info.stack);
  const trace = stack ? `\n${stack}` : '';
  return `${formatLogValue(info.timestamp)} ${info.level} ${scope} ${formatLogValue(info.message)}${trace}`.trim();
});

export function createWinstonConfig(level: string): WinstonModuleOptions {
  return {
    level,
    transports: [
      new winston.transports.Console({
        level,
        format: combine(
          colorize({ all: true }),
          timestamp({ format: TIMESTAMP_FORMAT }),
          errors({ stack: true }),
          consoleLine,
        ),
      }),
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error',
        format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), json()),
      }),
      new winston.transports.File({
        filename: 'logs/booking.log',
        level,
        format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), json()),
      }),
    ],
  };
}
