// src/utils/logger.ts

import fs from 'fs';
import winston from 'winston';

const LOG_DIR = 'logs';

// Timestamped terminal output, metadata rendered as key=value pairs
const cleanFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let formattedMessage = String(message);

    const entries = Object.entries(meta);
    if (entries.length > 0) {
      const metaStr = entries
        .map(([key, value]) => `${key}=${typeof value === 'bigint' ? value.toString() : String(value)}`)
        .join(' ');
      formattedMessage += ` ${metaStr}`;
    }

    return `${timestamp} ${level}: ${formattedMessage}`;
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: cleanFormat,
  transports: [
    new winston.transports.Console({
      handleExceptions: true,
      handleRejections: true
    })
  ],
  exitOnError: false
});

// Optional: JSON log file for debugging
if (process.env.LOG_TO_FILE === 'true') {
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR);
  }

  logger.add(
    new winston.transports.File({
      filename: `${LOG_DIR}/coordinator.log`,
      level: 'debug',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json({
          replacer: (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value)
        })
      ),
      maxsize: 50 * 1024 * 1024, // 50MB
      maxFiles: 5
    })
  );
}

/**
 * Short form of a hex id for log lines.
 */
export function shortId(id: string): string {
  return id.length > 12 ? `${id.substring(0, 10)}...` : id;
}
