import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs-extra';
import { logsDir } from '../config/paths.js';

const level = process.env.RANDINDEX_LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  silent: process.env.RANDINDEX_LOG_SILENT === '1',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      return `${timestamp} [${level}] ${message}${Object.keys(meta).length ? ' ' + JSON.stringify(meta) : ''}`;
    })
  ),
  transports: [new winston.transports.Console({ level })],
});

// File transport only when a log directory is configured.
if (process.env.RANDINDEX_LOG_DIR) {
  fs.ensureDirSync(logsDir);
  logger.add(
    new DailyRotateFile({
      dirname: logsDir,
      filename: 'randindex-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      zippedArchive: false,
      level,
    })
  );
}
