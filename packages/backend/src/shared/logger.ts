/**
 * @module: Logger
 * @risk: low
 * @scope: utility
 *
 * @description: Winston-based logging utility with a console transport and an optional
 * daily JSON file transport. Used by the request logger and server bootstrap.
 *
 * @impact
 * Risk: Logging failures can make debugging difficult but won't break request handling.
 */

import fs from 'node:fs';
import { createLogger, format, transports } from 'winston';
import type Transport from 'winston-transport';
import { format as dateFnsFormat } from 'date-fns';

const { combine, timestamp, printf, colorize } = format;

/**
 * Custom log format function
 * @private
 */
const logFormat = printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

// --- Logger output configuration ---
// File output is opt-in so tests and ephemeral containers stay on stdout only.
const logDirectory = process.env.LOG_DIR?.trim();

const buildTransports = (): Transport[] => {
  const outputs: Transport[] = [new transports.Console()];

  if (logDirectory) {
    fs.mkdirSync(logDirectory, { recursive: true });
    outputs.push(new transports.File({
      filename: `${logDirectory}/${dateFnsFormat(new Date(), 'yyyy-MM-dd')}.log`,
      format: format.combine(
        format.uncolorize(),
        format.timestamp(),
        format.json()
      )
    }));
  }

  return outputs;
};

/**
 * Winston logger instance shared by the whole backend.
 */
export const logger = createLogger({
  level: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize({ all: true }),
    logFormat
  ),
  transports: buildTransports(),
  exitOnError: false
});
