import winston from 'winston';
import { config } from './config.js';

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += ' ' + JSON.stringify(metadata);
    }
    return msg;
  }),
);

export const logger = winston.createLogger({
  level: config.logLevel === 'silent' ? 'error' : config.logLevel,
  silent: config.logLevel === 'silent',
  transports: [
    new winston.transports.Console({ format: consoleFormat, stderrLevels: ['error', 'warn', 'info', 'debug'] }),
  ],
});

/** Child logger tagged with the name of the module that owns it. */
export function createServiceLogger(service: string): winston.Logger {
  return logger.child({ service });
}
