import pino, { type Logger } from 'pino';
import { config } from '../config/env';

export type AppLogger = Logger;

export const logger: AppLogger = pino({
    level: config.LOG_LEVEL,
    formatters: {
        level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
        service: 'token-safety-bot'
    }
});
