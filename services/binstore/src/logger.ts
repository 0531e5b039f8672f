import pino from 'pino';
import { config } from './config';

export const logger = pino({ name: 'binstore', level: config.logLevel });

export type Logger = Pick<typeof logger, 'warn' | 'info' | 'error' | 'debug'>;
